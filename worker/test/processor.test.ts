import type { DocumentFetcher, HttpRequest, HttpRequester, Report } from "@linkprobe/engine";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolveJobOptions } from "../src/lib/options.js";
import { createJobSchema } from "../src/lib/validation.js";
import { processJob, type JobCallbacks } from "../src/processor.js";

function callbacks() {
  const order: string[] = [];
  const reports: Report[] = [];
  const errors: string[] = [];
  const handlers: JobCallbacks = {
    onProcessing: vi.fn(async () => {
      order.push("processing");
    }),
    onCompleted: vi.fn(async (report: Report) => {
      order.push("completed");
      reports.push(report);
    }),
    onFailed: vi.fn(async (error: string) => {
      order.push("failed");
      errors.push(error);
    }),
  };
  return { handlers, order, reports, errors };
}

function stubRequester(status: number) {
  const calls: HttpRequest[] = [];
  const requester: HttpRequester = {
    request: async (request) => {
      calls.push(request);
      return { status, location: null };
    },
  };
  return { requester, calls };
}

describe("processJob", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("checks the inputs and hands over the report", async () => {
    const { requester, calls } = stubRequester(200);
    const { handlers, order, reports } = callbacks();

    await processJob(
      {
        id: "job-1",
        inputs: [{ links: ["https://example.com/a", "mailto:team@example.com"] }],
        options: { schemes: ["http", "https", "mailto"] },
      },
      handlers,
      { requester }
    );

    expect(order).toEqual(["processing", "completed"]);
    expect(calls.map((c) => c.url)).toEqual(["https://example.com/a"]);
    expect(reports[0].summary).toMatchObject({ total: 2, succeeded: 2, failed: 0 });
  });

  it("uses the worker token when the job has none", async () => {
    const { requester, calls } = stubRequester(200);
    const { handlers } = callbacks();

    await processJob(
      { id: "job-2", inputs: [{ links: ["https://github.com/org/repo"] }], options: {} },
      handlers,
      { requester, githubToken: "test-token" }
    );

    expect(calls[0].headers.Authorization).toBe("Bearer test-token");
  });

  it("does not fetch documents from private addresses", async () => {
    const { requester } = stubRequester(200);
    const { handlers, reports } = callbacks();
    const fetchText = vi.fn<DocumentFetcher["fetchText"]>();
    const body = createJobSchema.parse({
      inputs: [{ url: "http://169.254.169.254/latest/meta-data/" }],
    });

    await processJob(
      {
        id: "job-5",
        inputs: body.inputs,
        options: resolveJobOptions(body.options, { jobTimeoutMs: 0 }),
      },
      handlers,
      { requester, fetcher: { fetchText } }
    );

    expect(fetchText).not.toHaveBeenCalled();
    expect(reports[0].inputErrors).toEqual([
      {
        input: "http://169.254.169.254/latest/meta-data/",
        error: "refusing to fetch http://169.254.169.254/latest/meta-data/: link_local host",
      },
    ]);
  });

  it("reports invalid options as a failed job", async () => {
    const { requester } = stubRequester(200);
    const { handlers, order, errors } = callbacks();

    await processJob(
      { id: "job-3", inputs: [{ links: ["https://example.com"] }], options: { maxConcurrency: 0 } },
      handlers,
      { requester }
    );

    expect(order).toEqual(["processing", "failed"]);
    expect(errors).toEqual(["maxConcurrency: must be a positive integer, got 0"]);
  });

  it("marks the job failed when the report cannot be stored", async () => {
    const { requester } = stubRequester(200);
    const { handlers, order } = callbacks();
    handlers.onCompleted = async () => {
      throw new Error("database unavailable");
    };

    await processJob(
      { id: "job-4", inputs: [{ links: ["https://example.com"] }], options: {} },
      handlers,
      { requester }
    );

    expect(order).toEqual(["processing", "failed"]);
  });
});
