import { describe, expect, it, vi } from "vitest";
import { runChecks, type CheckFn } from "../src/lib/orchestrator.js";
import type { CheckResult, RawLink, Target } from "../src/lib/types.js";

const silent = { log: () => {}, warn: () => {}, error: () => {} };

function items(urls: string[]): Array<{ target: Target }> {
  return urls.map((url, index) => {
    const link: RawLink = { text: url, kind: "direct", offset: 0, line: index + 1, column: 1, index };
    return { target: { kind: "web", url, link } };
  });
}

const succeed = (target: Target): CheckResult => ({
  url: target.kind === "web" ? target.url : "",
  link: target.link,
  status: "success",
  elapsedMs: 0,
  retries: 0,
});

const options = {
  maxConcurrency: 4,
  globalTimeoutMs: 0,
  dedupe: false,
  logger: silent,
};

describe("runChecks", () => {
  it("never has more than maxConcurrency checks in flight", async () => {
    let inFlight = 0;
    let peak = 0;
    const check: CheckFn = async (target) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return succeed(target);
    };

    const results: CheckResult[] = [];
    const work = items(Array.from({ length: 20 }, (_, i) => `https://example.com/${i}`));
    const out = await runChecks(work, check, options, (_, result) => results.push(result));

    expect(out.cancelled).toBe(false);
    expect(results).toHaveLength(20);
    expect(peak).toBe(4);
  });

  it("checks a repeated target once and reports it per link", async () => {
    const check = vi.fn(async (target: Target) => succeed(target));
    const work = items([
      "https://example.com/a",
      "https://example.com/b",
      "https://example.com/a",
    ]);

    const seen: Array<[number, number]> = [];
    await runChecks(work, check, { ...options, dedupe: true }, (item, result) =>
      seen.push([item.target.link.index, result.link.index])
    );

    expect(check).toHaveBeenCalledTimes(2);
    expect(seen.sort()).toEqual([
      [0, 0],
      [1, 1],
      [2, 2],
    ]);
  });

  it("checks repeated targets again without dedupe", async () => {
    const check = vi.fn(async (target: Target) => succeed(target));
    const work = items(["https://example.com/a", "https://example.com/a"]);

    await runChecks(work, check, options, () => {});

    expect(check).toHaveBeenCalledTimes(2);
  });

  it("cancels outstanding and queued checks at the global timeout", async () => {
    const check: CheckFn = () => new Promise<CheckResult>(() => {});
    const work = items(Array.from({ length: 5 }, (_, i) => `https://example.com/${i}`));

    const results: CheckResult[] = [];
    const out = await runChecks(
      work,
      check,
      { ...options, maxConcurrency: 2, globalTimeoutMs: 20 },
      (_, result) => results.push(result)
    );

    expect(out.cancelled).toBe(true);
    expect(results).toHaveLength(5);
    expect(results.every((r) => r.status === "failure" && r.reason === "cancelled")).toBe(true);
  });

  it("records everything as cancelled when the caller already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const check = vi.fn(async (target: Target) => succeed(target));

    const reasons: Array<string | undefined> = [];
    const out = await runChecks(
      items(["https://example.com/a", "https://example.com/b"]),
      check,
      { ...options, signal: controller.signal },
      (_, result) => reasons.push(result.reason)
    );

    expect(out.cancelled).toBe(true);
    expect(check).not.toHaveBeenCalled();
    expect(reasons).toEqual(["cancelled", "cancelled"]);
  });

  it("logs progress every 50 completions", async () => {
    const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const work = items(Array.from({ length: 120 }, (_, i) => `https://example.com/${i}`));

    await runChecks(
      work,
      async (target) => succeed(target),
      { ...options, logger, label: "Job 7" },
      () => {}
    );

    expect(logger.log.mock.calls).toEqual([
      ["Job 7: Checked 50/120 links"],
      ["Job 7: Checked 100/120 links"],
    ]);
  });

  it("does nothing for an empty queue", async () => {
    const check = vi.fn(async (target: Target) => succeed(target));
    const out = await runChecks([], check, options, () => {});

    expect(out.cancelled).toBe(false);
    expect(check).not.toHaveBeenCalled();
  });
});
