import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import { ConfigError } from "@linkprobe/engine";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../src/app.js";
import * as jobService from "../src/services/job.service.js";

vi.mock("../src/services/job.service.js", () => ({
  createJob: vi.fn(),
  getJob: vi.fn(),
  listJobs: vi.fn(),
}));

const id = "5b0a6f8e-3c1d-4b7a-9e2f-0d4c8a1b2c3d";

let server: Server;
let baseUrl = "";

function post(body: string): Promise<Response> {
  return fetch(`${baseUrl}/jobs`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body,
  });
}

describe("worker app", () => {
  beforeAll(async () => {
    server = createApp().listen(0);
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("server has no port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
  });

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.clearAllMocks();
    vi.restoreAllMocks();
  });

  describe("POST /jobs", () => {
    it("accepts a valid job", async () => {
      vi.mocked(jobService.createJob).mockResolvedValue({ id, status: "pending" });

      const res = await post(JSON.stringify({ inputs: [{ links: ["https://example.com"] }] }));

      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({ id, status: "pending" });
      expect(jobService.createJob).toHaveBeenCalledWith({
        inputs: [{ links: ["https://example.com"] }],
      });
    });

    it("rejects a body without inputs", async () => {
      const res = await post(JSON.stringify({ inputs: [] }));

      expect(res.status).toBe(400);
      const body: unknown = await res.json();
      expect(body).toMatchObject({ error: "Invalid request" });
      expect(jobService.createJob).not.toHaveBeenCalled();
    });

    it("rejects local path inputs", async () => {
      const res = await post(JSON.stringify({ inputs: [{ path: "/etc/passwd" }] }));

      expect(res.status).toBe(400);
      expect(jobService.createJob).not.toHaveBeenCalled();
    });

    it("maps invalid options to 400", async () => {
      vi.mocked(jobService.createJob).mockRejectedValue(
        new ConfigError("invalid include pattern \"(\"")
      );

      const res = await post(JSON.stringify({ inputs: [{ links: ["https://example.com"] }] }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "invalid include pattern \"(\"" });
    });

    it("answers 500 when the job cannot be stored", async () => {
      vi.mocked(jobService.createJob).mockRejectedValue(new Error("connection refused"));

      const res = await post(JSON.stringify({ inputs: [{ links: ["https://example.com"] }] }));

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: "Failed to create job" });
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    it("rejects malformed JSON", async () => {
      const res = await post("{not json");

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid JSON body" });
    });
  });

  describe("GET /jobs", () => {
    it("lists jobs with the default limit", async () => {
      vi.mocked(jobService.listJobs).mockResolvedValue([]);

      const res = await fetch(`${baseUrl}/jobs`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual([]);
      expect(jobService.listJobs).toHaveBeenCalledWith(20);
    });

    it("rejects a limit above 100", async () => {
      const res = await fetch(`${baseUrl}/jobs?limit=500`);

      expect(res.status).toBe(400);
      expect(jobService.listJobs).not.toHaveBeenCalled();
    });
  });

  describe("GET /jobs/:id", () => {
    it("answers 404 for an id that is not a uuid", async () => {
      const res = await fetch(`${baseUrl}/jobs/not-a-uuid`);

      expect(res.status).toBe(404);
      expect(jobService.getJob).not.toHaveBeenCalled();
    });

    it("answers 404 for an unknown job", async () => {
      vi.mocked(jobService.getJob).mockResolvedValue(undefined);

      const res = await fetch(`${baseUrl}/jobs/${id}`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Job not found" });
    });

    it("returns a stored job", async () => {
      vi.mocked(jobService.getJob).mockResolvedValue({
        id,
        inputs: [{ links: ["https://example.com"] }],
        status: "pending",
        options: { schemes: ["http", "https", "mailto"] },
        createdAt: "2024-05-01T10:00:00.000Z",
      });

      const res = await fetch(`${baseUrl}/jobs/${id}`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ id, status: "pending" });
      expect(jobService.getJob).toHaveBeenCalledWith(id);
    });
  });
});
