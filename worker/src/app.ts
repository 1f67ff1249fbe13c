import { ConfigError } from "@linkprobe/engine";
import express, { type ErrorRequestHandler, type Express, type Response } from "express";
import { z, ZodError } from "zod";
import { createJobSchema, listJobsQuerySchema } from "./lib/validation.js";
import * as jobService from "./services/job.service.js";

const jobIdSchema = z.string().uuid();

function sendError(res: Response, error: unknown, message: string): void {
  if (error instanceof ZodError) {
    res.status(400).json({ error: "Invalid request", issues: error.issues });
    return;
  }
  if (error instanceof ConfigError) {
    res.status(400).json({ error: error.message });
    return;
  }
  console.error(`${message}:`, error);
  res.status(500).json({ error: message });
}

const handleBodyError: ErrorRequestHandler = (error: unknown, _req, res, next) => {
  if (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === "entity.parse.failed"
  ) {
    res.status(400).json({ error: "Invalid JSON body" });
    return;
  }
  next(error);
};

export function createApp(): Express {
  const app = express();
  app.use(express.json({ limit: "6mb" }));

  app.post("/jobs", async (req, res) => {
    try {
      const body = createJobSchema.parse(req.body);
      const job = await jobService.createJob(body);
      res.status(202).json(job);
    } catch (error) {
      sendError(res, error, "Failed to create job");
    }
  });

  app.get("/jobs", async (req, res) => {
    try {
      const { limit } = listJobsQuerySchema.parse(req.query);
      const jobs = await jobService.listJobs(limit);
      res.json(jobs);
    } catch (error) {
      sendError(res, error, "Failed to get jobs");
    }
  });

  app.get("/jobs/:id", async (req, res) => {
    try {
      const job = jobIdSchema.safeParse(req.params.id).success
        ? await jobService.getJob(req.params.id)
        : undefined;

      if (!job) {
        res.status(404).json({ error: "Job not found" });
        return;
      }

      res.json(job);
    } catch (error) {
      sendError(res, error, "Failed to get job");
    }
  });

  app.use(handleBodyError);

  return app;
}
