import type { CheckOptions, Report, ReportSummary } from "@linkprobe/engine";
import type { Job, JobStatus } from "../db/schema.js";
import { redactOptions } from "../lib/options.js";
import type { JobInput, JobOptions } from "../lib/validation.js";

export interface CreateJobDto {
  inputs: JobInput[];
  options?: JobOptions;
}

/** A job with its full report. */
export interface JobResponseDto {
  id: string;
  inputs: JobInput[];
  status: JobStatus;
  options: Omit<CheckOptions, "basicAuth" | "githubToken" | "hostCredentials" | "headers">;
  result?: Report;
  error?: string;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
}

/** A job in a listing: the summary counts instead of the report. */
export interface JobSummaryDto {
  id: string;
  status: JobStatus;
  summary?: ReportSummary;
  error?: string;
  createdAt: string;
  completedAt?: string;
}

export interface JobCreatedDto {
  id: string;
  status: JobStatus;
}

export function toJobResponseDto(job: Job): JobResponseDto {
  return {
    id: job.id,
    inputs: job.inputs,
    status: job.status,
    options: redactOptions(job.options),
    result: job.result ?? undefined,
    error: job.error ?? undefined,
    createdAt: job.createdAt.toISOString(),
    startedAt: job.startedAt?.toISOString(),
    completedAt: job.completedAt?.toISOString(),
  };
}

export function toJobSummaryDto(job: Job): JobSummaryDto {
  return {
    id: job.id,
    status: job.status,
    summary: job.result?.summary,
    error: job.error ?? undefined,
    createdAt: job.createdAt.toISOString(),
    completedAt: job.completedAt?.toISOString(),
  };
}

export function toJobCreatedDto(job: Job): JobCreatedDto {
  return {
    id: job.id,
    status: job.status,
  };
}
