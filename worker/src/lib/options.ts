import { normalizeOptions, type CheckOptions } from "@linkprobe/engine";
import type { JobOptions } from "./validation.js";

/** Schemes a job may check. */
export const JOB_SCHEMES: NonNullable<CheckOptions["schemes"]> = ["http", "https", "mailto"];

export interface JobDefaults {
  /** Default run timeout in ms; 0 for none. */
  jobTimeoutMs: number;
}

/**
 * Options stored with a job: the request's options with the worker's
 * restrictions applied. Validated with the engine's rules so a bad pattern or
 * status code range is rejected before the job is stored.
 */
export function resolveJobOptions(
  options: JobOptions | undefined,
  defaults: JobDefaults
): CheckOptions {
  const resolved: CheckOptions = {
    ...options,
    schemes: options?.schemes ?? JOB_SCHEMES,
    skipPrivate: options?.skipPrivate ?? true,
    globalTimeoutMs: options?.globalTimeoutMs ?? defaults.jobTimeoutMs,
  };

  normalizeOptions(resolved);
  return resolved;
}

/** Options as shown to API clients: credentials are never echoed back. */
export function redactOptions(
  options: CheckOptions
): Omit<CheckOptions, "basicAuth" | "githubToken" | "hostCredentials" | "headers"> {
  const { basicAuth, githubToken, hostCredentials, headers, ...visible } = options;
  return visible;
}
