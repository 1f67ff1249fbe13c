import { z } from "zod";

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "must be an http(s) URL");

const count = z.number().int().nonnegative();
const positive = z.number().int().positive();

/** Inputs a job may name. Local paths and globs are not accepted over HTTP. */
export const jobInputSchema = z.union([
  z.object({ url: httpUrl }).strict(),
  z
    .object({
      id: z.string().min(1).max(200),
      content: z.string().max(5_000_000),
      format: z.enum(["markdown", "html", "text", "links"]).optional(),
      base: httpUrl.optional(),
    })
    .strict(),
  z
    .object({
      links: z.array(z.string().min(1).max(4096)).min(1).max(10_000),
      id: z.string().min(1).max(200).optional(),
    })
    .strict(),
]);

export const jobOptionsSchema = z
  .object({
    maxConcurrency: positive.max(256).optional(),
    maxConcurrencyPerHost: count.optional(),
    hostDelayMs: count.optional(),
    hostJitterMs: count.optional(),
    timeoutMs: positive.max(120_000).optional(),
    globalTimeoutMs: count.optional(),
    retryCount: positive.max(10).optional(),
    backoffBaseMs: count.optional(),
    backoffMultiplier: z.number().min(1).optional(),
    backoffMaxMs: count.optional(),
    retryStatusCodes: z.array(z.number().int()).optional(),
    acceptedStatusCodes: z.array(z.union([z.number().int(), z.string()])).optional(),
    include: z.array(z.string()).optional(),
    exclude: z.array(z.string()).optional(),
    skipPrivate: z.boolean().optional(),
    excludePrivateIps: z.boolean().optional(),
    excludeLinkLocal: z.boolean().optional(),
    excludeLoopback: z.boolean().optional(),
    excludeMail: z.boolean().optional(),
    schemes: z.array(z.enum(["http", "https", "mailto"])).optional(),
    userAgent: z.string().min(1).optional(),
    basicAuth: z.object({ username: z.string(), password: z.string() }).strict().optional(),
    headers: z.record(z.string()).optional(),
    githubToken: z.string().min(1).optional(),
    hostCredentials: z
      .array(z.object({ host: z.string().min(1), authorization: z.string().min(1) }).strict())
      .optional(),
    insecureTls: z.boolean().optional(),
    method: z.enum(["head", "get"]).optional(),
    maxRedirects: count.max(20).optional(),
    dedupe: z.boolean().optional(),
    countSkippedAsChecked: z.boolean().optional(),
  })
  .strict();

export const createJobSchema = z
  .object({
    inputs: z.array(jobInputSchema).min(1).max(100),
    options: jobOptionsSchema.optional(),
  })
  .strict();

export const listJobsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type JobInput = z.infer<typeof jobInputSchema>;
export type JobOptions = z.infer<typeof jobOptionsSchema>;
