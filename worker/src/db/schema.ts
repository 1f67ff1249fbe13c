import type { CheckOptions, Report } from "@linkprobe/engine";
import { pgSchema, uuid, text, timestamp, jsonb, index } from "drizzle-orm/pg-core";
import type { JobInput } from "../lib/validation.js";

export const workerSchema = pgSchema("worker");

export type JobStatus = "pending" | "processing" | "completed" | "failed";

export const jobs = workerSchema.table(
  "jobs",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    inputs: jsonb("inputs").$type<JobInput[]>().notNull(),
    options: jsonb("options").$type<CheckOptions>().notNull(),
    status: text("status").$type<JobStatus>().notNull().default("pending"),
    result: jsonb("result").$type<Report>(),
    error: text("error"),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    startedAt: timestamp("started_at", { withTimezone: true }),
    completedAt: timestamp("completed_at", { withTimezone: true }),
  },
  (table) => ({
    createdAtIdx: index("jobs_created_at_idx").on(table.createdAt),
    statusIdx: index("jobs_status_idx").on(table.status),
  })
);

export type Job = typeof jobs.$inferSelect;
export type NewJob = typeof jobs.$inferInsert;
