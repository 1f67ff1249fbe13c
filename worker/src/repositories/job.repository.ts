import { desc, eq, inArray } from "drizzle-orm";
import type { Report } from "@linkprobe/engine";
import { db } from "../db/index.js";
import { jobs, type Job, type NewJob, type JobStatus } from "../db/schema.js";

export interface JobUpdateData {
  status?: JobStatus;
  result?: Report;
  error?: string;
  startedAt?: Date;
  completedAt?: Date;
}

export async function createJob(data: NewJob): Promise<Job> {
  const [job] = await db.insert(jobs).values(data).returning();
  return job;
}

export async function findJobById(id: string): Promise<Job | undefined> {
  const [job] = await db.select().from(jobs).where(eq(jobs.id, id)).limit(1);
  return job;
}

export async function listRecentJobs(limit: number): Promise<Job[]> {
  return db.select().from(jobs).orderBy(desc(jobs.createdAt)).limit(limit);
}

export async function updateJob(
  id: string,
  data: JobUpdateData
): Promise<Job | undefined> {
  const [job] = await db
    .update(jobs)
    .set(data)
    .where(eq(jobs.id, id))
    .returning();
  return job;
}

/** Fails every job still pending or processing. Returns how many were failed. */
export async function failUnfinishedJobs(error: string): Promise<number> {
  const failed = await db
    .update(jobs)
    .set({ status: "failed", error, completedAt: new Date() })
    .where(inArray(jobs.status, ["pending", "processing"]))
    .returning({ id: jobs.id });
  return failed.length;
}
