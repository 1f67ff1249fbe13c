import { getConfig } from "../lib/config.js";
import { resolveJobOptions } from "../lib/options.js";
import * as jobRepository from "../repositories/job.repository.js";
import { processJob } from "../processor.js";
import type {
  CreateJobDto,
  JobCreatedDto,
  JobResponseDto,
  JobSummaryDto,
} from "../dto/job.dto.js";
import { toJobCreatedDto, toJobResponseDto, toJobSummaryDto } from "../dto/job.dto.js";
import type { Job } from "../db/schema.js";

export async function createJob(dto: CreateJobDto): Promise<JobCreatedDto> {
  const config = getConfig();
  const options = resolveJobOptions(dto.options, config);

  const job = await jobRepository.createJob({ inputs: dto.inputs, options });

  console.log(`Job ${job.id} created for ${dto.inputs.length} inputs`);

  // Start processing in background (fire-and-forget)
  startProcessing(job, config.githubToken);

  return toJobCreatedDto(job);
}

export async function getJob(id: string): Promise<JobResponseDto | undefined> {
  const job = await jobRepository.findJobById(id);
  if (!job) return undefined;
  return toJobResponseDto(job);
}

export async function listJobs(limit: number): Promise<JobSummaryDto[]> {
  const jobs = await jobRepository.listRecentJobs(limit);
  return jobs.map(toJobSummaryDto);
}

/**
 * Jobs run in this process only, so any job left unfinished by a previous
 * process will never complete.
 */
export async function failInterruptedJobs(): Promise<void> {
  const count = await jobRepository.failUnfinishedJobs("Interrupted by worker restart");
  if (count > 0) {
    console.log(`Marked ${count} interrupted jobs as failed`);
  }
}

function startProcessing(job: Job, githubToken: string | undefined): void {
  processJob(
    { id: job.id, inputs: job.inputs, options: job.options },
    {
      onProcessing: async () => {
        await jobRepository.updateJob(job.id, { status: "processing", startedAt: new Date() });
      },
      onCompleted: async (result) => {
        await jobRepository.updateJob(job.id, {
          status: "completed",
          result,
          completedAt: new Date(),
        });
      },
      onFailed: async (error) => {
        await jobRepository.updateJob(job.id, {
          status: "failed",
          error,
          completedAt: new Date(),
        });
      },
    },
    { githubToken }
  ).catch((error: unknown) => {
    console.error(`Job ${job.id}: could not record progress:`, error);
  });
}
