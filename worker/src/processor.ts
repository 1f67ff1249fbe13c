import {
  checkInputs,
  errorMessage,
  type CheckOptions,
  type DocumentFetcher,
  type HttpRequester,
  type Report,
} from "@linkprobe/engine";
import type { JobInput } from "./lib/validation.js";

export interface ProcessableJob {
  id: string;
  inputs: JobInput[];
  options: CheckOptions;
}

export interface JobCallbacks {
  onProcessing: () => Promise<void>;
  onCompleted: (report: Report) => Promise<void>;
  onFailed: (error: string) => Promise<void>;
}

export interface ProcessorContext {
  /** Used when the job carries no token of its own. */
  githubToken?: string;
  requester?: HttpRequester;
  fetcher?: DocumentFetcher;
}

export async function processJob(
  job: ProcessableJob,
  callbacks: JobCallbacks,
  context: ProcessorContext = {}
): Promise<void> {
  await callbacks.onProcessing();

  try {
    console.log(`Job ${job.id}: Checking ${job.inputs.length} inputs`);

    const report = await checkInputs(
      job.inputs,
      { ...job.options, githubToken: job.options.githubToken ?? context.githubToken },
      {
        requester: context.requester,
        fetcher: context.fetcher,
        label: `Job ${job.id}`,
      }
    );

    await callbacks.onCompleted(report);
  } catch (error) {
    console.error(`Job ${job.id} failed:`, error);
    await callbacks.onFailed(errorMessage(error));
  }
}
