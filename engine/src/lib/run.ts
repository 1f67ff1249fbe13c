import { Checker, type Logger } from "./checker.js";
import { UndiciRequester, type HttpRequester } from "./client.js";
import { loadDocuments, type DocumentFetcher, type DocumentInput } from "./documents.js";
import { extract } from "./extract.js";
import { normalizeOptions, type NormalizedOptions } from "./options.js";
import { GlobalTimeoutError, runChecks } from "./orchestrator.js";
import { ReportBuilder, skipResult } from "./report.js";
import { resolve } from "./resolve.js";
import { sleep } from "./time.js";
import type { CheckOptions, Report, SourceDocument, Target } from "./types.js";

export interface RunContext {
  /** Defaults to an undici requester closed with the run. */
  requester?: HttpRequester;
  /** Fetches documents given as URLs. Defaults like `requester`. */
  fetcher?: DocumentFetcher;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
  logger?: Logger;
  /** Aborting it cancels the run; the report is still returned. */
  signal?: AbortSignal;
  /** Prefix of progress lines, e.g. `Job 42`. */
  label?: string;
}

interface PendingCheck {
  documentId: string;
  target: Target;
}

/**
 * Load, extract, resolve and check. Throws only on invalid options, before
 * any I/O; everything else ends up in the report.
 */
export async function checkInputs(
  inputs: readonly DocumentInput[],
  options?: CheckOptions,
  context: RunContext = {}
): Promise<Report> {
  const normalized = normalizeOptions(options);
  const logger = context.logger ?? console;
  const now = context.now ?? Date.now;

  const fallback = new UndiciRequester(normalized);
  const requester = context.requester ?? fallback;
  const fetcher = context.fetcher ?? fallback;

  // The deadline covers document loading as well as checking.
  const deadline = new AbortController();
  const { globalTimeoutMs } = normalized;
  const timer =
    globalTimeoutMs > 0
      ? setTimeout(() => deadline.abort(new GlobalTimeoutError(globalTimeoutMs)), globalTimeoutMs)
      : undefined;
  const signal = context.signal
    ? AbortSignal.any([context.signal, deadline.signal])
    : deadline.signal;

  try {
    const builder = new ReportBuilder(normalized, now);
    const loaded = await loadDocuments(inputs, {
      fetcher,
      headers: { "User-Agent": normalized.userAgent, ...normalized.headers },
      timeoutMs: normalized.timeoutMs,
      signal,
      hostPolicy: normalized,
      maxRedirects: normalized.maxRedirects,
    });
    for (const failure of loaded.errors) {
      logger.warn(`Skipping input ${failure.input}: ${failure.error}`);
      builder.addInputError(failure.input, failure.error);
    }

    const pending = collect(loaded.documents, builder, normalized);
    logger.log(
      `${context.label ?? "Run"}: Found ${pending.length} links to check in ${loaded.documents.length} documents`
    );

    const checker = new Checker(normalized, {
      requester,
      sleep: context.sleep ?? sleep,
      now,
      logger,
    });
    const { cancelled } = await runChecks(
      pending,
      (target, signal) => checker.check(target, signal),
      {
        maxConcurrency: normalized.maxConcurrency,
        globalTimeoutMs: 0,
        dedupe: normalized.dedupe,
        signal,
        logger,
        label: context.label,
      },
      (item, result) => builder.record(item.documentId, result)
    );

    const report = builder.finalize(cancelled);
    const { succeeded, failed, excluded, skipped } = report.summary;
    logger.log(
      `${context.label ?? "Run"} completed: ${succeeded} ok, ${failed} failed, ${excluded} excluded, ${skipped} skipped`
    );
    return report;
  } finally {
    clearTimeout(timer);
    await fallback.close();
  }
}

/** Registers every document and records skip verdicts straight away. */
function collect(
  documents: SourceDocument[],
  builder: ReportBuilder,
  options: NormalizedOptions
): PendingCheck[] {
  const pending: PendingCheck[] = [];
  for (const document of documents) {
    const links = extract(document);
    builder.register(document.id, links);
    for (const link of links) {
      const resolution = resolve(link, document.base, options);
      if (resolution.kind === "skip") builder.record(document.id, skipResult(resolution));
      else pending.push({ documentId: document.id, target: resolution });
    }
  }
  return pending;
}
