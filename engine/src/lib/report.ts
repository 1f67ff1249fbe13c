import { cancelledResult } from "./checker.js";
import type {
  CheckResult,
  InputFailure,
  RawLink,
  Report,
  ReportSummary,
  SkipReason,
  SkipVerdict,
} from "./types.js";

export const EXIT_CODES = {
  ok: 0,
  runtimeError: 1,
  linksFailed: 2,
} as const;

const EXCLUDED_REASONS: ReadonlySet<SkipReason> = new Set([
  "excluded",
  "private_address",
  "mail_excluded",
]);

export function skipResult(verdict: SkipVerdict): CheckResult {
  return {
    url: verdict.url ?? verdict.link.text,
    link: verdict.link,
    status: EXCLUDED_REASONS.has(verdict.reason) ? "excluded" : "skipped",
    reason: verdict.reason,
    error: verdict.detail,
    elapsedMs: 0,
    retries: 0,
  };
}

export function summarize(
  results: Iterable<CheckResult>,
  countSkippedAsChecked = false
): ReportSummary {
  const summary: ReportSummary = {
    total: 0,
    checked: 0,
    succeeded: 0,
    failed: 0,
    excluded: 0,
    skipped: 0,
    redirected: 0,
    timeouts: 0,
    cancelled: 0,
  };

  for (const result of results) {
    summary.total++;
    switch (result.status) {
      case "success":
        summary.succeeded++;
        break;
      case "failure":
        summary.failed++;
        break;
      case "excluded":
        summary.excluded++;
        break;
      case "skipped":
        summary.skipped++;
        break;
    }
    if (result.redirectedTo) summary.redirected++;
    if (result.transportError === "timeout") summary.timeouts++;
    if (result.reason === "cancelled") summary.cancelled++;
  }

  summary.checked = summary.succeeded + summary.failed;
  if (countSkippedAsChecked) summary.checked += summary.excluded + summary.skipped;
  return summary;
}

/**
 * Collects results per document. Results are slotted by the link's extraction
 * index, so they come back in source order whatever order they arrive in.
 */
export class ReportBuilder {
  private readonly documents = new Map<
    string,
    { links: RawLink[]; results: Array<CheckResult | undefined> }
  >();
  private readonly inputErrors: InputFailure[] = [];
  private readonly startedAt: number;

  constructor(
    private readonly options: { countSkippedAsChecked: boolean } = {
      countSkippedAsChecked: false,
    },
    private readonly now: () => number = Date.now
  ) {
    this.startedAt = now();
  }

  register(documentId: string, links: RawLink[]): void {
    if (this.documents.has(documentId)) {
      throw new Error(`document "${documentId}" is already registered`);
    }
    this.documents.set(documentId, {
      links,
      results: new Array<CheckResult | undefined>(links.length).fill(undefined),
    });
  }

  /** First result for a slot wins. */
  record(documentId: string, result: CheckResult): void {
    const document = this.documents.get(documentId);
    if (!document) throw new Error(`unknown document "${documentId}"`);

    const { index } = result.link;
    if (index < 0 || index >= document.results.length) {
      throw new Error(`link index ${index} out of range for "${documentId}"`);
    }
    document.results[index] ??= result;
  }

  addInputError(input: string, error: string): void {
    this.inputErrors.push({ input, error });
  }

  finalize(cancelled = false): Report {
    // Entries, not assignment: ids such as "__proto__" must stay own keys.
    const entries: Array<[string, CheckResult[]]> = [];
    for (const [id, { links, results }] of this.documents) {
      entries.push([id, links.map((link, i) => results[i] ?? cancelledResult(link, link.text))]);
    }

    const completed = this.now();
    return {
      documents: Object.fromEntries(entries),
      summary: summarize(
        entries.flatMap(([, results]) => results),
        this.options.countSkippedAsChecked
      ),
      inputErrors: [...this.inputErrors],
      cancelled,
      startedAt: new Date(this.startedAt).toISOString(),
      completedAt: new Date(completed).toISOString(),
      durationMs: Math.max(0, completed - this.startedAt),
    };
  }
}

export function exitCodeFor(report: Report): number {
  if (report.inputErrors.length > 0 || report.summary.failed > 0) {
    return EXIT_CODES.linksFailed;
  }
  return EXIT_CODES.ok;
}
