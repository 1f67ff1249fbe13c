import { cancelledResult, type Logger } from "./checker.js";
import { targetKey } from "./resolve.js";
import type { CheckResult, Target } from "./types.js";

export type CheckFn = (target: Target, signal: AbortSignal) => Promise<CheckResult>;

export interface RunChecksOptions {
  maxConcurrency: number;
  /** 0 for no global timeout. */
  globalTimeoutMs: number;
  dedupe: boolean;
  signal?: AbortSignal;
  logger?: Logger;
  /** Prefix of progress lines. */
  label?: string;
}

export const PROGRESS_EVERY = 50;

export class GlobalTimeoutError extends Error {
  constructor(ms: number) {
    super(`run exceeded ${ms}ms`);
    this.name = "GlobalTimeoutError";
  }
}

/**
 * Check every item through a fixed pool of workers pulling from one queue.
 * `onResult` is called exactly once per item, in completion order. Once the
 * run is aborted, checks in flight resolve as cancelled and queued items are
 * recorded as cancelled without being checked.
 */
export async function runChecks<T extends { target: Target }>(
  items: readonly T[],
  check: CheckFn,
  options: RunChecksOptions,
  onResult: (item: T, result: CheckResult) => void
): Promise<{ cancelled: boolean }> {
  const controller = new AbortController();
  const signal = options.signal
    ? AbortSignal.any([options.signal, controller.signal])
    : controller.signal;

  let timer: NodeJS.Timeout | undefined;
  if (options.globalTimeoutMs > 0) {
    timer = setTimeout(
      () => controller.abort(new GlobalTimeoutError(options.globalTimeoutMs)),
      options.globalTimeoutMs
    );
  }

  const aborted = new Promise<void>((resolve) => {
    if (signal.aborted) resolve();
    else signal.addEventListener("abort", () => resolve(), { once: true });
  });

  const memo = new Map<string, Promise<CheckResult>>();
  const logger = options.logger ?? console;
  const label = options.label ?? "Run";
  let next = 0;
  let done = 0;

  const dispatch = (target: Target): Promise<CheckResult> => {
    if (!options.dedupe) return check(target, signal);

    const key = targetKey(target);
    let shared = memo.get(key);
    if (!shared) {
      shared = check(target, signal);
      memo.set(key, shared);
    }
    return shared.then((result) => ({ ...result, link: target.link }));
  };

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const item = items[next++];
      const { target } = item;

      const result = signal.aborted
        ? cancelledResult(target.link, targetKey(target))
        : await Promise.race([
            dispatch(target),
            aborted.then(() => cancelledResult(target.link, targetKey(target))),
          ]);

      onResult(item, result);
      done++;
      if (done % PROGRESS_EVERY === 0) {
        logger.log(`${label}: Checked ${done}/${items.length} links`);
      }
    }
  };

  try {
    const size = Math.min(options.maxConcurrency, items.length);
    await Promise.all(Array.from({ length: size }, () => worker()));
  } finally {
    clearTimeout(timer);
  }

  return { cancelled: signal.aborted };
}
