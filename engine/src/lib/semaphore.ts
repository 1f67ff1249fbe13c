import { jitter, sleep } from "./time.js";

export type Release = () => void;

/**
 * Counting semaphore with FIFO waiters. `acquire` resolves to a release
 * function that must be called exactly once.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    this.available = capacity;
  }

  get inUse(): number {
    return this.capacity - this.available;
  }

  async acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) throw signal.reason;

    if (this.available > 0) {
      this.available--;
      return this.releaser();
    }

    await new Promise<void>((resolve, reject) => {
      const grant = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      const onAbort = () => {
        const at = this.waiters.indexOf(grant);
        if (at !== -1) this.waiters.splice(at, 1);
        reject(signal?.reason);
      };
      this.waiters.push(grant);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
    return this.releaser();
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      // Hand the slot straight to the next waiter.
      if (next) next();
      else this.available++;
    };
  }
}

export interface HostGateOptions {
  /** 0 for no per-host concurrency bound. */
  maxConcurrencyPerHost: number;
  hostDelayMs: number;
  hostJitterMs: number;
}

/**
 * Per-host throttle layered under the global pool: bounds concurrent
 * requests to one host and spaces consecutive requests to it.
 */
export class HostGate {
  private readonly slots = new Map<string, Semaphore>();
  private readonly nextStart = new Map<string, number>();

  constructor(
    private readonly options: HostGateOptions,
    private readonly now: () => number = Date.now
  ) {}

  get enabled(): boolean {
    return this.options.maxConcurrencyPerHost > 0 || this.options.hostDelayMs > 0;
  }

  async enter(host: string, signal?: AbortSignal): Promise<Release> {
    let release: Release = () => {};

    if (this.options.maxConcurrencyPerHost > 0) {
      let slot = this.slots.get(host);
      if (!slot) {
        slot = new Semaphore(this.options.maxConcurrencyPerHost);
        this.slots.set(host, slot);
      }
      release = await slot.acquire(signal);
    }

    if (this.options.hostDelayMs > 0) {
      // Reserve the start time before waiting so concurrent callers queue up.
      const now = this.now();
      const start = Math.max(now, this.nextStart.get(host) ?? 0);
      this.nextStart.set(
        host,
        start + this.options.hostDelayMs + jitter(this.options.hostJitterMs)
      );
      if (start > now) {
        try {
          await sleep(start - now, signal);
        } catch (error) {
          release();
          throw error;
        }
      }
    }

    return release;
  }
}
