import { afterEach, describe, expect, it, vi } from "vitest";
import { HostGate, Semaphore } from "../src/lib/semaphore.js";

describe("Semaphore", () => {
  it("hands a released slot to the next waiter", async () => {
    const semaphore = new Semaphore(1);
    const first = await semaphore.acquire();

    let granted = false;
    const pending = semaphore.acquire().then((release) => {
      granted = true;
      return release;
    });
    await Promise.resolve();
    expect(granted).toBe(false);

    first();
    const second = await pending;
    expect(granted).toBe(true);
    expect(semaphore.inUse).toBe(1);

    second();
    expect(semaphore.inUse).toBe(0);
  });

  it("ignores a second release", async () => {
    const semaphore = new Semaphore(2);
    const release = await semaphore.acquire();

    release();
    release();
    expect(semaphore.inUse).toBe(0);
  });

  it("drops an aborted waiter", async () => {
    const semaphore = new Semaphore(1);
    const first = await semaphore.acquire();
    const controller = new AbortController();

    const pending = semaphore.acquire(controller.signal);
    controller.abort(new Error("gone"));
    await expect(pending).rejects.toThrow("gone");

    first();
    expect(semaphore.inUse).toBe(0);
  });
});

describe("HostGate", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("is disabled without limits", () => {
    const gate = new HostGate({ maxConcurrencyPerHost: 0, hostDelayMs: 0, hostJitterMs: 0 });
    expect(gate.enabled).toBe(false);
  });

  it("bounds concurrent requests per host", async () => {
    const gate = new HostGate({ maxConcurrencyPerHost: 1, hostDelayMs: 0, hostJitterMs: 0 });
    const first = await gate.enter("a.example");

    let entered = false;
    const pending = gate.enter("a.example").then((release) => {
      entered = true;
      return release;
    });

    // Other hosts are not held up.
    const other = await gate.enter("b.example");
    other();
    expect(entered).toBe(false);

    first();
    const second = await pending;
    expect(entered).toBe(true);
    second();
  });

  it("spaces requests to the same host", async () => {
    vi.useFakeTimers();
    const gate = new HostGate(
      { maxConcurrencyPerHost: 0, hostDelayMs: 100, hostJitterMs: 0 },
      () => 0
    );

    await gate.enter("a.example");

    let entered = false;
    const pending = gate.enter("a.example").then(() => {
      entered = true;
    });
    await vi.advanceTimersByTimeAsync(99);
    expect(entered).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(entered).toBe(true);

    // A different host starts straight away.
    await gate.enter("b.example");
  });
});
