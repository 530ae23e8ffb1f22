import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { PendingChange } from "@autoversion/core-domain";
import { ChangeDebouncer, type ChangeDebouncerOptions } from "./change-debouncer";
import { MapFileProbe } from "../testing/fakes";

const REPORT = "/docs/report.pdf";
const INVOICE = "/docs/invoice.pdf";

// lets the promise chains started by a fired timer run to completion
async function settle() {
  for (let i = 0; i < 20; i++) await Promise.resolve();
}

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function setup(overrides: Partial<ChangeDebouncerOptions> = {}) {
  const probe = new MapFileProbe();
  probe.set(REPORT, 10, 1);
  probe.set(INVOICE, 20, 1);

  const handled: Array<{ path: string; change: PendingChange }> = [];
  const errors: Array<{ err: unknown; path: string }> = [];

  const debouncer = new ChangeDebouncer({
    debounceMs: 1000,
    stabilityProbeMs: 0,
    probe,
    onQuiescent: async (path, change) => {
      handled.push({ path, change });
    },
    onError: (err, path) => errors.push({ err, path }),
    ...overrides,
  });

  return { probe, handled, errors, debouncer };
}

describe("ChangeDebouncer", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("coalesces a burst of events into one hand-off after the last one", async () => {
    const { debouncer, handled } = setup();

    for (let i = 0; i < 5; i++) {
      debouncer.intake(REPORT);
      await vi.advanceTimersByTimeAsync(300);
    }
    // last event at t=1200

    await vi.advanceTimersByTimeAsync(699); // t=2199
    await settle();
    expect(handled).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    await settle();
    expect(handled).toHaveLength(1);
    expect(handled[0].path).toBe(REPORT);
    expect(handled[0].change).toEqual({ path: REPORT, firstSeenAt: 0, lastSeenAt: 1200 });
    expect(debouncer.pendingCount).toBe(0);
  });

  it("restarts the window when an event arrives before it elapses", async () => {
    const { debouncer, handled } = setup();

    debouncer.intake(REPORT);
    await vi.advanceTimersByTimeAsync(900);
    debouncer.intake(REPORT);
    expect(debouncer.getPending(REPORT)).toEqual({ path: REPORT, firstSeenAt: 0, lastSeenAt: 900 });

    await vi.advanceTimersByTimeAsync(999);
    await settle();
    expect(handled).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    await settle();
    expect(handled).toHaveLength(1);
  });

  it("hands off again for an edit after the previous version", async () => {
    const { debouncer, handled } = setup();

    debouncer.intake(REPORT);
    await vi.advanceTimersByTimeAsync(1000);
    await settle();
    debouncer.intake(REPORT);
    await vi.advanceTimersByTimeAsync(1000);
    await settle();

    expect(handled.map((h) => h.change.firstSeenAt)).toEqual([0, 1000]);
  });

  it("discards a change whose file is removed before quiescence", async () => {
    const { debouncer, handled } = setup();

    debouncer.intake(REPORT);
    await vi.advanceTimersByTimeAsync(500);
    expect(debouncer.discard(REPORT)).toBe(true);
    expect(debouncer.discard(REPORT)).toBe(false);

    await vi.advanceTimersByTimeAsync(5000);
    await settle();
    expect(handled).toHaveLength(0);
    expect(debouncer.pendingCount).toBe(0);
  });

  it("drops the change when the file is gone at quiescence", async () => {
    const { debouncer, handled, probe } = setup();

    debouncer.intake(REPORT);
    probe.files.delete(REPORT);
    await vi.advanceTimersByTimeAsync(1000);
    await settle();

    expect(handled).toHaveLength(0);
    expect(debouncer.pendingCount).toBe(0);
  });

  it("restarts the window when size or mtime moves between the two samples", async () => {
    const { debouncer, handled, probe } = setup({ stabilityProbeMs: 100 });

    debouncer.intake(REPORT);
    await vi.advanceTimersByTimeAsync(1050); // first sample taken at t=1000
    await settle();
    probe.set(REPORT, 25, 2); // write without an event
    await vi.advanceTimersByTimeAsync(50); // second sample at t=1100 differs
    await settle();
    expect(handled).toHaveLength(0);
    expect(debouncer.getPending(REPORT)?.lastSeenAt).toBe(1100);

    await vi.advanceTimersByTimeAsync(1099); // t=2199, second probe pending until 2200
    await settle();
    expect(handled).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    await settle();
    expect(handled).toHaveLength(1);
  });

  it("abandons a stability check overtaken by a new event", async () => {
    const { debouncer, handled } = setup({ stabilityProbeMs: 100 });

    debouncer.intake(REPORT);
    await vi.advanceTimersByTimeAsync(1050); // probing
    await settle();
    debouncer.intake(REPORT); // t=1050
    await vi.advanceTimersByTimeAsync(50);
    await settle();
    expect(handled).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(949); // t=2049
    await settle();
    expect(handled).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1); // window elapses at t=2050, probe starts
    await settle();
    await vi.advanceTimersByTimeAsync(100);
    await settle();
    expect(handled).toHaveLength(1);
    expect(handled[0].change.lastSeenAt).toBe(1050);
  });

  it("keeps at most one hand-off per path in flight", async () => {
    const first = deferred();
    const calls: number[] = [];
    const { debouncer } = setup({
      onQuiescent: async (_path, change) => {
        calls.push(change.firstSeenAt);
        if (calls.length === 1) await first.promise;
      },
    });

    debouncer.intake(REPORT);
    await vi.advanceTimersByTimeAsync(1000);
    await settle();
    expect(calls).toEqual([0]);

    debouncer.intake(REPORT); // t=1000, while the first write is running
    await vi.advanceTimersByTimeAsync(1000);
    await settle();
    expect(calls).toEqual([0]);
    expect(debouncer.inFlightCount).toBe(1);

    first.resolve();
    await settle();
    expect(calls).toEqual([0, 1000]);
    await settle();
    expect(debouncer.inFlightCount).toBe(0);
  });

  it("does not hold other paths behind a slow write", async () => {
    const slow = deferred();
    const calls: string[] = [];
    const { debouncer } = setup({
      onQuiescent: async (path) => {
        calls.push(path);
        if (path === REPORT) await slow.promise;
      },
    });

    debouncer.intake(REPORT);
    await vi.advanceTimersByTimeAsync(500);
    debouncer.intake(INVOICE);
    await vi.advanceTimersByTimeAsync(1000);
    await settle();

    expect(calls).toEqual([REPORT, INVOICE]);
    slow.resolve();
  });

  it("reports handler failures and keeps going", async () => {
    const { debouncer, errors } = setup({
      onQuiescent: async (path) => {
        if (path === REPORT) throw new Error("disk full");
      },
    });

    debouncer.intake(REPORT);
    debouncer.intake(INVOICE);
    await vi.advanceTimersByTimeAsync(1000);
    await settle();

    expect(errors).toHaveLength(1);
    expect(errors[0].path).toBe(REPORT);
    expect(String(errors[0].err)).toBe("Error: disk full");
    expect(debouncer.inFlightCount).toBe(0);
  });

  describe("drain", () => {
    it("waits for in-flight writes and drops changes still settling", async () => {
      const write = deferred();
      const { debouncer } = setup({ onQuiescent: () => write.promise });

      debouncer.intake(REPORT);
      await vi.advanceTimersByTimeAsync(1000);
      await settle();
      debouncer.intake(INVOICE);

      const draining = debouncer.drain(500);
      write.resolve();
      await expect(draining).resolves.toEqual({ completed: true, abandonedWrites: 0, droppedPending: 1 });

      debouncer.intake(REPORT);
      expect(debouncer.pendingCount).toBe(0);
    });

    it("gives up on writes that outlast the grace period", async () => {
      const { debouncer } = setup({ onQuiescent: () => new Promise<void>(() => undefined) });

      debouncer.intake(REPORT);
      await vi.advanceTimersByTimeAsync(1000);
      await settle();

      const draining = debouncer.drain(500);
      await vi.advanceTimersByTimeAsync(500);
      await expect(draining).resolves.toEqual({ completed: false, abandonedWrites: 1, droppedPending: 0 });
    });

    it("returns at once when nothing is running", async () => {
      const { debouncer } = setup();
      await expect(debouncer.drain(500)).resolves.toEqual({ completed: true, abandonedWrites: 0, droppedPending: 0 });
    });
  });
});
