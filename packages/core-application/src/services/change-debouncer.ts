import type { PendingChange } from "@autoversion/core-domain";
import { systemClock, type Clock } from "../ports/clock";
import type { FileProbe, FileSample } from "../ports/file-probe";

export type QuiescentHandler = (path: string, change: PendingChange) => Promise<void>;

export type ChangeDebouncerOptions = {
  debounceMs: number;
  /** Gap between the two size/mtime samples of a quiescence check. 0 samples once. */
  stabilityProbeMs?: number;
  probe: FileProbe;
  onQuiescent: QuiescentHandler;
  onError?: (err: unknown, path: string) => void;
  clock?: Clock;
};

export type DrainResult = {
  completed: boolean;
  abandonedWrites: number;
  droppedPending: number;
};

type Entry = {
  change: PendingChange;
  timer: NodeJS.Timeout | null;
  // bumped on every event so an in-progress check can tell it was overtaken
  generation: number;
};

const DEFAULT_STABILITY_PROBE_MS = 100;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function sameSample(a: FileSample, b: FileSample): boolean {
  return a.sizeBytes === b.sizeBytes && a.mtimeMs === b.mtimeMs;
}

/**
 * Turns bursts of events per path into one hand-off once the file has been
 * idle for the debounce window and its size/mtime held still across a probe.
 *
 * All table mutations happen on the event loop, so intake and timer callbacks
 * never interleave inside a critical section. A check that awaits the probe
 * re-validates the entry generation before acting on its result.
 */
export class ChangeDebouncer {
  private readonly pending = new Map<string, Entry>();
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly debounceMs: number;
  private readonly stabilityProbeMs: number;
  private readonly clock: Clock;
  private accepting = true;

  constructor(private readonly options: ChangeDebouncerOptions) {
    this.debounceMs = Math.max(1, Math.floor(options.debounceMs));
    this.stabilityProbeMs = Math.max(0, Math.floor(options.stabilityProbeMs ?? DEFAULT_STABILITY_PROBE_MS));
    this.clock = options.clock ?? systemClock;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  getPending(path: string): PendingChange | null {
    const entry = this.pending.get(path);
    return entry ? { ...entry.change } : null;
  }

  intake(path: string): void {
    if (!this.accepting) return;

    const now = this.clock.now();
    const existing = this.pending.get(path);

    if (existing) {
      existing.change.lastSeenAt = now;
      existing.generation++;
      this.arm(path, existing, this.debounceMs);
      return;
    }

    const entry: Entry = {
      change: { path, firstSeenAt: now, lastSeenAt: now },
      timer: null,
      generation: 0,
    };
    this.pending.set(path, entry);
    this.arm(path, entry, this.debounceMs);
  }

  /** Drops the pending change for `path`. Returns false when nothing was pending. */
  discard(path: string): boolean {
    const entry = this.pending.get(path);
    if (!entry) return false;

    if (entry.timer) clearTimeout(entry.timer);
    this.pending.delete(path);
    return true;
  }

  /**
   * Stops intake, drops changes that have not reached quiescence and waits up
   * to `timeoutMs` for writes already handed off. Writes still running after
   * that are left to finish on their own.
   */
  async drain(timeoutMs: number): Promise<DrainResult> {
    this.accepting = false;

    const droppedPending = this.pending.size;
    for (const entry of this.pending.values()) {
      if (entry.timer) clearTimeout(entry.timer);
    }
    this.pending.clear();

    const writes = [...this.inFlight.values()];
    if (writes.length === 0) {
      return { completed: true, abandonedWrites: 0, droppedPending };
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), Math.max(0, timeoutMs));
    });
    const finished = Promise.all(writes).then(() => "done" as const);

    const outcome = await Promise.race([finished, timedOut]);
    clearTimeout(timer);

    if (outcome === "done") {
      return { completed: true, abandonedWrites: 0, droppedPending };
    }
    return { completed: false, abandonedWrites: this.inFlight.size, droppedPending };
  }

  private arm(path: string, entry: Entry, delayMs: number): void {
    if (entry.timer) clearTimeout(entry.timer);
    entry.timer = setTimeout(() => {
      entry.timer = null;
      void this.check(path, entry);
    }, delayMs);
  }

  private isCurrent(path: string, entry: Entry): boolean {
    return this.accepting && this.pending.get(path) === entry;
  }

  private async check(path: string, entry: Entry): Promise<void> {
    try {
      if (!this.isCurrent(path, entry)) return;

      const idleMs = this.clock.now() - entry.change.lastSeenAt;
      if (idleMs < this.debounceMs) {
        this.arm(path, entry, this.debounceMs - idleMs);
        return;
      }

      const generation = entry.generation;
      const before = await this.options.probe.sample(path);
      let after = before;
      if (before && this.stabilityProbeMs > 0) {
        await delay(this.stabilityProbeMs);
        after = await this.options.probe.sample(path);
      }

      // a newer event re-armed the timer, or the path was discarded meanwhile
      if (!this.isCurrent(path, entry) || entry.generation !== generation) return;

      if (!before || !after) {
        this.pending.delete(path);
        return;
      }

      if (!sameSample(before, after)) {
        entry.change.lastSeenAt = this.clock.now();
        entry.generation++;
        this.arm(path, entry, this.debounceMs);
        return;
      }

      this.pending.delete(path);
      this.dispatch(path, entry.change);
    } catch (err) {
      if (this.pending.get(path) === entry) this.pending.delete(path);
      this.reportError(err, path);
    }
  }

  private dispatch(path: string, change: PendingChange): void {
    const previous = this.inFlight.get(path);

    const run = async () => {
      // one write per path: the next cycle waits for the one still running
      if (previous) await previous;
      try {
        await this.options.onQuiescent(path, change);
      } catch (err) {
        this.reportError(err, path);
      }
    };

    const current: Promise<void> = run().finally(() => {
      if (this.inFlight.get(path) === current) this.inFlight.delete(path);
    });
    this.inFlight.set(path, current);
  }

  private reportError(err: unknown, path: string): void {
    this.options.onError?.(err, path);
  }
}
