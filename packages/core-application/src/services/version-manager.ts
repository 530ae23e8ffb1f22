import type { PendingChange, VersionConfig, WatchTarget } from "@autoversion/core-domain";
import type { FileChangeEvent, FileWatcher, FileWatcherFactory } from "../ports/file-watcher";
import type { FileProbe } from "../ports/file-probe";
import { silentLogger, type Logger } from "../ports/logger";
import type { VersionJournal } from "../ports/version-journal";
import type { VersionWriter, VersionWriteOutcome } from "../ports/version-writer";
import { systemClock, type Clock } from "../ports/clock";
import { WatchStartError, describeError } from "../application/errors";
import { createWatchIgnore } from "../adapters/watch-ignore";
import { ChangeDebouncer, type DrainResult } from "./change-debouncer";
import { matchTrackedFile } from "./path-filter";

export type VersionManagerDeps = {
  watcherFactory: FileWatcherFactory;
  /** Built per configuration, since the version root may change on reload. */
  writerFactory: (config: VersionConfig) => VersionWriter;
  probe: FileProbe;
  logger?: Logger;
  journal?: VersionJournal;
  clock?: Clock;
  /** Called when watch errors have taken down every configured folder. */
  onAllTargetsLost?: () => void;
};

export type VersionManagerStatus = {
  running: boolean;
  watchedFolders: string[];
  failedFolders: string[];
  pending: number;
  inFlight: number;
  versionsWritten: number;
  writeFailures: number;
};

type Session = {
  config: VersionConfig;
  debouncer: ChangeDebouncer;
  watchers: Map<WatchTarget, FileWatcher>;
  failedFolders: Set<string>;
};

const IDLE_DRAIN: DrainResult = { completed: true, abandonedWrites: 0, droppedPending: 0 };

/**
 * Owns one watch session at a time: a watcher per target feeding the path
 * filter and debouncer, with quiescent paths handed to the version writer.
 * A configuration change is a full stop and a fresh start.
 */
export class VersionManager {
  private session: Session | null = null;
  private versionsWritten = 0;
  private writeFailures = 0;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(private readonly deps: VersionManagerDeps) {
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? silentLogger;
  }

  get running(): boolean {
    return this.session !== null;
  }

  async start(config: VersionConfig): Promise<void> {
    if (this.session) throw new Error("VersionManager is already running");

    const log = this.log;
    const writer = this.deps.writerFactory(config);
    const debouncer = new ChangeDebouncer({
      debounceMs: config.debounceMs,
      stabilityProbeMs: config.stabilityProbeMs,
      probe: this.deps.probe,
      clock: this.clock,
      onQuiescent: (path, change) => this.version(writer, config, path, change),
      onError: (err, path) => log.error("change processing failed", { path, error: describeError(err) }),
    });

    const session: Session = {
      config,
      debouncer,
      watchers: new Map(),
      failedFolders: new Set(),
    };
    this.session = session;

    try {
      for (const target of config.targets) {
        await this.watch(session, target);
      }
    } catch (err) {
      this.session = null;
      await this.closeWatchers(session);
      throw err;
    }

    log.info("watching folders", {
      folders: config.targets.map((t) => t.folder),
      versionRoot: config.versionRoot,
      debounceMs: config.debounceMs,
    });
  }

  /** Closes every watcher, then waits for in-flight writes up to `graceMs`. */
  async stop(graceMs?: number): Promise<DrainResult> {
    const session = this.session;
    if (!session) return IDLE_DRAIN;
    this.session = null;

    await this.closeWatchers(session);
    const result = await session.debouncer.drain(graceMs ?? session.config.drainTimeoutMs);

    if (result.completed) {
      this.log.info("stopped", { droppedPending: result.droppedPending });
    } else {
      this.log.warn("stopped with writes still running", {
        abandonedWrites: result.abandonedWrites,
        droppedPending: result.droppedPending,
      });
    }
    return result;
  }

  async reload(config: VersionConfig): Promise<void> {
    await this.stop();
    await this.start(config);
    this.log.info("configuration reloaded");
  }

  status(): VersionManagerStatus {
    const session = this.session;
    return {
      running: session !== null,
      watchedFolders: session ? [...session.watchers.keys()].map((t) => t.folder) : [],
      failedFolders: session ? [...session.failedFolders] : [],
      pending: session?.debouncer.pendingCount ?? 0,
      inFlight: session?.debouncer.inFlightCount ?? 0,
      versionsWritten: this.versionsWritten,
      writeFailures: this.writeFailures,
    };
  }

  private async watch(session: Session, target: WatchTarget): Promise<void> {
    const log = this.log.child({ folder: target.folder });
    const watcher = this.deps.watcherFactory();
    watcher.onEvent((event) => this.handleEvent(session, event));
    watcher.onError((err) => {
      void this.handleWatchFailure(session, target, watcher, err, log);
    });

    try {
      await watcher.start({
        rootDir: target.folder,
        recursive: target.recursive,
        ignore: createWatchIgnore(target, session.config.versionRoot),
      });
    } catch (err) {
      await this.closeWatcher(watcher, log);
      throw new WatchStartError(`Cannot watch folder ${target.folder}: ${describeError(err)}`, target.folder, err);
    }

    session.watchers.set(target, watcher);
    log.info("watching folder", {
      patterns: target.patterns,
      recursive: target.recursive,
      downloadCopies: target.downloadCopies,
    });
  }

  private handleEvent(session: Session, event: FileChangeEvent): void {
    if (this.session !== session) return;

    const tracked = matchTrackedFile(event.path, session.config);
    if (!tracked) return;

    if (event.type === "removed") {
      if (session.debouncer.discard(event.path)) {
        this.log.info("pending change discarded, file removed", { path: event.path });
      }
      return;
    }

    this.log.debug("event matched", {
      path: event.path,
      type: event.type,
      folder: tracked.target.folder,
      versionName: tracked.versionName,
    });
    session.debouncer.intake(event.path);
  }

  private async version(
    writer: VersionWriter,
    config: VersionConfig,
    path: string,
    change: PendingChange
  ): Promise<void> {
    const log = this.log;

    // the configuration is fixed for the session, so the match made at intake still holds
    const versionName = matchTrackedFile(path, config)?.versionName;

    let outcome: VersionWriteOutcome;
    try {
      outcome = await writer.writeVersion(path, versionName);
    } catch (err) {
      this.writeFailures++;
      log.error("version write failed", { path, error: describeError(err) });
      return;
    }

    if (outcome.status === "vanished") {
      log.info("file vanished before it could be versioned", { path });
      return;
    }
    if (outcome.status === "unchanged") {
      log.info("version skipped, content unchanged", { path, sha256: outcome.sha256 });
      return;
    }

    const ref = outcome.ref;
    this.versionsWritten++;
    log.info("version written", {
      path,
      versionName: ref.versionName,
      token: ref.token,
      suffix: ref.suffix,
      versionPath: ref.versionPath,
      sizeBytes: ref.sizeBytes,
      burstMs: change.lastSeenAt - change.firstSeenAt,
    });

    if (!this.deps.journal) return;
    try {
      await this.deps.journal.append(config.versionRoot, ref);
    } catch (err) {
      log.warn("version journal append failed", { path, versionPath: ref.versionPath, error: describeError(err) });
    }
  }

  private async handleWatchFailure(
    session: Session,
    target: WatchTarget,
    watcher: FileWatcher,
    err: Error,
    log: Logger
  ) {
    if (session.watchers.get(target) !== watcher) return;

    session.watchers.delete(target);
    session.failedFolders.add(target.folder);
    log.error("folder watch failed, folder is no longer monitored", { error: describeError(err) });

    await this.closeWatcher(watcher, log);

    if (this.session === session && session.watchers.size === 0) {
      this.log.error("no configured folder is being watched any more");
      this.deps.onAllTargetsLost?.();
    }
  }

  private async closeWatchers(session: Session): Promise<void> {
    const entries = [...session.watchers.entries()];
    session.watchers.clear();
    await Promise.all(
      entries.map(([target, watcher]) => this.closeWatcher(watcher, this.log.child({ folder: target.folder })))
    );
  }

  private async closeWatcher(watcher: FileWatcher, log: Logger): Promise<void> {
    try {
      await watcher.stop();
    } catch (err) {
      log.warn("watcher did not close cleanly", { error: describeError(err) });
    }
  }
}
