import chokidar from "chokidar";
import type { FSWatcher } from "chokidar";
import fs from "fs/promises";
import path from "path";
import { errorCode } from "../application/errors";
import type {
  FileWatcher,
  FileWatcherOptions,
  FileChangeEvent,
  FileChangeType,
} from "../ports/file-watcher";

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export type WatchFunction = typeof chokidar.watch;

export class ChokidarFileWatcher implements FileWatcher {
  private watcher: FSWatcher | null = null;
  private handler: ((event: FileChangeEvent) => void) | null = null;
  private errorHandler: ((error: Error) => void) | null = null;
  private rootLost = false;
  private checkingRoot = false;
  private recheckRoot = false;

  constructor(private readonly watch: WatchFunction = chokidar.watch) {}

  onEvent(handler: (event: FileChangeEvent) => void): void {
    this.handler = handler;
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandler = handler;
  }

  /**
   * Resolves once the initial scan is done. Rejects when the folder is missing
   * or not a directory, or when the scan fails.
   */
  async start(options: FileWatcherOptions): Promise<void> {
    if (this.watcher) return;

    const rootDir = path.resolve(options.rootDir);
    // chokidar waits silently for a missing root to appear
    const stat = await fs.stat(rootDir);
    if (!stat.isDirectory()) throw new Error(`${rootDir} is not a directory`);

    // Quiescence is decided by the debouncer, so no awaitWriteFinish here:
    // raw change events are what restarts its window.
    const watcher = this.watch(rootDir, {
      persistent: true,
      ignoreInitial: true,
      depth: options.recursive ? undefined : 0,
      ignored: (p: string) => options.ignore(path.resolve(p)),
    });
    this.watcher = watcher;
    this.rootLost = false;

    const emit = (type: FileChangeType, filePath: string) => {
      if (!this.handler) return;

      this.handler({
        type,
        path: path.resolve(filePath),
        occurredAt: new Date(),
      });
    };

    watcher
      .on("add", (p: string) => emit("created", p))
      .on("change", (p: string) => emit("modified", p))
      .on("unlink", (p: string) => emit("removed", p))
      .on("unlinkDir", (p: string) => {
        if (path.resolve(p) === rootDir) this.reportRootLost(rootDir);
      })
      // chokidar does not always report the root itself going away, so any
      // rename below it is a cue to look
      .on("raw", (event: string) => {
        if (event === "rename") this.checkRoot(rootDir);
      });

    try {
      await new Promise<void>((resolve, reject) => {
        const onStartError = (err: unknown) => reject(toError(err));
        watcher.once("error", onStartError);
        watcher.once("ready", () => {
          watcher.off("error", onStartError);
          resolve();
        });
      });
    } catch (err) {
      await this.stop();
      throw err;
    }

    watcher.on("error", (err: unknown) => {
      this.errorHandler?.(toError(err));
    });
  }

  private checkRoot(rootDir: string): void {
    if (this.checkingRoot) {
      this.recheckRoot = true;
      return;
    }
    this.checkingRoot = true;

    void fs.stat(rootDir)
      .then(
        (stat) => stat.isDirectory(),
        (err: unknown) => {
          if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") return false;
          throw err;
        }
      )
      .then((present) => {
        if (!present) this.reportRootLost(rootDir);
      })
      .catch((err: unknown) => this.errorHandler?.(toError(err)))
      .finally(() => {
        this.checkingRoot = false;
        if (this.recheckRoot && this.watcher) {
          this.recheckRoot = false;
          this.checkRoot(rootDir);
        }
      });
  }

  /** The folder was deleted or unmounted: nothing below it is watched any more. */
  private reportRootLost(rootDir: string): void {
    if (this.rootLost || !this.watcher) return;
    this.rootLost = true;
    this.errorHandler?.(new Error(`watched folder removed: ${rootDir}`));
  }

  async stop(): Promise<void> {
    if (!this.watcher) return;
    await this.watcher.close();
    this.watcher = null;
  }
}
