// Public API of the core-application package: ports, services and the Node
// adapters the daemon wires together.

// Ports (interfaces)
export * from "./ports/clock";
export * from "./ports/logger";
export type {
  FileChangeType,
  FileChangeEvent,
  FileWatcherOptions,
  FileWatcher,
  FileWatcherFactory,
} from "./ports/file-watcher";
export type { FileHash, FileHasher } from "./ports/file-hasher";
export type { FileProbe, FileSample } from "./ports/file-probe";
export type { VersionWriter, VersionWriteOutcome } from "./ports/version-writer";
export type { VersionJournal } from "./ports/version-journal";

// Application
export * from "./application/errors";
export * from "./application/exit-codes";
export * from "./application/config-schema";

// Services
export * from "./services/path-filter";
export * from "./services/version-token";
export * from "./services/change-debouncer";
export * from "./services/version-manager";

// Node adapters
export * from "./adapters/chokidar-file-watcher";
export * from "./adapters/watch-ignore";
export * from "./adapters/node-file-hasher";
export * from "./adapters/node-file-probe";
export * from "./adapters/node-version-store";
export * from "./adapters/node-version-journal";
export * from "./adapters/node-config-loader";
export * from "./adapters/pino-logger";
