export type FileChangeType = "created" | "modified" | "removed" | "renamed";

export type FileChangeEvent = {
  type: FileChangeType;
  path: string;
  occurredAt: Date;
};

export type FileWatcherOptions = {
  rootDir: string;
  recursive: boolean;
  ignore: (path: string) => boolean;
};

export interface FileWatcher {
  start(options: FileWatcherOptions): Promise<void>;
  stop(): Promise<void>;
  onEvent(handler: (event: FileChangeEvent) => void): void;
  onError(handler: (error: Error) => void): void;
}

export type FileWatcherFactory = () => FileWatcher;
