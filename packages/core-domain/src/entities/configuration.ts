import type { WatchTarget } from './watch-target';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface VersionConfig {
  targets: WatchTarget[];
  versionRoot: string;
  debounceMs: number;
  stabilityProbeMs: number;
  drainTimeoutMs: number;
  skipUnchanged: boolean;
  logLevel: LogLevel;
}
