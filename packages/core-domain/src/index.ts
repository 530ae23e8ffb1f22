export type { WatchTarget } from './entities/watch-target';
export type { PendingChange } from './entities/pending-change';
export type { VersionRef, VersionToken, StoredVersion } from './entities/version';
export type { VersionConfig, LogLevel } from './entities/configuration';
