import type { StoredVersion, VersionRef } from "@autoversion/core-domain";

export type VersionWriteOutcome =
  | { status: "written"; ref: VersionRef }
  | { status: "vanished" }
  | { status: "unchanged"; sha256: string };

export interface VersionWriter {
  /**
   * Files a version of `sourcePath` under `versionName` (default: its own base
   * name). Throws VersionWriteError for I/O failures other than the source
   * having disappeared.
   */
  writeVersion(sourcePath: string, versionName?: string): Promise<VersionWriteOutcome>;
  listVersions(sourcePath: string): Promise<StoredVersion[]>;
}
