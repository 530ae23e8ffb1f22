export type VersionToken = string;

export interface VersionRef {
  sourcePath: string;
  /** Name the version is filed under; differs from the source name for download copies. */
  versionName: string;
  versionPath: string;
  token: VersionToken;
  /** Disambiguation counter, 0 when the bare token was free. */
  suffix: number;
  sizeBytes: number;
  sha256: string;
  createdAtIso: string;
}

export interface StoredVersion {
  versionPath: string;
  token: VersionToken;
  suffix: number;
  sizeBytes: number;
}
