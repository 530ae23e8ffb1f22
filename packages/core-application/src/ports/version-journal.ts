import type { VersionRef } from "@autoversion/core-domain";

export interface VersionJournal {
  ensureStructure(versionRoot: string): Promise<void>;
  append(versionRoot: string, ref: VersionRef): Promise<void>;
}
