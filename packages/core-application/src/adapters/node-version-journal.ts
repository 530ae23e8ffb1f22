import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { VersionRef } from "@autoversion/core-domain";
import type { VersionJournal } from "../ports/version-journal";
import { errorCode } from "../application/errors";

const JournalLineSchema = z.object({
  sourcePath: z.string().min(1),
  // lines written before copies were filed under another name carry none
  versionName: z.string().min(1).optional(),
  versionPath: z.string().min(1),
  token: z.string().regex(/^\d{8}T\d{9}Z$/),
  suffix: z.number().int().nonnegative(),
  sizeBytes: z.number().int().nonnegative(),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  createdAtIso: z.string().datetime(),
});

function parseLine(line: string): VersionRef | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    // torn line after a crash
    return null;
  }
  const parsed = JournalLineSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { versionName, ...rest } = parsed.data;
  return { ...rest, versionName: versionName ?? path.basename(rest.sourcePath) };
}

/** Append-only JSONL record of every version written, one file per UTC day. */
export class NodeVersionJournal implements VersionJournal {
  getBaseDir(versionRoot: string) {
    return path.join(versionRoot, ".autoversion", "journal");
  }

  async ensureStructure(versionRoot: string): Promise<void> {
    await fs.mkdir(this.getBaseDir(versionRoot), { recursive: true });
  }

  async append(versionRoot: string, ref: VersionRef): Promise<void> {
    await this.ensureStructure(versionRoot);

    const date = ref.createdAtIso.slice(0, 10); // YYYY-MM-DD
    const filePath = path.join(this.getBaseDir(versionRoot), `${date}.jsonl`);

    await fs.appendFile(filePath, JSON.stringify(ref) + "\n", "utf-8");
  }

  async readDay(versionRoot: string, date: string): Promise<VersionRef[]> {
    const filePath = path.join(this.getBaseDir(versionRoot), `${date}.jsonl`);
    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return [];
      throw err;
    }

    const refs: VersionRef[] = [];
    for (const line of content.split("\n")) {
      if (line.trim().length === 0) continue;
      const ref = parseLine(line);
      if (ref) refs.push(ref);
    }
    return refs;
  }
}
