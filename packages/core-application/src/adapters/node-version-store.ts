import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";

import type { StoredVersion, VersionRef } from "@autoversion/core-domain";
import type { VersionWriter, VersionWriteOutcome } from "../ports/version-writer";
import type { FileHasher } from "../ports/file-hasher";
import { systemClock, type Clock } from "../ports/clock";
import { VersionWriteError, errorCode } from "../application/errors";
import {
  compareVersionSlots,
  nextVersionSlot,
  parseVersionFileName,
  versionFileName,
  type VersionSlot,
} from "../services/version-token";
import { NodeFileHasher } from "./node-file-hasher";

// the source went away between quiescence and the snapshot read
const VANISHED = new Set(["ENOENT", "ENOTDIR", "EISDIR"]);
// filesystems that cannot hard-link fall back to rename
const NO_LINK = new Set(["EPERM", "ENOTSUP", "EOPNOTSUPP", "EXDEV", "ENOSYS"]);
const MAX_SUFFIX = 10_000;

export type NodeVersionStoreOptions = {
  versionRoot: string;
  skipUnchanged?: boolean;
  clock?: Clock;
  hasher?: FileHasher;
};

async function exists(p: string) {
  try {
    await fs.stat(p);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return false;
    throw err;
  }
}

/**
 * Writes versions under `<versionRoot>/<source folder mirrored>/<name>.<token>[-n]`.
 *
 * The source is read whole before anything is written, the bytes land in a
 * temp file next to the final name, and the final name is claimed with a hard
 * link (atomic, never clobbers). A listing of the version directory therefore
 * only ever shows complete files under version names.
 */
export class NodeVersionStore implements VersionWriter {
  private readonly versionRoot: string;
  private readonly skipUnchanged: boolean;
  private readonly clock: Clock;
  private readonly hasher: FileHasher;

  private readonly lastSlot = new Map<string, VersionSlot>();
  private readonly lastHash = new Map<string, string>();

  constructor(options: NodeVersionStoreOptions) {
    this.versionRoot = path.resolve(options.versionRoot);
    this.skipUnchanged = options.skipUnchanged ?? false;
    this.clock = options.clock ?? systemClock;
    this.hasher = options.hasher ?? new NodeFileHasher();
  }

  /** Directory holding the versions of `sourcePath`. */
  versionDirFor(sourcePath: string): string {
    const folder = path.dirname(path.resolve(sourcePath));
    const { root } = path.parse(folder);
    // keep the drive letter on Windows so C:\x and D:\x stay apart
    const drive = root.replace(/[:\\/]/g, "");
    return path.join(this.versionRoot, drive, folder.slice(root.length));
  }

  async writeVersion(sourcePath: string, versionName?: string): Promise<VersionWriteOutcome> {
    const source = path.resolve(sourcePath);
    const baseName = versionName ?? path.basename(source);
    if (baseName !== path.basename(baseName) || baseName === "" || baseName === "." || baseName === "..") {
      throw new VersionWriteError(`Version name "${baseName}" must be a plain file name`, source);
    }

    let data: Buffer;
    try {
      data = await fs.readFile(source);
    } catch (err) {
      const code = errorCode(err);
      if (code && VANISHED.has(code)) return { status: "vanished" };
      throw new VersionWriteError(`Cannot read ${source}`, source, err);
    }

    const hash = this.hasher.hashBuffer(data);
    const dir = this.versionDirFor(source);
    // copies filed under another name share that name's history
    const key = path.join(dir, baseName);

    try {
      if (this.skipUnchanged && (await this.latestHash(dir, baseName)) === hash.value) {
        return { status: "unchanged", sha256: hash.value };
      }

      await fs.mkdir(dir, { recursive: true });

      const start = nextVersionSlot(this.clock.now(), await this.latestSlot(dir, baseName));
      const tmp = path.join(dir, `.${baseName}.${crypto.randomUUID()}.tmp`);
      await fs.writeFile(tmp, data, { flag: "wx" });

      let published: { versionPath: string; slot: VersionSlot };
      try {
        published = await this.publish(tmp, dir, baseName, start);
      } finally {
        await fs.rm(tmp, { force: true });
      }

      this.lastSlot.set(key, published.slot);
      this.lastHash.set(key, hash.value);

      const ref: VersionRef = {
        sourcePath: source,
        versionName: baseName,
        versionPath: published.versionPath,
        token: published.slot.token,
        suffix: published.slot.suffix,
        sizeBytes: data.length,
        sha256: hash.value,
        createdAtIso: new Date(this.clock.now()).toISOString(),
      };
      return { status: "written", ref };
    } catch (err) {
      if (err instanceof VersionWriteError) throw err;
      throw new VersionWriteError(`Cannot write version of ${source} into ${dir}`, source, err);
    }
  }

  async listVersions(sourcePath: string): Promise<StoredVersion[]> {
    const source = path.resolve(sourcePath);
    return this.listStored(this.versionDirFor(source), path.basename(source));
  }

  private async listStored(dir: string, baseName: string): Promise<StoredVersion[]> {
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (err) {
      if (errorCode(err) === "ENOENT") return [];
      throw err;
    }

    const found: Array<{ name: string; slot: VersionSlot }> = [];
    for (const name of names) {
      const slot = parseVersionFileName(baseName, name);
      if (slot) found.push({ name, slot });
    }
    found.sort((a, b) => compareVersionSlots(a.slot, b.slot));

    const versions: StoredVersion[] = [];
    for (const { name, slot } of found) {
      const versionPath = path.join(dir, name);
      const stat = await fs.stat(versionPath);
      versions.push({ versionPath, token: slot.token, suffix: slot.suffix, sizeBytes: stat.size });
    }
    return versions;
  }

  private async latestSlot(dir: string, baseName: string): Promise<VersionSlot | null> {
    const known = this.lastSlot.get(path.join(dir, baseName));
    if (known) return known;

    // first write under this name in this process: continue after what is on disk
    const stored = await this.listStored(dir, baseName);
    const latest = stored.at(-1);
    return latest ? { token: latest.token, suffix: latest.suffix } : null;
  }

  private async latestHash(dir: string, baseName: string): Promise<string | null> {
    const key = path.join(dir, baseName);
    const known = this.lastHash.get(key);
    if (known) return known;

    const latest = (await this.listStored(dir, baseName)).at(-1);
    if (!latest) return null;

    const hash = await this.hasher.hashFile(latest.versionPath);
    this.lastHash.set(key, hash.value);
    return hash.value;
  }

  private async publish(
    tmp: string,
    dir: string,
    baseName: string,
    start: VersionSlot
  ): Promise<{ versionPath: string; slot: VersionSlot }> {
    for (let suffix = start.suffix; suffix < start.suffix + MAX_SUFFIX; suffix++) {
      const slot: VersionSlot = { token: start.token, suffix };
      const versionPath = path.join(dir, versionFileName(baseName, slot));

      try {
        await fs.link(tmp, versionPath);
        return { versionPath, slot };
      } catch (err) {
        const code = errorCode(err);
        if (code === "EEXIST") continue;
        if (code && NO_LINK.has(code)) return this.publishByRename(tmp, dir, baseName, slot);
        throw err;
      }
    }
    throw new Error(`No free version name for ${baseName} at ${start.token}`);
  }

  private async publishByRename(
    tmp: string,
    dir: string,
    baseName: string,
    start: VersionSlot
  ): Promise<{ versionPath: string; slot: VersionSlot }> {
    for (let suffix = start.suffix; suffix < start.suffix + MAX_SUFFIX; suffix++) {
      const slot: VersionSlot = { token: start.token, suffix };
      const versionPath = path.join(dir, versionFileName(baseName, slot));
      if (await exists(versionPath)) continue;

      await fs.rename(tmp, versionPath);
      return { versionPath, slot };
    }
    throw new Error(`No free version name for ${baseName} at ${start.token}`);
  }
}
