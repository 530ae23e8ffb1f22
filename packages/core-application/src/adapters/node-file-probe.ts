import fs from "node:fs/promises";
import type { FileProbe, FileSample } from "../ports/file-probe";
import { errorCode } from "../application/errors";

const GONE = new Set(["ENOENT", "ENOTDIR"]);

export class NodeFileProbe implements FileProbe {
  async sample(absolutePath: string): Promise<FileSample | null> {
    try {
      const stat = await fs.stat(absolutePath);
      if (!stat.isFile()) return null;
      return { sizeBytes: stat.size, mtimeMs: stat.mtimeMs };
    } catch (err) {
      const code = errorCode(err);
      if (code && GONE.has(code)) return null;
      throw err;
    }
  }
}
