import { createHash } from "crypto";
import { createReadStream } from "fs";
import type { FileHasher, FileHash } from "../ports/file-hasher";

const ALGORITHM: FileHash["algorithm"] = "sha256";

export class NodeFileHasher implements FileHasher {
  async hashFile(absolutePath: string): Promise<FileHash> {
    return new Promise((resolve, reject) => {
      const hash = createHash(ALGORITHM);
      const stream = createReadStream(absolutePath);

      stream.on("data", (chunk) => hash.update(chunk));
      stream.on("error", reject);
      stream.on("end", () => {
        resolve({ algorithm: ALGORITHM, value: hash.digest("hex") });
      });
    });
  }

  hashBuffer(data: Buffer): FileHash {
    return { algorithm: ALGORITHM, value: createHash(ALGORITHM).update(data).digest("hex") };
  }
}
