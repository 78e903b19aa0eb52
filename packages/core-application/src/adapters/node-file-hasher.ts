import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import type { FileHasher, FileHash } from "../ports/file-hasher";

const ALGORITHM: FileHash["algorithm"] = "sha256";

/** SHA-256 of game files, backups and mod payload entries. */
export class NodeFileHasher implements FileHasher {
  async hashFile(absolutePath: string): Promise<FileHash> {
    const hash = createHash(ALGORITHM);
    // streamed: original game archives can be several GB
    await pipeline(createReadStream(absolutePath), hash);
    return { algorithm: ALGORITHM, value: hash.digest("hex") };
  }

  hashBuffer(data: Buffer): FileHash {
    return { algorithm: ALGORITHM, value: createHash(ALGORITHM).update(data).digest("hex") };
  }
}
