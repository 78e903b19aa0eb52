import fs from "node:fs/promises";
import path from "node:path";

import type { GameInstall } from "@modlayer/core-domain";
import type { BlobStore } from "../ports/blob-store";
import { writeFileAtomic } from "../infra/write-file-atomic";

export class NodeBlobStore implements BlobStore {
  private blobsDir(install: GameInstall) {
    return path.join(install.stateDir, "blobs");
  }

  private blobPath(install: GameInstall, sha256: string) {
    if (!/^[a-f0-9]{64}$/.test(sha256)) throw new Error(`Invalid blob key: ${sha256}`);
    return path.join(this.blobsDir(install), sha256);
  }

  async has(install: GameInstall, sha256: string): Promise<boolean> {
    try {
      await fs.stat(this.blobPath(install, sha256));
      return true;
    } catch {
      return false;
    }
  }

  async put(install: GameInstall, sha256: string, data: Buffer): Promise<void> {
    if (await this.has(install, sha256)) return;
    await writeFileAtomic(this.blobPath(install, sha256), data);
  }

  async get(install: GameInstall, sha256: string): Promise<Buffer> {
    return fs.readFile(this.blobPath(install, sha256));
  }

  async delete(install: GameInstall, sha256: string): Promise<void> {
    await fs.rm(this.blobPath(install, sha256), { force: true });
  }
}
