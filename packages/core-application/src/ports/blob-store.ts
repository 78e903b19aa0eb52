import type { GameInstall } from "@modlayer/core-domain";

/** Content-addressed storage for mod file contents, keyed by sha256. */
export interface BlobStore {
  has(install: GameInstall, sha256: string): Promise<boolean>;
  put(install: GameInstall, sha256: string, data: Buffer): Promise<void>;
  get(install: GameInstall, sha256: string): Promise<Buffer>;
  delete(install: GameInstall, sha256: string): Promise<void>;
}
