import type { BackupEntry, BackupRef, GameInstall } from "@modlayer/core-domain";

export type BackupContent =
  | { kind: "file"; data: Buffer }
  // existingDir: deepest ancestor directory that existed, kept when the path is removed again
  | { kind: "absent"; existingDir: string };

/**
 * Durable pristine copies of game files. What this store holds on disk is the
 * source of truth; the manifest's backup index is a cache of list().
 */
export interface BackupStore {
  read(install: GameInstall, relPath: string): Promise<BackupContent | null>;
  /** Stores content for a path that has none yet; an existing backup is kept as is. */
  capture(install: GameInstall, relPath: string, content: BackupContent): Promise<BackupRef>;
  list(install: GameInstall): Promise<BackupEntry[]>;
  clear(install: GameInstall): Promise<void>;
}
