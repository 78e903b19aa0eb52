import type { GameInstall } from "@modlayer/core-domain";

/** File operations on the game directory, addressed by relative posix path. */
export interface GameFiles {
  /** Returns null when the path does not exist. */
  read(install: GameInstall, relPath: string): Promise<Buffer | null>;
  write(install: GameInstall, relPath: string, data: Buffer): Promise<void>;
  /**
   * Removes the file, then every directory above it that is left empty, up to
   * (not including) keepDir. Missing files are fine.
   */
  remove(install: GameInstall, relPath: string, keepDir?: string): Promise<void>;
  /** Relative path of the deepest ancestor directory of relPath that exists ("" for the root). */
  deepestExistingDir(install: GameInstall, relPath: string): Promise<string>;
}
