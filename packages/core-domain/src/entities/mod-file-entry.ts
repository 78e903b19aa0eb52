export type FileHash = string;

/** One file a mod declares, addressed by its path relative to the game root. */
export interface ModFileEntry {
  path: string;
  hash: FileHash;
  sizeBytes: number;
}
