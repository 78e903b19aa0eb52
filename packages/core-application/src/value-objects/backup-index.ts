import type { BackupEntry } from "@modlayer/core-domain";
import { comparePaths } from "./rel-path";

/** In-memory view of the captured backups of one install, keyed by path. */
export class BackupIndex {
  private readonly byPath = new Map<string, BackupEntry>();

  constructor(entries: readonly BackupEntry[] = []) {
    for (const e of entries) this.byPath.set(e.path, e);
  }

  get size(): number {
    return this.byPath.size;
  }

  has(path: string): boolean {
    return this.byPath.has(path);
  }

  get(path: string): BackupEntry | undefined {
    return this.byPath.get(path);
  }

  /** First capture wins; later calls for the same path are ignored. */
  add(entry: BackupEntry): void {
    if (!this.byPath.has(entry.path)) this.byPath.set(entry.path, entry);
  }

  entries(): BackupEntry[] {
    return [...this.byPath.values()].sort((a, b) => comparePaths(a.path, b.path));
  }
}
