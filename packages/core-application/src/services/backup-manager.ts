import type { GameInstall, OverlayEntry } from "@modlayer/core-domain";

import type { BackupContent, BackupStore } from "../ports/backup-store";
import type { Clock } from "../ports/clock";
import type { GameFiles } from "../ports/game-files";
import type { Logger } from "../ports/logger";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import { BackupIndex } from "../value-objects/backup-index";
import { comparePaths } from "../value-objects/rel-path";
import { BackupMissingError, PartialApplyFailureError } from "../application/errors";
import { createIoRunner, type IoRunner } from "../application/with-retry";
import { defaultIoRetryPolicy } from "../application/default-io-retry-policy";
import { sleep } from "../infra/sleep";

export type BackupManagerDeps = {
  files: GameFiles;
  store: BackupStore;
  clock: Clock;
  logger: Logger;
  retryPolicy?: RetryPolicy;
  sleeper?: Sleeper;
};

export type FullRestoreOutcome = {
  restored: string[];
  overlay: OverlayEntry[];
};

export class BackupManager {
  private readonly io: IoRunner;
  private readonly logger: Logger;

  constructor(private readonly deps: BackupManagerDeps) {
    this.io = createIoRunner(deps.retryPolicy ?? defaultIoRetryPolicy(), deps.sleeper ?? sleep);
    this.logger = deps.logger.child("backup");
  }

  /**
   * Captures the current on-disk state of relPath unless a backup already
   * exists. Returns true when something was captured.
   */
  async ensureCaptured(install: GameInstall, index: BackupIndex, relPath: string): Promise<boolean> {
    if (index.has(relPath)) return false;

    const { files, store, clock } = this.deps;
    const data = await files.read(install, relPath);
    const content: BackupContent = data
      ? { kind: "file", data }
      : { kind: "absent", existingDir: await files.deepestExistingDir(install, relPath) };

    const ref = await store.capture(install, relPath, content);
    index.add({ path: relPath, ref, capturedAtIso: clock.now().toISOString() });

    this.logger.debug("captured original", { path: relPath, kind: ref.kind });
    return true;
  }

  /** Puts the pristine content of relPath back, or deletes it if it never existed. */
  async restore(install: GameInstall, relPath: string): Promise<void> {
    const content = await this.deps.store.read(install, relPath);
    if (!content) throw new BackupMissingError(relPath);

    if (content.kind === "file") {
      await this.deps.files.write(install, relPath, content.data);
    } else {
      await this.deps.files.remove(install, relPath, content.existingDir);
    }
  }

  /**
   * Restores every backed-up path and every overlaid path. On success the
   * returned overlay is empty; otherwise the entries of the failed paths are
   * kept on the thrown error.
   */
  async fullRestore(
    install: GameInstall,
    index: BackupIndex,
    overlay: readonly OverlayEntry[]
  ): Promise<FullRestoreOutcome> {
    const paths = new Set<string>(index.entries().map((e) => e.path));
    for (const e of overlay) paths.add(e.path);

    const restored: string[] = [];
    const failed: string[] = [];
    let firstError: unknown;

    for (const relPath of [...paths].sort(comparePaths)) {
      try {
        await this.io(() => this.restore(install, relPath));
        restored.push(relPath);
      } catch (err) {
        failed.push(relPath);
        firstError ??= err;
        this.logger.error("restore failed", { path: relPath, error: err });
      }
    }

    if (failed.length > 0) {
      const remaining = overlay.filter((e) => failed.includes(e.path));
      throw new PartialApplyFailureError(failed, firstError, remaining);
    }

    this.logger.info("restored original game files", { count: restored.length });
    return { restored, overlay: [] };
  }

  /** Re-derives the index from the backup files on disk. */
  async rebuildIndex(install: GameInstall): Promise<BackupIndex> {
    return new BackupIndex(await this.deps.store.list(install));
  }

  async discardAll(install: GameInstall): Promise<void> {
    await this.deps.store.clear(install);
    this.logger.info("discarded all backups", { install: install.id });
  }
}
