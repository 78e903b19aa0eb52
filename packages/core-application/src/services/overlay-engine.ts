import type { GameInstall, OverlayEntry } from "@modlayer/core-domain";

import type { BlobStore } from "../ports/blob-store";
import type { GameFiles } from "../ports/game-files";
import type { Logger } from "../ports/logger";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import type { BackupIndex } from "../value-objects/backup-index";
import { comparePaths } from "../value-objects/rel-path";
import { PartialApplyFailureError, UnrecoverableStateError } from "../application/errors";
import { createIoRunner, type IoRunner } from "../application/with-retry";
import { defaultIoRetryPolicy } from "../application/default-io-retry-policy";
import { sleep } from "../infra/sleep";
import type { BackupManager } from "./backup-manager";
import type { ResolvedSet } from "./conflict-detector";
import { planOverlay, type OverlayOp } from "./overlay-diff";

export type OverlayEngineDeps = {
  files: GameFiles;
  blobs: BlobStore;
  backups: BackupManager;
  logger: Logger;
  retryPolicy?: RetryPolicy;
  sleeper?: Sleeper;
};

export type ApplyOutcome = {
  overlay: OverlayEntry[];
  installed: string[];
  replaced: string[];
  reverted: string[];
  unchanged: string[];
};

export class OverlayEngine {
  private readonly io: IoRunner;
  private readonly logger: Logger;

  constructor(private readonly deps: OverlayEngineDeps) {
    this.io = createIoRunner(deps.retryPolicy ?? defaultIoRetryPolicy(), deps.sleeper ?? sleep);
    this.logger = deps.logger.child("overlay");
  }

  /**
   * Reconciles the game directory with target as one transaction. When an
   * operation fails, everything done by this call is undone before the error
   * is thrown, so the directory matches `current` again.
   */
  async apply(
    install: GameInstall,
    index: BackupIndex,
    current: readonly OverlayEntry[],
    target: ResolvedSet
  ): Promise<ApplyOutcome> {
    const plan = planOverlay(current, target);
    const overlay = new Map(current.map((e) => [e.path, e]));
    const journal: OverlayOp[] = [];

    this.logger.debug("plan", {
      install: install.id,
      ops: plan.ops.length,
      unchanged: plan.unchanged.length,
    });

    for (const op of plan.ops) {
      // journaled first: a failed write may still have replaced the file
      journal.push(op);
      try {
        await this.execute(install, index, op, overlay);
      } catch (err) {
        this.logger.warn("overlay operation failed, rolling back", {
          path: op.path,
          kind: op.kind,
          error: err,
        });
        await this.rollback(install, index, journal, current, err);
        throw new PartialApplyFailureError([op.path], err, [...current]);
      }
    }

    const outcome: ApplyOutcome = {
      overlay: [...overlay.values()].sort((a, b) => comparePaths(a.path, b.path)),
      installed: plan.ops.filter((o) => o.kind === "install").map((o) => o.path),
      replaced: plan.ops.filter((o) => o.kind === "replace").map((o) => o.path),
      reverted: plan.ops.filter((o) => o.kind === "revert").map((o) => o.path),
      unchanged: plan.unchanged.map((e) => e.path),
    };

    this.logger.info("overlay applied", {
      install: install.id,
      installed: outcome.installed.length,
      replaced: outcome.replaced.length,
      reverted: outcome.reverted.length,
      unchanged: outcome.unchanged.length,
    });
    return outcome;
  }

  private async execute(
    install: GameInstall,
    index: BackupIndex,
    op: OverlayOp,
    overlay: Map<string, OverlayEntry>
  ): Promise<void> {
    const { files, blobs, backups } = this.deps;

    switch (op.kind) {
      case "install": {
        await this.io(() => backups.ensureCaptured(install, index, op.path));
        const backup = index.get(op.path);
        if (!backup) throw new Error(`backup index lost ${op.path}`);

        const data = await this.io(() => blobs.get(install, op.hash));
        await this.io(() => files.write(install, op.path, data));
        overlay.set(op.path, { path: op.path, modId: op.modId, contentHash: op.hash, backupRef: backup.ref });
        return;
      }
      case "replace": {
        const data = await this.io(() => blobs.get(install, op.hash));
        await this.io(() => files.write(install, op.path, data));
        overlay.set(op.path, { ...op.previous, modId: op.modId, contentHash: op.hash });
        return;
      }
      case "revert": {
        await this.io(() => backups.restore(install, op.path));
        overlay.delete(op.path);
        return;
      }
    }
  }

  /** Undoes journaled operations newest first. */
  private async rollback(
    install: GameInstall,
    index: BackupIndex,
    journal: readonly OverlayOp[],
    current: readonly OverlayEntry[],
    cause: unknown
  ): Promise<void> {
    const { files, blobs, backups } = this.deps;
    const stuck = new Map<string, OverlayOp>();

    for (const op of [...journal].reverse()) {
      try {
        if (op.kind === "install") {
          // nothing was written if the capture itself never happened
          if (index.has(op.path)) await this.io(() => backups.restore(install, op.path));
        } else {
          const previous = op.previous;
          const data = await this.io(() => blobs.get(install, previous.contentHash));
          await this.io(() => files.write(install, previous.path, data));
        }
      } catch (err) {
        stuck.set(op.path, op);
        this.logger.error("rollback failed", { path: op.path, kind: op.kind, error: err });
      }
    }

    if (stuck.size === 0) {
      this.logger.info("rolled back overlay", { install: install.id, operations: journal.length });
      return;
    }

    // best guess of what is on disk: the target state for the paths that could not be undone
    const overlay = new Map(current.map((e) => [e.path, e]));
    for (const op of stuck.values()) {
      if (op.kind === "revert") {
        overlay.delete(op.path);
        continue;
      }
      const backup = op.kind === "replace" ? op.previous.backupRef : index.get(op.path)?.ref;
      if (backup) {
        overlay.set(op.path, { path: op.path, modId: op.modId, contentHash: op.hash, backupRef: backup });
      }
    }

    throw new UnrecoverableStateError(
      `rollback failed for ${[...stuck.keys()].join(", ")}; restore vanilla game files`,
      [...stuck.keys()].sort(comparePaths),
      cause,
      [...overlay.values()].sort((a, b) => comparePaths(a.path, b.path))
    );
  }
}
