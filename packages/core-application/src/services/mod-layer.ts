import crypto from "node:crypto";
import path from "node:path";
import type {
  GameInstall,
  Mod,
  ModId,
  ModSummary,
  PathConflict,
  Profile,
  ProfileId,
  ProfileStatus,
  ProfileSummary,
} from "@modlayer/core-domain";

import type { Clock } from "../ports/clock";
import type { FileHasher } from "../ports/file-hasher";
import type { GameFiles } from "../ports/game-files";
import type { InstallStateStore } from "../ports/install-state-store";
import type { Logger } from "../ports/logger";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import type { BlobStore } from "../ports/blob-store";
import type { BackupStore } from "../ports/backup-store";
import type { ModPayloadReader } from "../ports/mod-payload-reader";
import { createEmptyManifest, type InstallManifest } from "../value-objects/install-manifest";
import { InUseError, PartialApplyFailureError, UnrecoverableStateError } from "../application/errors";
import { InstallLock } from "../application/install-lock";
import { defaultIoRetryPolicy } from "../application/default-io-retry-policy";
import type { ModLayerConfig } from "../application/config";
import { clearApplyLock, isApplyLocked, setApplyLock } from "../adapters/apply-lock";
import { ConsoleLogger } from "../adapters/console-logger";
import { NodeBackupStore } from "../adapters/node-backup-store";
import { NodeBlobStore } from "../adapters/node-blob-store";
import { NodeFileHasher } from "../adapters/node-file-hasher";
import { NodeGameFiles } from "../adapters/node-game-files";
import { NodeInstallStateStore } from "../adapters/node-install-state-store";
import { NodeModPayloadReader } from "../adapters/node-mod-payload-reader";
import { SystemClock } from "../adapters/system-clock";
import { sleep } from "../infra/sleep";
import { ArchiveStore } from "./archive-store";
import { BackupManager } from "./backup-manager";
import { ConflictDetector } from "./conflict-detector";
import { OverlayEngine } from "./overlay-engine";
import { ProfileManager, type ActivationOutcome } from "./profile-manager";
import { ProfileTransfer, type ProfileExport } from "./profile-transfer";

export type OpenGameInstallParams = {
  gameId: string;
  rootPath: string;
  stateDir?: string;
};

export type OverlayVerification = {
  intact: string[];
  /** Overlaid files whose content no longer matches the winning mod. */
  drifted: string[];
  missing: string[];
};

export type RestoreOutcome = {
  restored: string[];
};

export type InstallStatus = {
  profile: ProfileStatus;
  overlaidPaths: number;
  backedUpPaths: number;
  needsRecovery: boolean;
  /** A mutation started and never finished. */
  interrupted: boolean;
};

export function openGameInstall(params: OpenGameInstallParams, config: Pick<ModLayerConfig, "stateDirName">): GameInstall {
  const rootPath = path.resolve(params.rootPath);
  const id = crypto.createHash("sha256").update(rootPath).digest("hex").slice(0, 16);

  return {
    id,
    gameId: params.gameId,
    rootPath,
    stateDir: params.stateDir ? path.resolve(params.stateDir) : path.join(rootPath, config.stateDirName),
  };
}

export type ModLayerDeps = {
  states: InstallStateStore;
  files: GameFiles;
  hasher: FileHasher;
  archives: ArchiveStore;
  detector: ConflictDetector;
  backups: BackupManager;
  profiles: ProfileManager;
  transfer: ProfileTransfer;
  logger: Logger;
  lock?: InstallLock;
};

export class ModLayer {
  private readonly logger: Logger;
  private readonly lock: InstallLock;

  constructor(private readonly deps: ModLayerDeps) {
    this.logger = deps.logger.child("modlayer");
    this.lock = deps.lock ?? new InstallLock();
  }

  /* ---------------- mods ---------------- */

  async registerMod(install: GameInstall, payloadPath: string): Promise<ModId> {
    const { mod } = await this.mutate(install, (state) => this.deps.archives.register(install, state, payloadPath));
    return mod.id;
  }

  async listMods(install: GameInstall): Promise<ModSummary[]> {
    return this.deps.archives.list(await this.readState(install));
  }

  async getMod(install: GameInstall, modId: ModId): Promise<Mod> {
    return this.deps.archives.get(await this.readState(install), modId);
  }

  async removeMod(install: GameInstall, modId: ModId): Promise<void> {
    await this.mutate(install, (state) => this.deps.archives.remove(install, state, modId));
  }

  /* ---------------- profiles ---------------- */

  async createProfile(install: GameInstall, name: string): Promise<ProfileId> {
    const profile = await this.mutate(install, async (state) => this.deps.profiles.create(state, name));
    return profile.id;
  }

  async getProfile(install: GameInstall, profileId: ProfileId): Promise<Profile> {
    return this.deps.profiles.get(await this.readState(install), profileId);
  }

  async listProfiles(install: GameInstall): Promise<ProfileSummary[]> {
    return this.deps.profiles.list(await this.readState(install));
  }

  async renameProfile(install: GameInstall, profileId: ProfileId, name: string): Promise<void> {
    await this.mutate(install, async (state) => this.deps.profiles.rename(state, profileId, name));
  }

  async duplicateProfile(install: GameInstall, profileId: ProfileId, name?: string): Promise<ProfileId> {
    const copy = await this.mutate(install, async (state) => this.deps.profiles.duplicate(state, profileId, name));
    return copy.id;
  }

  async reorderProfile(install: GameInstall, profileId: ProfileId, modIds: readonly ModId[]): Promise<void> {
    await this.mutate(install, async (state) => this.deps.profiles.reorder(state, profileId, modIds));
  }

  async setModEnabled(install: GameInstall, profileId: ProfileId, modId: ModId, enabled: boolean): Promise<void> {
    await this.mutate(install, async (state) => this.deps.profiles.setModEnabled(state, profileId, modId, enabled));
  }

  async deleteProfile(install: GameInstall, profileId: ProfileId): Promise<void> {
    await this.mutate(install, async (state) => this.deps.profiles.delete(state, profileId));
  }

  async getConflicts(install: GameInstall, profileId: ProfileId): Promise<PathConflict[]> {
    const state = await this.readState(install);
    return this.deps.detector.conflictsFor(state, this.deps.profiles.get(state, profileId));
  }

  async exportProfile(install: GameInstall, profileId: ProfileId, filePath: string): Promise<ProfileExport> {
    return this.deps.transfer.exportTo(await this.readState(install), profileId, filePath);
  }

  async importProfile(install: GameInstall, filePath: string): Promise<ProfileId> {
    const profile = await this.mutate(install, (state) => this.deps.transfer.importFrom(state, filePath));
    return profile.id;
  }

  /* ---------------- overlay ---------------- */

  async activateProfile(install: GameInstall, profileId: ProfileId): Promise<ActivationOutcome> {
    return this.mutate(install, (state) => this.deps.profiles.activate(install, state, profileId));
  }

  async switchProfile(install: GameInstall, profileId: ProfileId): Promise<ActivationOutcome> {
    return this.mutate(install, (state) => this.deps.profiles.switchTo(install, state, profileId));
  }

  async deactivateProfile(install: GameInstall): Promise<ActivationOutcome> {
    return this.mutate(install, (state) => this.deps.profiles.deactivate(install, state));
  }

  /**
   * Puts every original game file back. Works from the backup directory alone,
   * so it also recovers an install whose manifest is lost or unreadable.
   */
  async restoreVanilla(install: GameInstall): Promise<RestoreOutcome> {
    return this.lock.runExclusive(install.id, async () => {
      const state = await this.readStateForRecovery(install);
      await setApplyLock(install);

      const index = await this.deps.backups.rebuildIndex(install);
      try {
        const { restored } = await this.deps.backups.fullRestore(install, index, state.overlay);
        state.overlay = [];
        state.activeProfileId = null;
        state.needsRecovery = false;
        state.backups = index.entries();
        await this.deps.states.save(install, state);
        await clearApplyLock(install);

        this.logger.info("restored vanilla game files", { install: install.id, restored: restored.length });
        return { restored };
      } catch (err) {
        if (err instanceof PartialApplyFailureError) {
          state.overlay = err.overlay ?? state.overlay;
          state.needsRecovery = true;
          state.backups = index.entries();
          await this.deps.states.save(install, state);
          await clearApplyLock(install);
        }
        throw err;
      }
    });
  }

  /**
   * Treats the files currently on disk as the new originals. Only allowed
   * while nothing is overlaid, e.g. after the game updated itself.
   */
  async acceptCurrentGameFiles(install: GameInstall): Promise<void> {
    await this.mutate(install, async (state) => {
      if (state.overlay.length > 0) {
        throw new InUseError("mods are still overlaid; deactivate the profile first");
      }
      await this.deps.backups.discardAll(install);
      state.backups = [];
    });
  }

  async verifyOverlay(install: GameInstall): Promise<OverlayVerification> {
    const state = await this.readState(install);
    const out: OverlayVerification = { intact: [], drifted: [], missing: [] };

    for (const entry of state.overlay) {
      const data = await this.deps.files.read(install, entry.path);
      if (!data) {
        out.missing.push(entry.path);
      } else if (this.deps.hasher.hashBuffer(data).value !== entry.contentHash) {
        out.drifted.push(entry.path);
      } else {
        out.intact.push(entry.path);
      }
    }

    if (out.drifted.length > 0 || out.missing.length > 0) {
      this.logger.warn("overlay drifted from the active profile", {
        install: install.id,
        drifted: out.drifted.length,
        missing: out.missing.length,
      });
    }
    return out;
  }

  async status(install: GameInstall): Promise<InstallStatus> {
    const state = await this.readState(install);
    return {
      profile: this.deps.profiles.status(state),
      overlaidPaths: state.overlay.length,
      backedUpPaths: state.backups.length,
      needsRecovery: state.needsRecovery,
      interrupted: await isApplyLocked(install),
    };
  }

  /* ---------------- state ---------------- */

  private async mutate<T>(install: GameInstall, fn: (state: InstallManifest) => Promise<T>): Promise<T> {
    return this.lock.runExclusive(install.id, async () => {
      if (await isApplyLocked(install)) {
        throw new UnrecoverableStateError(
          `a previous operation on ${install.rootPath} was interrupted; restore vanilla game files first`
        );
      }

      const state = await this.readState(install);
      if (state.needsRecovery) {
        throw new UnrecoverableStateError("install needs recovery; restore vanilla game files first");
      }

      await setApplyLock(install);
      try {
        return await fn(state);
      } finally {
        // failed calls still persist what they learned (captured backups, recovery flag)
        await this.deps.states.save(install, state);
        await clearApplyLock(install);
      }
    });
  }

  private async readState(install: GameInstall): Promise<InstallManifest> {
    const loaded = await this.deps.states.load(install);
    if (loaded) return loaded;

    const fresh = createEmptyManifest(install);
    const index = await this.deps.backups.rebuildIndex(install);
    if (index.size > 0) {
      fresh.backups = index.entries();
      fresh.needsRecovery = true;
      this.logger.warn("manifest missing but backups exist; install needs recovery", {
        install: install.id,
        backups: index.size,
      });
    }
    return fresh;
  }

  private async readStateForRecovery(install: GameInstall): Promise<InstallManifest> {
    try {
      return await this.readState(install);
    } catch (err) {
      if (!(err instanceof UnrecoverableStateError)) throw err;

      const movedTo = await this.deps.states.quarantine(install);
      this.logger.warn("manifest unreadable; restoring from backups alone", {
        install: install.id,
        movedTo,
        error: err,
      });
      return createEmptyManifest(install);
    }
  }
}

export type CreateModLayerOptions = {
  config: ModLayerConfig;
  logger?: Logger;
  clock?: Clock;
  sleeper?: Sleeper;
  /** Overrides for the adapters, mostly for tests. */
  files?: GameFiles;
  blobs?: BlobStore;
  backupStore?: BackupStore;
  states?: InstallStateStore;
  reader?: ModPayloadReader;
  newId?: () => string;
};

export function ioRetryPolicyFrom(config: ModLayerConfig): RetryPolicy {
  return defaultIoRetryPolicy(config.retry);
}

/** Wires the Node adapters into a ready-to-use facade. */
export function createModLayer(options: CreateModLayerOptions): ModLayer {
  const { config } = options;
  const logger = options.logger ?? new ConsoleLogger({ level: config.logLevel, scope: "modlayer" });
  const clock = options.clock ?? new SystemClock();
  const sleeper = options.sleeper ?? sleep;
  const retryPolicy = ioRetryPolicyFrom(config);

  const hasher = new NodeFileHasher();
  const files = options.files ?? new NodeGameFiles();
  const blobs = options.blobs ?? new NodeBlobStore();

  const backups = new BackupManager({
    files,
    store: options.backupStore ?? new NodeBackupStore(hasher),
    clock,
    logger,
    retryPolicy,
    sleeper,
  });
  const detector = new ConflictDetector();
  const engine = new OverlayEngine({ files, blobs, backups, logger, retryPolicy, sleeper });
  const profiles = new ProfileManager({ detector, engine, clock, logger, newId: options.newId });

  return new ModLayer({
    states: options.states ?? new NodeInstallStateStore(),
    files,
    hasher,
    archives: new ArchiveStore({
      reader: options.reader ?? new NodeModPayloadReader(config.archiveExtensions),
      blobs,
      hasher,
      clock,
      logger,
    }),
    detector,
    backups,
    profiles,
    transfer: new ProfileTransfer({ profiles, logger, now: () => clock.now() }),
    logger,
  });
}
