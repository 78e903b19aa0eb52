import crypto from "node:crypto";
import type {
  GameInstall,
  ModId,
  Profile,
  ProfileEntry,
  ProfileId,
  ProfileStatus,
  ProfileSummary,
} from "@modlayer/core-domain";

import type { Clock } from "../ports/clock";
import type { Logger } from "../ports/logger";
import type { InstallManifest } from "../value-objects/install-manifest";
import { BackupIndex } from "../value-objects/backup-index";
import {
  InUseError,
  InvalidRequestError,
  NotFoundError,
  UnrecoverableStateError,
} from "../application/errors";
import type { ConflictDetector, ResolvedSet } from "./conflict-detector";
import type { ApplyOutcome, OverlayEngine } from "./overlay-engine";

export type ProfileManagerDeps = {
  detector: ConflictDetector;
  engine: OverlayEngine;
  clock: Clock;
  logger: Logger;
  newId?: () => string;
};

export type ActivationOutcome = ApplyOutcome & {
  status: ProfileStatus;
};

function requireName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) throw new InvalidRequestError("profile name must not be blank");
  return trimmed;
}

export class ProfileManager {
  private readonly logger: Logger;
  private readonly newId: () => string;

  constructor(private readonly deps: ProfileManagerDeps) {
    this.logger = deps.logger.child("profiles");
    this.newId = deps.newId ?? (() => crypto.randomUUID());
  }

  /* ---------------- profile CRUD ---------------- */

  create(state: InstallManifest, name: string, entries: ProfileEntry[] = []): Profile {
    const nowIso = this.deps.clock.now().toISOString();
    const profile: Profile = {
      id: this.newId(),
      name: requireName(name),
      entries: entries.map((e) => ({ ...e })),
      createdAtIso: nowIso,
      lastModifiedIso: nowIso,
    };
    state.profiles.push(profile);
    this.logger.info("created profile", { id: profile.id, name: profile.name });
    return profile;
  }

  get(state: InstallManifest, profileId: ProfileId): Profile {
    const profile = state.profiles.find((p) => p.id === profileId);
    if (!profile) throw new NotFoundError("profile", profileId);
    return profile;
  }

  list(state: InstallManifest): ProfileSummary[] {
    return state.profiles.map((p) => ({
      id: p.id,
      name: p.name,
      modCount: p.entries.length,
      enabledCount: p.entries.filter((e) => e.enabled).length,
      active: p.id === state.activeProfileId,
      lastModifiedIso: p.lastModifiedIso,
    }));
  }

  rename(state: InstallManifest, profileId: ProfileId, name: string): Profile {
    const profile = this.get(state, profileId);
    profile.name = requireName(name);
    this.touch(profile);
    return profile;
  }

  duplicate(state: InstallManifest, profileId: ProfileId, name?: string): Profile {
    const source = this.get(state, profileId);
    return this.create(state, name ?? `${source.name} (Copy)`, source.entries);
  }

  delete(state: InstallManifest, profileId: ProfileId): void {
    const profile = this.get(state, profileId);
    if (state.activeProfileId === profileId) {
      throw new InUseError(`profile "${profile.name}" is active; deactivate it first`);
    }
    state.profiles = state.profiles.filter((p) => p.id !== profileId);
    this.logger.info("deleted profile", { id: profileId });
  }

  /**
   * Sets membership and order in one step. Mods already in the profile keep
   * their enabled flag; new ones start enabled.
   */
  reorder(state: InstallManifest, profileId: ProfileId, modIds: readonly ModId[]): Profile {
    const profile = this.get(state, profileId);

    const duplicates = modIds.filter((id, i) => modIds.indexOf(id) !== i);
    if (duplicates.length > 0) {
      throw new InvalidRequestError(`mod listed more than once: ${[...new Set(duplicates)].join(", ")}`);
    }

    const enabledById = new Map(profile.entries.map((e) => [e.modId, e.enabled]));
    profile.entries = modIds.map((modId) => ({ modId, enabled: enabledById.get(modId) ?? true }));
    this.touch(profile);
    return profile;
  }

  setModEnabled(state: InstallManifest, profileId: ProfileId, modId: ModId, enabled: boolean): Profile {
    const profile = this.get(state, profileId);
    const entry = profile.entries.find((e) => e.modId === modId);
    if (!entry) throw new NotFoundError("mod", `${modId} in profile ${profileId}`);
    entry.enabled = enabled;
    this.touch(profile);
    return profile;
  }

  /* ---------------- activation state machine ---------------- */

  status(state: InstallManifest): ProfileStatus {
    return state.activeProfileId ? { kind: "active", profileId: state.activeProfileId } : { kind: "none" };
  }

  /**
   * Applies the profile against whatever overlay is currently on disk, so a
   * switch from another profile only touches paths whose winner changed. The
   * install becomes ProfileActive(profileId) only when the overlay applied.
   */
  async activate(install: GameInstall, state: InstallManifest, profileId: ProfileId): Promise<ActivationOutcome> {
    this.assertRecoverable(state);

    const profile = this.get(state, profileId);
    const mods = this.deps.detector.modsFor(state, profile);
    const { resolved } = this.deps.detector.resolve(mods);

    const outcome = await this.applyResolved(install, state, resolved);
    state.activeProfileId = profile.id;

    this.logger.info("activated profile", { id: profile.id, name: profile.name });
    return { ...outcome, status: this.status(state) };
  }

  async switchTo(install: GameInstall, state: InstallManifest, profileId: ProfileId): Promise<ActivationOutcome> {
    return this.activate(install, state, profileId);
  }

  async deactivate(install: GameInstall, state: InstallManifest): Promise<ActivationOutcome> {
    this.assertRecoverable(state);

    const outcome = await this.applyResolved(install, state, new Map());
    state.activeProfileId = null;

    this.logger.info("deactivated profiles", { install: install.id });
    return { ...outcome, status: this.status(state) };
  }

  private async applyResolved(
    install: GameInstall,
    state: InstallManifest,
    resolved: ResolvedSet
  ): Promise<ApplyOutcome> {
    const index = new BackupIndex(state.backups);
    try {
      const outcome = await this.deps.engine.apply(install, index, state.overlay, resolved);
      state.overlay = outcome.overlay;
      return outcome;
    } catch (err) {
      if (err instanceof UnrecoverableStateError) {
        state.overlay = err.overlay ?? state.overlay;
        state.needsRecovery = true;
      }
      throw err;
    } finally {
      // captured backups stay valid whatever happened to the overlay
      state.backups = index.entries();
    }
  }

  private assertRecoverable(state: InstallManifest) {
    if (state.needsRecovery) {
      throw new UnrecoverableStateError("install needs recovery; restore vanilla game files first");
    }
  }

  private touch(profile: Profile) {
    profile.lastModifiedIso = this.deps.clock.now().toISOString();
  }
}
