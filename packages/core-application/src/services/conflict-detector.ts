import type { Mod, ModId, PathConflict, Profile } from "@modlayer/core-domain";

import type { InstallManifest } from "../value-objects/install-manifest";
import { comparePaths } from "../value-objects/rel-path";
import { DanglingModReferenceError } from "../application/errors";

export type ResolvedFile = {
  path: string;
  modId: ModId;
  hash: string;
  sizeBytes: number;
};

/** Winning file per path. */
export type ResolvedSet = ReadonlyMap<string, ResolvedFile>;

export type Resolution = {
  resolved: ResolvedSet;
  /** Every declared path, contested or not, sorted by path. */
  paths: PathConflict[];
};

/**
 * Last-writer-wins resolution over mods ordered lowest priority first. One
 * pass: each declaration of a path demotes the previous holder to the losers.
 */
export function resolveLoadOrder(mods: readonly Mod[]): Resolution {
  const winners = new Map<string, ResolvedFile>();
  const losers = new Map<string, ModId[]>();

  for (const mod of mods) {
    for (const file of mod.files) {
      const previous = winners.get(file.path);
      if (previous && previous.modId !== mod.id) {
        const list = losers.get(file.path) ?? [];
        if (!list.includes(previous.modId)) list.push(previous.modId);
        losers.set(file.path, list);
      }
      winners.set(file.path, {
        path: file.path,
        modId: mod.id,
        hash: file.hash,
        sizeBytes: file.sizeBytes,
      });
    }
  }

  const paths = [...winners.values()]
    .map((w) => ({
      path: w.path,
      winner: w.modId,
      losers: (losers.get(w.path) ?? []).filter((id) => id !== w.modId),
    }))
    .sort((a, b) => comparePaths(a.path, b.path));

  return { resolved: winners, paths };
}

export class ConflictDetector {
  resolve(mods: readonly Mod[]): Resolution {
    return resolveLoadOrder(mods);
  }

  /**
   * Enabled mods of the profile in priority order. Every entry, enabled or
   * not, must name a registered mod.
   */
  modsFor(state: InstallManifest, profile: Profile): Mod[] {
    const byId = new Map(state.mods.map((m) => [m.id, m]));

    const missing = profile.entries.map((e) => e.modId).filter((id) => !byId.has(id));
    if (missing.length > 0) throw new DanglingModReferenceError(profile.id, [...new Set(missing)]);

    const mods: Mod[] = [];
    for (const entry of profile.entries) {
      const mod = byId.get(entry.modId);
      if (entry.enabled && mod) mods.push(mod);
    }
    return mods;
  }

  /** Contested paths only. Read-only: never touches the game directory. */
  conflictsFor(state: InstallManifest, profile: Profile): PathConflict[] {
    return this.resolve(this.modsFor(state, profile)).paths.filter((p) => p.losers.length > 0);
  }
}
