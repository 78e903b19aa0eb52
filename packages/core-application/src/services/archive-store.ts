import path from "node:path";
import type { GameInstall, Mod, ModFileEntry, ModId, ModSummary } from "@modlayer/core-domain";

import type { BlobStore } from "../ports/blob-store";
import type { Clock } from "../ports/clock";
import type { FileHasher } from "../ports/file-hasher";
import type { Logger } from "../ports/logger";
import type { ModPayloadReader } from "../ports/mod-payload-reader";
import type { InstallManifest } from "../value-objects/install-manifest";
import type { ModPayload } from "../value-objects/mod-payload";
import { parseModJson, slugifyModName, type ParsedModJson } from "../value-objects/mod-metadata";
import { checkRelPath, comparePaths, isWithin } from "../value-objects/rel-path";
import {
  CorruptArchiveError,
  InUseError,
  InvalidRequestError,
  NotFoundError,
} from "../application/errors";

export type ArchiveStoreDeps = {
  reader: ModPayloadReader;
  blobs: BlobStore;
  hasher: FileHasher;
  clock: Clock;
  logger: Logger;
};

export type RegisterOutcome = {
  mod: Mod;
  /** True when an earlier version of the mod was replaced. */
  replaced: boolean;
};

/** Relative location of the state directory inside the game root, or null when it lives elsewhere. */
function reservedDir(install: GameInstall): string | null {
  const rel = path.relative(path.resolve(install.rootPath), path.resolve(install.stateDir));
  if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) return null;
  return rel.replaceAll("\\", "/");
}

/**
 * An earlier version of the same mod: registered from the same payload path,
 * or carrying the same mod.json name.
 */
function findPreviousVersion(state: InstallManifest, sourcePath: string, declaredName: string | undefined): Mod | undefined {
  return (
    state.mods.find((m) => m.source.path === sourcePath) ??
    (declaredName === undefined ? undefined : state.mods.find((m) => m.name === declaredName))
  );
}

/** slug, then slug-2, slug-3... until no registered mod uses it. */
function freeModId(state: InstallManifest, slug: string): ModId {
  const taken = new Set(state.mods.map((m) => m.id));
  if (!taken.has(slug)) return slug;
  let n = 2;
  while (taken.has(`${slug}-${n}`)) n += 1;
  return `${slug}-${n}`;
}

export function summarizeMod(mod: Mod): ModSummary {
  return {
    id: mod.id,
    name: mod.name,
    version: mod.metadata.version,
    author: mod.metadata.author,
    category: mod.metadata.category,
    fileCount: mod.files.length,
    installedAtIso: mod.installedAtIso,
  };
}

export class ArchiveStore {
  private readonly logger: Logger;

  constructor(private readonly deps: ArchiveStoreDeps) {
    this.logger = deps.logger.child("archive");
  }

  /**
   * Validates and stores a mod payload. Nothing is written to the manifest
   * unless every file passed validation and reached the blob store.
   */
  async register(install: GameInstall, state: InstallManifest, payloadPath: string): Promise<RegisterOutcome> {
    const payload = await this.deps.reader.read(payloadPath);
    const meta = this.readMetadata(payload);

    const declaredGame = meta.metadata.game;
    if (declaredGame && declaredGame.toLowerCase() !== install.gameId.toLowerCase()) {
      throw new InvalidRequestError(
        `mod ${payload.sourcePath} targets game "${declaredGame}", not "${install.gameId}"`
      );
    }

    const files = this.validateFiles(install, payload);
    const name = meta.name ?? payload.defaultName;
    const previous = findPreviousVersion(state, payload.sourcePath, meta.name);
    if (previous) this.assertReplaceable(state, previous.id);

    for (const f of files) {
      await this.deps.blobs.put(install, f.entry.hash, f.data);
    }

    const mod: Mod = {
      id: previous?.id ?? freeModId(state, slugifyModName(name)),
      name,
      files: files.map((f) => f.entry),
      installedAtIso: this.deps.clock.now().toISOString(),
      metadata: meta.metadata,
      source: { kind: payload.sourceKind, path: payload.sourcePath },
    };

    if (!previous) {
      state.mods.push(mod);
      this.logger.info("registered mod", { id: mod.id, files: mod.files.length, source: mod.source.path });
      return { mod, replaced: false };
    }

    state.mods = state.mods.map((m) => (m.id === previous.id ? mod : m));
    const blobsDeleted = await this.deleteUnused(install, state, previous);

    this.logger.info("replaced mod", {
      id: mod.id,
      files: mod.files.length,
      source: mod.source.path,
      blobsDeleted,
    });
    return { mod, replaced: true };
  }

  get(state: InstallManifest, modId: ModId): Mod {
    const mod = state.mods.find((m) => m.id === modId);
    if (!mod) throw new NotFoundError("mod", modId);
    return mod;
  }

  list(state: InstallManifest): ModSummary[] {
    return state.mods
      .map(summarizeMod)
      .sort((a, b) => a.name.localeCompare(b.name) || comparePaths(a.id, b.id));
  }

  async remove(install: GameInstall, state: InstallManifest, modId: ModId): Promise<void> {
    const mod = this.get(state, modId);
    this.assertReplaceable(state, modId);

    state.mods = state.mods.filter((m) => m.id !== modId);
    const blobsDeleted = await this.deleteUnused(install, state, mod);

    this.logger.info("removed mod", { id: modId, blobsDeleted });
  }

  /** The active profile and the overlay must not lose the mod under them. */
  private assertReplaceable(state: InstallManifest, modId: ModId) {
    const active = state.profiles.find((p) => p.id === state.activeProfileId);
    if (active?.entries.some((e) => e.modId === modId)) {
      throw new InUseError(`mod ${modId} is part of the active profile "${active.name}"`);
    }
    if (state.overlay.some((e) => e.modId === modId)) {
      throw new InUseError(`mod ${modId} still owns overlaid files`);
    }
  }

  /** Deletes the blobs of a dropped mod version that nothing in state refers to. */
  private async deleteUnused(install: GameInstall, state: InstallManifest, dropped: Mod): Promise<number> {
    const stillUsed = new Set<string>(state.overlay.map((e) => e.contentHash));
    for (const m of state.mods) for (const f of m.files) stillUsed.add(f.hash);

    const orphaned = new Set(dropped.files.map((f) => f.hash).filter((h) => !stillUsed.has(h)));
    for (const hash of orphaned) {
      await this.deps.blobs.delete(install, hash);
    }
    return orphaned.size;
  }

  private readMetadata(payload: ModPayload): ParsedModJson {
    if (payload.metadataText === undefined) return { metadata: {} };
    try {
      return parseModJson(payload.metadataText);
    } catch (err) {
      throw new CorruptArchiveError(payload.sourcePath, "mod.json cannot be parsed", err);
    }
  }

  private validateFiles(install: GameInstall, payload: ModPayload): { entry: ModFileEntry; data: Buffer }[] {
    if (payload.files.length === 0) {
      throw new CorruptArchiveError(payload.sourcePath, "payload contains no files");
    }

    const reserved = reservedDir(install);
    const seen = new Set<string>();
    const out: { entry: ModFileEntry; data: Buffer }[] = [];

    for (const file of payload.files) {
      const checked = checkRelPath(file.path);
      if (!checked.ok) {
        throw new CorruptArchiveError(payload.sourcePath, `entry "${file.path}": ${checked.reason}`);
      }
      if (reserved && isWithin(checked.path, reserved)) {
        throw new CorruptArchiveError(payload.sourcePath, `entry "${file.path}" targets the reserved ${reserved} directory`);
      }
      if (seen.has(checked.path)) {
        throw new CorruptArchiveError(payload.sourcePath, `entry "${checked.path}" is declared twice`);
      }
      seen.add(checked.path);

      out.push({
        entry: {
          path: checked.path,
          hash: this.deps.hasher.hashBuffer(file.data).value,
          sizeBytes: file.data.length,
        },
        data: file.data,
      });
    }

    return out.sort((a, b) => comparePaths(a.entry.path, b.entry.path));
  }
}
