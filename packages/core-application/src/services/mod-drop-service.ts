import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import type { GameInstall, ModId } from "@modlayer/core-domain";

import type { FileChangeEvent, FileWatcher } from "../ports/file-watcher";
import type { Logger } from "../ports/logger";
import { InvalidRequestError, isModLayerError } from "../application/errors";
import type { ModLayerConfig } from "../application/config";
import { ChokidarFileWatcher } from "../adapters/chokidar-file-watcher";
import { createDropFolderIgnore } from "../adapters/drop-folder-ignore";
import { NodeModPayloadReader } from "../adapters/node-mod-payload-reader";

/** The part of the facade the drop folder needs. */
export interface ModRegistrar {
  registerMod(install: GameInstall, payloadPath: string): Promise<ModId>;
}

export type ModDropServiceDeps = {
  registrar: ModRegistrar;
  watcher: FileWatcher;
  logger: Logger;
  isArchive: (filePath: string) => boolean;
  /** Quiet period after the last event inside a dropped folder before it is registered. */
  settleMs: number;
};

export type DropFailure = {
  path: string;
  code: string;
  message: string;
};

export type ScanOutcome = {
  registered: { path: string; modId: ModId }[];
  failed: DropFailure[];
};

function describeFailure(payloadPath: string, err: unknown): DropFailure {
  return {
    path: payloadPath,
    code: isModLayerError(err) ? err.code : "Unknown",
    message: err instanceof Error ? err.message : String(err),
  };
}

/**
 * Registers mods dropped into a folder. Registration only: profiles are never
 * touched.
 */
export class ModDropService {
  private readonly logger: Logger;
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private queue: Promise<void> = Promise.resolve();
  private watching: { install: GameInstall; root: string } | null = null;

  constructor(private readonly deps: ModDropServiceDeps) {
    this.logger = deps.logger.child("drop-folder");
  }

  /** Registers every folder and supported archive directly inside dropDir. */
  async scan(install: GameInstall, dropDir: string): Promise<ScanOutcome> {
    const root = path.resolve(dropDir);
    const ignore = createDropFolderIgnore(root);

    let entries: Dirent[];
    try {
      entries = await fs.readdir(root, { withFileTypes: true });
    } catch (err) {
      throw new InvalidRequestError(`cannot read drop folder ${root}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const out: ScanOutcome = { registered: [], failed: [] };
    const candidates = entries
      .filter((e) => e.isDirectory() || (e.isFile() && this.deps.isArchive(e.name)))
      .map((e) => path.join(root, e.name))
      .filter((abs) => !ignore(abs))
      .sort();

    for (const abs of candidates) {
      try {
        const modId = await this.deps.registrar.registerMod(install, abs);
        out.registered.push({ path: abs, modId });
      } catch (err) {
        out.failed.push(describeFailure(abs, err));
        this.logger.warn("could not register dropped mod", { path: abs, error: err });
      }
    }

    this.logger.info("scanned drop folder", {
      root,
      registered: out.registered.length,
      failed: out.failed.length,
    });
    return out;
  }

  async start(install: GameInstall, dropDir: string): Promise<void> {
    if (this.watching) {
      throw new InvalidRequestError(`already watching ${this.watching.root}`);
    }

    const root = path.resolve(dropDir);
    this.watching = { install, root };

    this.deps.watcher.onEvent((e) => this.handle(e));
    this.deps.watcher.onError((err) => this.logger.error("drop folder watcher failed", { root, error: err }));
    await this.deps.watcher.start({
      rootDir: root,
      ignore: createDropFolderIgnore(root),
      stabilityMs: this.deps.settleMs,
    });

    this.logger.info("watching drop folder", { root, install: install.id });
  }

  async stop(): Promise<void> {
    for (const t of this.timers.values()) clearTimeout(t);
    this.timers.clear();

    await this.deps.watcher.stop();
    this.watching = null;
    await this.idle();
  }

  /** Resolves once every queued registration has finished. */
  idle(): Promise<void> {
    return this.queue;
  }

  private handle(event: FileChangeEvent) {
    if (!this.watching) return;

    const { root } = this.watching;
    const rel = path.relative(root, event.path);
    if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) return;

    const top = rel.split(path.sep)[0];
    const topAbs = path.join(root, top);
    const isTopLevel = rel === top;

    if (event.type === "deleted") {
      if (isTopLevel) this.cancel(topAbs);
      return;
    }

    if (isTopLevel && !event.isDirectory) {
      // the watcher reports files only once they stopped growing
      if (this.deps.isArchive(topAbs)) this.enqueue(topAbs);
      return;
    }

    // a folder, or something being copied into one
    this.settle(topAbs);
  }

  private settle(folderAbs: string) {
    this.cancel(folderAbs);
    this.timers.set(
      folderAbs,
      setTimeout(() => {
        this.timers.delete(folderAbs);
        this.enqueue(folderAbs);
      }, this.deps.settleMs)
    );
  }

  private cancel(abs: string) {
    const t = this.timers.get(abs);
    if (t) clearTimeout(t);
    this.timers.delete(abs);
  }

  private enqueue(payloadPath: string) {
    const target = this.watching;
    if (!target) return;

    this.queue = this.queue.then(() => this.register(target.install, payloadPath));
  }

  private async register(install: GameInstall, payloadPath: string): Promise<void> {
    try {
      const modId = await this.deps.registrar.registerMod(install, payloadPath);
      this.logger.info("registered dropped mod", { path: payloadPath, modId });
    } catch (err) {
      const failure = describeFailure(payloadPath, err);
      this.logger.warn("could not register dropped mod", { ...failure });
    }
  }
}

/** Drop folder service backed by chokidar and the configured archive extensions. */
export function createModDropService(registrar: ModRegistrar, config: ModLayerConfig, logger: Logger): ModDropService {
  const reader = new NodeModPayloadReader(config.archiveExtensions);
  return new ModDropService({
    registrar,
    watcher: new ChokidarFileWatcher(),
    logger,
    isArchive: (filePath) => reader.isArchive(filePath),
    settleMs: config.dropSettleMs,
  });
}
