import chokidar from "chokidar";
import type { FSWatcher } from "chokidar";
import path from "path";
import type {
  FileWatcher,
  FileWatcherOptions,
  FileChangeEvent,
  FileChangeType,
} from "../ports/file-watcher";

const DEFAULT_STABILITY_MS = 250;

// chokidar event -> what the drop folder cares about
const EVENT_MAP = {
  add: { type: "created", isDirectory: false },
  addDir: { type: "created", isDirectory: true },
  change: { type: "modified", isDirectory: false },
  unlink: { type: "deleted", isDirectory: false },
  unlinkDir: { type: "deleted", isDirectory: true },
} as const satisfies Record<string, { type: FileChangeType; isDirectory: boolean }>;

/**
 * Reports files only after they stop growing, so a half-copied archive is
 * never seen. `start` resolves once the initial scan is done; entries already
 * present are not reported.
 */
export class ChokidarFileWatcher implements FileWatcher {
  private watcher: FSWatcher | null = null;
  private handler: ((event: FileChangeEvent) => void) | null = null;
  private errorHandler: ((err: unknown) => void) | null = null;

  onEvent(handler: (event: FileChangeEvent) => void): void {
    this.handler = handler;
  }

  onError(handler: (err: unknown) => void): void {
    this.errorHandler = handler;
  }

  async start(options: FileWatcherOptions): Promise<void> {
    if (this.watcher) return;

    const rootDir = path.resolve(options.rootDir);
    const watcher = chokidar.watch(rootDir, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: options.stabilityMs ?? DEFAULT_STABILITY_MS,
        pollInterval: 50,
      },
      ignored: (p: string) => options.ignore(path.resolve(p)),
    });
    this.watcher = watcher;

    const emit = (kind: keyof typeof EVENT_MAP, filePath: string) => {
      const abs = path.resolve(filePath);
      if (abs === rootDir) return;
      this.handler?.({ ...EVENT_MAP[kind], path: abs, occurredAt: new Date() });
    };

    watcher
      .on("add", (p: string) => emit("add", p))
      .on("addDir", (p: string) => emit("addDir", p))
      .on("change", (p: string) => emit("change", p))
      .on("unlink", (p: string) => emit("unlink", p))
      .on("unlinkDir", (p: string) => emit("unlinkDir", p))
      .on("error", (err: unknown) => this.errorHandler?.(err));

    await new Promise<void>((resolve) => watcher.once("ready", () => resolve()));
  }

  async stop(): Promise<void> {
    if (!this.watcher) return;
    const watcher = this.watcher;
    this.watcher = null;
    await watcher.close();
  }
}
