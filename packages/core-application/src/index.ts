// Public API of core-application: ports, value objects, services and the
// Node adapters, so applications never reach into internal file paths.

// Ports (interfaces)
export * from "./ports/clock";
export * from "./ports/logger";
export * from "./ports/retry-policy";
export * from "./ports/game-files";
export * from "./ports/blob-store";
export * from "./ports/backup-store";
export * from "./ports/install-state-store";
export * from "./ports/mod-payload-reader";
export type {
  FileChangeType,
  FileChangeEvent,
  FileWatcherOptions,
  FileWatcher,
} from "./ports/file-watcher";
export type { FileHash, FileHasher } from "./ports/file-hasher";

// Application
export * from "./application/errors";
export * from "./application/config";
export * from "./application/with-retry";
export * from "./application/default-io-retry-policy";
export * from "./application/install-lock";

// Value objects
export * from "./value-objects/rel-path";
export * from "./value-objects/mod-payload";
export * from "./value-objects/mod-metadata";
export * from "./value-objects/install-manifest";
export * from "./value-objects/backup-index";

// Services
export * from "./services/conflict-detector";
export * from "./services/overlay-diff";
export * from "./services/backup-manager";
export * from "./services/overlay-engine";
export * from "./services/archive-store";
export * from "./services/profile-manager";
export * from "./services/profile-transfer";
export * from "./services/mod-layer";
export * from "./services/mod-drop-service";

// Node adapters
export * from "./adapters/node-game-files";
export * from "./adapters/node-blob-store";
export * from "./adapters/node-backup-store";
export * from "./adapters/node-install-state-store";
export * from "./adapters/node-mod-payload-reader";
export * from "./adapters/node-file-hasher";
export * from "./adapters/chokidar-file-watcher";
export * from "./adapters/console-logger";
export * from "./adapters/system-clock";
export * from "./adapters/apply-lock";
export * from "./adapters/drop-folder-ignore";
