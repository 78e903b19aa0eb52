export type FileChangeType = "created" | "modified" | "deleted";

export type FileChangeEvent = {
  type: FileChangeType;
  path: string;
  isDirectory: boolean;
  occurredAt: Date;
};

export type FileWatcherOptions = {
  rootDir: string;
  ignore: (path: string) => boolean;
  /** How long a file's size must stay unchanged before it is reported. */
  stabilityMs?: number;
};

export interface FileWatcher {
  start(options: FileWatcherOptions): Promise<void>;
  stop(): Promise<void>;
  onEvent(handler: (event: FileChangeEvent) => void): void;
  /** Failures of the underlying watcher after start. */
  onError(handler: (err: unknown) => void): void;
}
