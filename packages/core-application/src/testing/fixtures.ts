import crypto from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { GameInstall, Mod, Profile, ProfileEntry } from "@modlayer/core-domain";

import type { Clock } from "../ports/clock";
import type { GameFiles } from "../ports/game-files";
import type { LogFields, Logger, LogLevel } from "../ports/logger";
import type { RetryPolicy } from "../ports/retry-policy";

export async function makeTempDir(prefix = "modlayer-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeTree(root: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, ...rel.split("/"));
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content);
  }
}

/**
 * Snapshot of a directory as relative posix path -> utf-8 content. Directories
 * show up as "<dir>/" with an empty string so that leftovers are visible.
 */
export async function readTree(root: string, skip: readonly string[] = []): Promise<Record<string, string>> {
  const out: Record<string, string> = {};

  async function walk(dirAbs: string) {
    const entries = await fs.readdir(dirAbs, { withFileTypes: true });
    for (const e of entries) {
      const abs = path.join(dirAbs, e.name);
      const rel = path.relative(root, abs).split(path.sep).join("/");
      if (skip.some((s) => rel === s || rel.startsWith(`${s}/`))) continue;

      if (e.isDirectory()) {
        out[`${rel}/`] = "";
        await walk(abs);
      } else {
        out[rel] = await fs.readFile(abs, "utf-8");
      }
    }
  }

  await walk(root);
  return out;
}

export function testInstall(root: string, gameId = "test-game"): GameInstall {
  return {
    id: "install-1",
    gameId,
    rootPath: root,
    stateDir: path.join(root, ".modlayer"),
  };
}

export function sha256Hex(content: string | Buffer): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

/** Registered-mod record for files given as path -> content. */
export function makeMod(id: string, files: Record<string, string>): Mod {
  return {
    id,
    name: id,
    files: Object.entries(files).map(([path, content]) => ({
      path,
      hash: sha256Hex(content),
      sizeBytes: Buffer.byteLength(content),
    })),
    installedAtIso: "2024-05-01T10:00:00.000Z",
    metadata: {},
    source: { kind: "folder", path: `/mods/${id}` },
  };
}

export function makeProfile(id: string, modIds: string[], overrides: Partial<ProfileEntry>[] = []): Profile {
  return {
    id,
    name: id,
    entries: modIds.map((modId, i) => ({ modId, enabled: true, ...overrides[i] })),
    createdAtIso: "2024-05-01T10:00:00.000Z",
    lastModifiedIso: "2024-05-01T10:00:00.000Z",
  };
}

export class FixedClock implements Clock {
  constructor(private current = new Date("2024-05-01T10:00:00.000Z")) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  advance(ms: number) {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export type LogRecord = {
  level: LogLevel;
  scope: string;
  message: string;
  fields?: LogFields;
};

export class MemoryLogger implements Logger {
  constructor(
    readonly records: LogRecord[] = [],
    private readonly scope = ""
  ) {}

  error(message: string, fields?: LogFields): void {
    this.records.push({ level: "error", scope: this.scope, message, fields });
  }

  warn(message: string, fields?: LogFields): void {
    this.records.push({ level: "warn", scope: this.scope, message, fields });
  }

  info(message: string, fields?: LogFields): void {
    this.records.push({ level: "info", scope: this.scope, message, fields });
  }

  debug(message: string, fields?: LogFields): void {
    this.records.push({ level: "debug", scope: this.scope, message, fields });
  }

  child(scope: string): Logger {
    return new MemoryLogger(this.records, this.scope ? `${this.scope}.${scope}` : scope);
  }

  messages(level?: LogLevel): string[] {
    return this.records.filter((r) => !level || r.level === level).map((r) => r.message);
  }
}

export function ioError(code: string, message = code): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(message);
  err.code = code;
  return err;
}

/** Retries immediately so tests never wait on backoff. */
export function instantRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: 3,
    baseDelayMs: 0,
    maxDelayMs: 0,
    jitterRatio: 0,
    shouldRetry: () => false,
    ...overrides,
  };
}

export const noSleep = async (_ms: number) => {};

type FailRule = {
  op: "write" | "remove";
  path: string;
  error: Error;
  /** How many calls fail before the rule stops matching; unlimited when omitted. */
  times?: number;
};

/**
 * GameFiles decorator that counts mutations and fails chosen calls. A failing
 * write still fails before touching the disk.
 */
export class InstrumentedGameFiles implements GameFiles {
  readonly writes: string[] = [];
  readonly removes: string[] = [];
  private rules: FailRule[] = [];

  constructor(private readonly inner: GameFiles) {}

  failOn(rule: FailRule) {
    this.rules.push({ ...rule });
  }

  clearFailures() {
    this.rules = [];
  }

  resetCounts() {
    this.writes.length = 0;
    this.removes.length = 0;
  }

  read(install: GameInstall, relPath: string): Promise<Buffer | null> {
    return this.inner.read(install, relPath);
  }

  async write(install: GameInstall, relPath: string, data: Buffer): Promise<void> {
    this.check("write", relPath);
    this.writes.push(relPath);
    await this.inner.write(install, relPath, data);
  }

  async remove(install: GameInstall, relPath: string, keepDir?: string): Promise<void> {
    this.check("remove", relPath);
    this.removes.push(relPath);
    await this.inner.remove(install, relPath, keepDir);
  }

  deepestExistingDir(install: GameInstall, relPath: string): Promise<string> {
    return this.inner.deepestExistingDir(install, relPath);
  }

  private check(op: FailRule["op"], relPath: string) {
    const rule = this.rules.find((r) => r.op === op && r.path === relPath && (r.times ?? 1) > 0);
    if (!rule) return;
    if (rule.times !== undefined) rule.times--;
    throw rule.error;
  }
}
