import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";

import type { BackupEntry, BackupRef, GameInstall } from "@modlayer/core-domain";
import type { BackupContent, BackupStore } from "../ports/backup-store";
import type { FileHasher } from "../ports/file-hasher";
import { errorCode } from "../application/default-io-retry-policy";
import { writeFileAtomic } from "../infra/write-file-atomic";
import { NodeFileHasher } from "./node-file-hasher";

const LEFTOVER_TMP = /\.[0-9a-f]{8}\.tmp$/;

function toPosix(p: string) {
  return p.replaceAll("\\", "/");
}

async function walkFiles(rootAbs: string, dirAbs: string, out: string[]) {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirAbs, { withFileTypes: true });
  } catch (err) {
    if (errorCode(err) === "ENOENT") return;
    throw err;
  }

  for (const e of entries) {
    const abs = path.join(dirAbs, e.name);
    if (e.isDirectory()) {
      await walkFiles(rootAbs, abs, out);
    } else if (e.isFile() && !LEFTOVER_TMP.test(e.name)) {
      out.push(toPosix(path.relative(rootAbs, abs)));
    }
  }
}

async function readOrNull(abs: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(abs);
  } catch (err) {
    if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") return null;
    throw err;
  }
}

/**
 * Mirrors pristine files under `<stateDir>/backup/original/<path>`. Paths that
 * did not exist get a marker under `<stateDir>/backup/absent/<path>` whose
 * content is the deepest ancestor directory that did exist.
 */
export class NodeBackupStore implements BackupStore {
  constructor(private readonly hasher: FileHasher = new NodeFileHasher()) {}

  private backupDir(install: GameInstall) {
    return path.join(install.stateDir, "backup");
  }

  private originalDir(install: GameInstall) {
    return path.join(this.backupDir(install), "original");
  }

  private absentDir(install: GameInstall) {
    return path.join(this.backupDir(install), "absent");
  }

  async read(install: GameInstall, relPath: string): Promise<BackupContent | null> {
    const original = await readOrNull(path.join(this.originalDir(install), relPath));
    if (original) return { kind: "file", data: original };

    const marker = await readOrNull(path.join(this.absentDir(install), relPath));
    if (marker) return { kind: "absent", existingDir: marker.toString("utf-8") };

    return null;
  }

  async capture(install: GameInstall, relPath: string, content: BackupContent): Promise<BackupRef> {
    const existing = await this.read(install, relPath);
    if (existing) return this.refOf(existing);

    if (content.kind === "file") {
      await writeFileAtomic(path.join(this.originalDir(install), relPath), content.data);
    } else {
      await writeFileAtomic(path.join(this.absentDir(install), relPath), content.existingDir);
    }
    return this.refOf(content);
  }

  async list(install: GameInstall): Promise<BackupEntry[]> {
    const out: BackupEntry[] = [];

    const originalRoot = this.originalDir(install);
    const originals: string[] = [];
    await walkFiles(originalRoot, originalRoot, originals);
    for (const rel of originals) {
      const abs = path.join(originalRoot, rel);
      const stat = await fs.stat(abs);
      const hash = await this.hasher.hashFile(abs);
      out.push({
        path: rel,
        ref: { kind: "file", sha256: hash.value, sizeBytes: stat.size },
        capturedAtIso: stat.mtime.toISOString(),
      });
    }

    const absentRoot = this.absentDir(install);
    const absents: string[] = [];
    await walkFiles(absentRoot, absentRoot, absents);
    for (const rel of absents) {
      const stat = await fs.stat(path.join(absentRoot, rel));
      out.push({ path: rel, ref: { kind: "absent" }, capturedAtIso: stat.mtime.toISOString() });
    }

    return out;
  }

  async clear(install: GameInstall): Promise<void> {
    await fs.rm(this.backupDir(install), { recursive: true, force: true });
  }

  private refOf(content: BackupContent): BackupRef {
    if (content.kind === "absent") return { kind: "absent" };
    return {
      kind: "file",
      sha256: this.hasher.hashBuffer(content.data).value,
      sizeBytes: content.data.length,
    };
  }
}
