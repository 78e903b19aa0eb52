import fs from "node:fs/promises";
import path from "node:path";

import type { GameInstall } from "@modlayer/core-domain";
import type { GameFiles } from "../ports/game-files";
import { errorCode } from "../application/default-io-retry-policy";
import { writeFileAtomic } from "../infra/write-file-atomic";

function isInside(parentAbs: string, childAbs: string) {
  const rel = path.relative(parentAbs, childAbs);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

export class NodeGameFiles implements GameFiles {
  private resolve(install: GameInstall, relPath: string): string {
    const rootAbs = path.resolve(install.rootPath);
    const targetAbs = path.resolve(rootAbs, relPath);

    if (targetAbs === rootAbs || !isInside(rootAbs, targetAbs)) {
      throw new Error(`Invalid path (outside game root): ${relPath}`);
    }
    if (isInside(path.resolve(install.stateDir), targetAbs)) {
      throw new Error(`Invalid path (inside state directory): ${relPath}`);
    }

    return targetAbs;
  }

  async read(install: GameInstall, relPath: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.resolve(install, relPath));
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw err;
    }
  }

  async write(install: GameInstall, relPath: string, data: Buffer): Promise<void> {
    await writeFileAtomic(this.resolve(install, relPath), data);
  }

  async remove(install: GameInstall, relPath: string, keepDir = ""): Promise<void> {
    const abs = this.resolve(install, relPath);
    await fs.rm(abs, { force: true });

    const rootAbs = path.resolve(install.rootPath);
    const stopAbs = path.resolve(rootAbs, keepDir);
    let dir = path.dirname(abs);

    while (dir !== stopAbs && isInside(stopAbs, dir)) {
      try {
        await fs.rmdir(dir);
      } catch (err) {
        if (errorCode(err) !== "ENOENT") return; // not empty, or held by another process
      }
      dir = path.dirname(dir);
    }
  }

  async deepestExistingDir(install: GameInstall, relPath: string): Promise<string> {
    const segments = relPath.split("/").slice(0, -1);
    const rootAbs = path.resolve(install.rootPath);

    let existing = "";
    for (let i = 0; i < segments.length; i++) {
      const candidate = segments.slice(0, i + 1).join("/");
      try {
        const stat = await fs.stat(path.join(rootAbs, candidate));
        if (!stat.isDirectory()) break;
        existing = candidate;
      } catch (err) {
        if (errorCode(err) === "ENOENT") break;
        throw err;
      }
    }
    return existing;
  }
}
