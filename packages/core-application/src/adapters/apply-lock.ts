import fs from "fs/promises";
import path from "path";

import type { GameInstall } from "@modlayer/core-domain";

// Present on disk for as long as a mutation runs. Finding it before a
// mutation starts means the previous one never finished.
export function applyLockPath(install: GameInstall) {
  return path.join(install.stateDir, "state", "applying.lock");
}

export async function setApplyLock(install: GameInstall): Promise<void> {
  const fp = applyLockPath(install);
  await fs.mkdir(path.dirname(fp), { recursive: true });
  await fs.writeFile(fp, String(Date.now()), "utf-8");
}

export async function clearApplyLock(install: GameInstall): Promise<void> {
  const fp = applyLockPath(install);
  await fs.rm(fp, { force: true });
}

export async function isApplyLocked(install: GameInstall): Promise<boolean> {
  const fp = applyLockPath(install);
  try {
    await fs.stat(fp);
    return true;
  } catch {
    return false;
  }
}
