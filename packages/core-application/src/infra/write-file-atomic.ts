import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";

/**
 * Writes through a temp file in the target directory and renames it over the
 * target, so readers never see a half-written file.
 */
export async function writeFileAtomic(absPath: string, data: Buffer | string): Promise<void> {
  await fs.mkdir(path.dirname(absPath), { recursive: true });
  const tmp = `${absPath}.${crypto.randomUUID().slice(0, 8)}.tmp`;
  try {
    await fs.writeFile(tmp, data);
    await fs.rename(tmp, absPath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}
