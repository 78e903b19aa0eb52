import fs from "node:fs/promises";
import path from "node:path";

import type { GameInstall } from "@modlayer/core-domain";
import type { InstallStateStore } from "../ports/install-state-store";
import { installManifestSchema, type InstallManifest } from "../value-objects/install-manifest";
import { UnrecoverableStateError } from "../application/errors";
import { errorCode } from "../application/default-io-retry-policy";
import { writeFileAtomic } from "../infra/write-file-atomic";

export class NodeInstallStateStore implements InstallStateStore {
  manifestPath(install: GameInstall) {
    return path.join(install.stateDir, "manifest.json");
  }

  async load(install: GameInstall): Promise<InstallManifest | null> {
    const fp = this.manifestPath(install);

    let raw: string;
    try {
      raw = await fs.readFile(fp, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new UnrecoverableStateError(`install manifest is not valid JSON: ${fp}`, [], err);
    }

    const parsed = installManifestSchema.safeParse(json);
    if (!parsed.success) {
      throw new UnrecoverableStateError(`install manifest has an unexpected shape: ${fp}`, [], parsed.error);
    }
    return parsed.data;
  }

  async save(install: GameInstall, manifest: InstallManifest): Promise<void> {
    await writeFileAtomic(this.manifestPath(install), JSON.stringify(manifest, null, 2));
  }

  async quarantine(install: GameInstall): Promise<string | null> {
    const fp = this.manifestPath(install);
    const stamp = new Date().toISOString().replaceAll(":", "").replaceAll(".", "");
    const target = path.join(install.stateDir, `manifest.${stamp}.corrupt.json`);
    try {
      await fs.rename(fp, target);
      return target;
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw err;
    }
  }
}
