import type { GameInstall } from "@modlayer/core-domain";
import type { InstallManifest } from "../value-objects/install-manifest";

export interface InstallStateStore {
  /** Returns null when the install has no manifest yet. */
  load(install: GameInstall): Promise<InstallManifest | null>;
  save(install: GameInstall, manifest: InstallManifest): Promise<void>;
  /** Moves an unreadable manifest aside; returns where it went, or null when there was none. */
  quarantine(install: GameInstall): Promise<string | null>;
}
