import type { GameInstallId } from "../value-objects/ids";

export interface GameInstall {
  id: GameInstallId;
  gameId: string;
  /** Absolute path of the game data directory mods are overlaid onto. */
  rootPath: string;
  /** Absolute path holding the manifest, blobs and backups of this install. */
  stateDir: string;
}
