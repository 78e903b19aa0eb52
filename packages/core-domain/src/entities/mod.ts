import type { ModId } from "../value-objects/ids";
import type { ModFileEntry } from "./mod-file-entry";

export type ModSourceKind = "folder" | "archive";

export interface ModSource {
  kind: ModSourceKind;
  path: string;
}

export interface ModMetadata {
  description?: string;
  version?: string;
  author?: string;
  game?: string;
  category?: string;
}

/**
 * A registered mod. Never edited in place: registering a payload with the
 * same id replaces the whole record.
 */
export interface Mod {
  id: ModId;
  name: string;
  files: ModFileEntry[];
  installedAtIso: string;
  metadata: ModMetadata;
  source: ModSource;
}

export interface ModSummary {
  id: ModId;
  name: string;
  version?: string;
  author?: string;
  category?: string;
  fileCount: number;
  installedAtIso: string;
}
