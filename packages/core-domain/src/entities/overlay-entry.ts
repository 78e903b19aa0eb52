import type { ModId } from "../value-objects/ids";
import type { FileHash } from "./mod-file-entry";
import type { BackupRef } from "./backup";

export interface OverlayEntry {
  path: string;
  modId: ModId;
  contentHash: FileHash;
  backupRef: BackupRef;
}
