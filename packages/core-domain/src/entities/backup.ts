export type BackupRef =
  | { kind: "file"; sha256: string; sizeBytes: number }
  | { kind: "absent" };

/** Pristine content of one game path, captured before its first overlay. */
export interface BackupEntry {
  path: string;
  ref: BackupRef;
  capturedAtIso: string;
}
