import type { ModId, OverlayEntry } from "@modlayer/core-domain";

export type ModLayerErrorCode =
  | "NotFound"
  | "InUse"
  | "CorruptArchive"
  | "DanglingModReference"
  | "BackupMissing"
  | "PartialApplyFailure"
  | "UnrecoverableState"
  | "InvalidRequest"
  | "InvalidConfig";

export class ModLayerError extends Error {
  constructor(
    public readonly code: ModLayerErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ModLayerError";
  }
}

export function isModLayerError(err: unknown): err is ModLayerError {
  return err instanceof ModLayerError;
}

export class NotFoundError extends ModLayerError {
  constructor(public readonly kind: "mod" | "profile", public readonly id: string) {
    super("NotFound", `${kind} not found: ${id}`);
    this.name = "NotFoundError";
  }
}

export class InUseError extends ModLayerError {
  constructor(message: string) {
    super("InUse", message);
    this.name = "InUseError";
  }
}

export class CorruptArchiveError extends ModLayerError {
  constructor(public readonly payloadPath: string, reason: string, cause?: unknown) {
    super("CorruptArchive", `corrupt mod payload ${payloadPath}: ${reason}`, { cause });
    this.name = "CorruptArchiveError";
  }
}

export class DanglingModReferenceError extends ModLayerError {
  constructor(public readonly profileId: string, public readonly missing: ModId[]) {
    super(
      "DanglingModReference",
      `profile ${profileId} references unregistered mods: ${missing.join(", ")}`
    );
    this.name = "DanglingModReferenceError";
  }
}

export class BackupMissingError extends ModLayerError {
  constructor(public readonly path: string) {
    super("BackupMissing", `no backup captured for ${path}`);
    this.name = "BackupMissingError";
  }
}

/** The game directory was rolled back; nothing from the failed call remains. */
export class PartialApplyFailureError extends ModLayerError {
  constructor(
    public readonly failedPaths: string[],
    cause?: unknown,
    public readonly overlay?: OverlayEntry[]
  ) {
    super("PartialApplyFailure", `overlay failed for: ${failedPaths.join(", ")}`, { cause });
    this.name = "PartialApplyFailureError";
  }
}

/**
 * The game directory may be half-applied. Only restoreVanilla should be
 * attempted next; callers must not retry the failed operation.
 */
export class UnrecoverableStateError extends ModLayerError {
  constructor(
    message: string,
    public readonly paths: string[] = [],
    cause?: unknown,
    public readonly overlay?: OverlayEntry[]
  ) {
    super("UnrecoverableState", message, { cause });
    this.name = "UnrecoverableStateError";
  }
}

export class InvalidRequestError extends ModLayerError {
  constructor(message: string) {
    super("InvalidRequest", message);
    this.name = "InvalidRequestError";
  }
}

export class InvalidConfigError extends ModLayerError {
  constructor(message: string, cause?: unknown) {
    super("InvalidConfig", message, { cause });
    this.name = "InvalidConfigError";
  }
}
