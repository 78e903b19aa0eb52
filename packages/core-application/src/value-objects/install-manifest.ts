import { z } from "zod";
import type {
  BackupEntry,
  BackupRef,
  GameInstall,
  Mod,
  OverlayEntry,
  Profile,
} from "@modlayer/core-domain";

export const INSTALL_MANIFEST_VERSION = 1;

const backupRefSchema: z.ZodType<BackupRef> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("file"), sha256: z.string(), sizeBytes: z.number().int().nonnegative() }),
  z.object({ kind: z.literal("absent") }),
]);

const modSchema: z.ZodType<Mod> = z.object({
  id: z.string().min(1),
  name: z.string(),
  files: z.array(
    z.object({
      path: z.string().min(1),
      hash: z.string(),
      sizeBytes: z.number().int().nonnegative(),
    })
  ),
  installedAtIso: z.string(),
  metadata: z.object({
    description: z.string().optional(),
    version: z.string().optional(),
    author: z.string().optional(),
    game: z.string().optional(),
    category: z.string().optional(),
  }),
  source: z.object({
    kind: z.enum(["folder", "archive"]),
    path: z.string(),
  }),
});

const profileSchema: z.ZodType<Profile> = z.object({
  id: z.string().min(1),
  name: z.string(),
  entries: z.array(z.object({ modId: z.string(), enabled: z.boolean() })),
  createdAtIso: z.string(),
  lastModifiedIso: z.string(),
});

const overlayEntrySchema: z.ZodType<OverlayEntry> = z.object({
  path: z.string().min(1),
  modId: z.string(),
  contentHash: z.string(),
  backupRef: backupRefSchema,
});

const backupEntrySchema: z.ZodType<BackupEntry> = z.object({
  path: z.string().min(1),
  ref: backupRefSchema,
  capturedAtIso: z.string(),
});

export const installManifestSchema = z.object({
  version: z.literal(INSTALL_MANIFEST_VERSION),
  installId: z.string(),
  gameId: z.string(),
  mods: z.array(modSchema),
  profiles: z.array(profileSchema),
  activeProfileId: z.string().nullable(),
  overlay: z.array(overlayEntrySchema),
  backups: z.array(backupEntrySchema),
  needsRecovery: z.boolean(),
});

/**
 * Per-install index of registered mods, profiles, the applied overlay and the
 * backup index. A cache: backups on disk win over `backups` here.
 */
export type InstallManifest = z.infer<typeof installManifestSchema>;

export function createEmptyManifest(install: GameInstall): InstallManifest {
  return {
    version: INSTALL_MANIFEST_VERSION,
    installId: install.id,
    gameId: install.gameId,
    mods: [],
    profiles: [],
    activeProfileId: null,
    overlay: [],
    backups: [],
    needsRecovery: false,
  };
}
