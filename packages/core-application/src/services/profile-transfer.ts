import fs from "node:fs/promises";
import { z } from "zod";
import type { Profile, ProfileId } from "@modlayer/core-domain";

import type { Logger } from "../ports/logger";
import type { InstallManifest } from "../value-objects/install-manifest";
import { InvalidRequestError } from "../application/errors";
import { writeFileAtomic } from "../infra/write-file-atomic";
import type { ProfileManager } from "./profile-manager";

export const PROFILE_EXPORT_FORMAT = "modlayer-profile";

export const profileExportSchema = z.object({
  format: z.literal(PROFILE_EXPORT_FORMAT),
  version: z.literal(1),
  name: z.string().min(1),
  exportedAtIso: z.string().optional(),
  mods: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().optional(),
      enabled: z.boolean().default(true),
    })
  ),
});

export type ProfileExport = z.infer<typeof profileExportSchema>;

export function uniqueImportName(taken: ReadonlySet<string>, base: string): string {
  if (!taken.has(base)) return base;
  let counter = 1;
  while (taken.has(`${base} (Imported ${counter})`)) counter++;
  return `${base} (Imported ${counter})`;
}

export class ProfileTransfer {
  private readonly logger: Logger;

  constructor(private readonly deps: { profiles: ProfileManager; logger: Logger; now?: () => Date }) {
    this.logger = deps.logger.child("profile-transfer");
  }

  toDocument(state: InstallManifest, profileId: ProfileId): ProfileExport {
    const profile = this.deps.profiles.get(state, profileId);
    const names = new Map(state.mods.map((m) => [m.id, m.name]));

    return {
      format: PROFILE_EXPORT_FORMAT,
      version: 1,
      name: profile.name,
      exportedAtIso: (this.deps.now ?? (() => new Date()))().toISOString(),
      mods: profile.entries.map((e) => ({ id: e.modId, name: names.get(e.modId), enabled: e.enabled })),
    };
  }

  async exportTo(state: InstallManifest, profileId: ProfileId, filePath: string): Promise<ProfileExport> {
    const doc = this.toDocument(state, profileId);
    await writeFileAtomic(filePath, JSON.stringify(doc, null, 2));
    this.logger.info("exported profile", { id: profileId, filePath });
    return doc;
  }

  /** Adds the document as a new profile; unknown mod ids are kept and rejected at activation. */
  fromDocument(state: InstallManifest, doc: ProfileExport): Profile {
    const entries: { modId: string; enabled: boolean }[] = [];
    for (const m of doc.mods) {
      if (entries.some((e) => e.modId === m.id)) continue;
      entries.push({ modId: m.id, enabled: m.enabled });
    }

    const known = new Set(state.mods.map((m) => m.id));
    const unknown = entries.map((e) => e.modId).filter((id) => !known.has(id));
    if (unknown.length > 0) {
      this.logger.warn("imported profile references unregistered mods", { mods: unknown });
    }

    const taken = new Set(state.profiles.map((p) => p.name));
    return this.deps.profiles.create(state, uniqueImportName(taken, doc.name), entries);
  }

  async importFrom(state: InstallManifest, filePath: string): Promise<Profile> {
    let json: unknown;
    try {
      json = JSON.parse(await fs.readFile(filePath, "utf-8"));
    } catch (err) {
      throw new InvalidRequestError(`cannot read profile file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const parsed = profileExportSchema.safeParse(json);
    if (!parsed.success) {
      throw new InvalidRequestError(`${filePath} is not an exported profile`);
    }
    return this.fromDocument(state, parsed.data);
  }
}
