import type { ModId, ProfileId } from "../value-objects/ids";

export interface ProfileEntry {
  modId: ModId;
  enabled: boolean;
}

/** Entries are ordered lowest priority first; later entries win conflicts. */
export interface Profile {
  id: ProfileId;
  name: string;
  entries: ProfileEntry[];
  createdAtIso: string;
  lastModifiedIso: string;
}

export interface ProfileSummary {
  id: ProfileId;
  name: string;
  modCount: number;
  enabledCount: number;
  active: boolean;
  lastModifiedIso: string;
}

export type ProfileStatus =
  | { kind: "none" }
  | { kind: "active"; profileId: ProfileId };
