import type { ModId, OverlayEntry } from "@modlayer/core-domain";

import type { ResolvedSet } from "./conflict-detector";
import { comparePaths } from "../value-objects/rel-path";

export type OverlayOp =
  /** Path not overlaid yet: capture the backup, then write. */
  | { kind: "install"; path: string; modId: ModId; hash: string }
  /** Path overlaid by another mod, or by an updated version of the same mod. */
  | { kind: "replace"; path: string; modId: ModId; hash: string; previous: OverlayEntry }
  /** Path overlaid but no longer wanted: restore the pristine file. */
  | { kind: "revert"; path: string; previous: OverlayEntry };

export type OverlayPlan = {
  ops: OverlayOp[];
  unchanged: OverlayEntry[];
};

const KIND_ORDER: Record<OverlayOp["kind"], number> = { revert: 0, replace: 1, install: 2 };

/**
 * Diff between the applied overlay and the target resolved set. Entries whose
 * owner and content both match are left out of `ops`, so re-applying the same
 * target plans no I/O.
 */
export function planOverlay(current: readonly OverlayEntry[], target: ResolvedSet): OverlayPlan {
  const ops: OverlayOp[] = [];
  const unchanged: OverlayEntry[] = [];
  const currentByPath = new Map(current.map((e) => [e.path, e]));

  for (const entry of current) {
    const wanted = target.get(entry.path);
    if (!wanted) {
      ops.push({ kind: "revert", path: entry.path, previous: entry });
    } else if (wanted.modId !== entry.modId || wanted.hash !== entry.contentHash) {
      ops.push({ kind: "replace", path: entry.path, modId: wanted.modId, hash: wanted.hash, previous: entry });
    } else {
      unchanged.push(entry);
    }
  }

  for (const wanted of target.values()) {
    if (currentByPath.has(wanted.path)) continue;
    ops.push({ kind: "install", path: wanted.path, modId: wanted.modId, hash: wanted.hash });
  }

  ops.sort((a, b) => KIND_ORDER[a.kind] - KIND_ORDER[b.kind] || comparePaths(a.path, b.path));
  unchanged.sort((a, b) => comparePaths(a.path, b.path));

  return { ops, unchanged };
}
