import { describe, it, expect } from "vitest";
import type { OverlayEntry } from "@modlayer/core-domain";
import { planOverlay } from "./overlay-diff";
import type { ResolvedFile } from "./conflict-detector";

function entry(path: string, modId: string, contentHash: string): OverlayEntry {
  return { path, modId, contentHash, backupRef: { kind: "absent" } };
}

function target(...files: [string, string, string][]): Map<string, ResolvedFile> {
  return new Map(files.map(([path, modId, hash]) => [path, { path, modId, hash, sizeBytes: 1 }]));
}

describe("overlay-diff", () => {
  it("plans nothing when the overlay already matches", () => {
    const current = [entry("a", "m1", "h1"), entry("b", "m1", "h2")];
    const plan = planOverlay(current, target(["a", "m1", "h1"], ["b", "m1", "h2"]));
    expect(plan.ops).toEqual([]);
    expect(plan.unchanged.map((e) => e.path)).toEqual(["a", "b"]);
  });

  it("installs new paths and reverts dropped ones", () => {
    const current = [entry("old", "m1", "h1")];
    const plan = planOverlay(current, target(["new", "m2", "h2"]));
    expect(plan.ops).toEqual([
      { kind: "revert", path: "old", previous: current[0] },
      { kind: "install", path: "new", modId: "m2", hash: "h2" },
    ]);
  });

  it("replaces when the owner or the content changes", () => {
    const current = [entry("a", "m1", "h1"), entry("b", "m1", "h2")];
    const plan = planOverlay(current, target(["a", "m2", "h1"], ["b", "m1", "h9"]));
    expect(plan.ops.map((o) => [o.kind, o.path])).toEqual([
      ["replace", "a"],
      ["replace", "b"],
    ]);
    expect(plan.ops[1]).toMatchObject({ modId: "m1", hash: "h9", previous: current[1] });
  });

  it("orders reverts, then replaces, then installs, each by path", () => {
    const current = [entry("z-keep", "m1", "h"), entry("y-drop", "m1", "h"), entry("b-swap", "m1", "h")];
    const plan = planOverlay(
      current,
      target(["z-keep", "m1", "h"], ["b-swap", "m2", "h"], ["c-add", "m2", "h"], ["a-add", "m2", "h"])
    );
    expect(plan.ops.map((o) => `${o.kind}:${o.path}`)).toEqual([
      "revert:y-drop",
      "replace:b-swap",
      "install:a-add",
      "install:c-add",
    ]);
    expect(plan.unchanged.map((e) => e.path)).toEqual(["z-keep"]);
  });
});
