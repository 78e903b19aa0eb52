import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { GameInstall } from "@modlayer/core-domain";
import { NodeInstallStateStore } from "./node-install-state-store";
import { createEmptyManifest } from "../value-objects/install-manifest";
import { UnrecoverableStateError } from "../application/errors";
import { makeMod, makeTempDir, removeDir, testInstall, writeTree } from "../testing/fixtures";

describe("node-install-state-store", () => {
  let root = "";
  let install: GameInstall;
  const store = new NodeInstallStateStore();

  beforeEach(async () => {
    root = await makeTempDir();
    install = testInstall(root);
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("returns null before anything was saved", async () => {
    expect(await store.load(install)).toBeNull();
  });

  it("round-trips a manifest", async () => {
    const manifest = createEmptyManifest(install);
    manifest.mods.push(makeMod("m1", { "a.txt": "a" }));
    manifest.overlay.push({ path: "a.txt", modId: "m1", contentHash: "h", backupRef: { kind: "absent" } });

    await store.save(install, manifest);

    expect(await store.load(install)).toEqual(manifest);
  });

  it("refuses corrupt or foreign documents", async () => {
    await writeTree(root, { ".modlayer/manifest.json": "{ truncated" });
    await expect(store.load(install)).rejects.toThrow(
      `install manifest is not valid JSON: ${store.manifestPath(install)}`
    );

    await writeTree(root, { ".modlayer/manifest.json": JSON.stringify({ version: 2 }) });
    await expect(store.load(install)).rejects.toBeInstanceOf(UnrecoverableStateError);
  });

  it("moves an unreadable manifest aside", async () => {
    await writeTree(root, { ".modlayer/manifest.json": "{ truncated" });

    const movedTo = await store.quarantine(install);

    expect(movedTo).not.toBeNull();
    expect(path.dirname(movedTo ?? "")).toBe(install.stateDir);
    expect(await fs.readFile(movedTo ?? "", "utf-8")).toBe("{ truncated");
    expect(await store.load(install)).toBeNull();
    expect(await store.quarantine(install)).toBeNull();
  });
});
