import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { GameInstall } from "@modlayer/core-domain";
import { ArchiveStore } from "./archive-store";
import { NodeBlobStore } from "../adapters/node-blob-store";
import { NodeFileHasher } from "../adapters/node-file-hasher";
import { NodeModPayloadReader } from "../adapters/node-mod-payload-reader";
import type { ModPayloadReader } from "../ports/mod-payload-reader";
import type { ModPayload } from "../value-objects/mod-payload";
import { createEmptyManifest, type InstallManifest } from "../value-objects/install-manifest";
import { CorruptArchiveError, InUseError, InvalidRequestError, NotFoundError } from "../application/errors";
import {
  FixedClock,
  MemoryLogger,
  makeProfile,
  makeTempDir,
  removeDir,
  sha256Hex,
  testInstall,
  writeTree,
} from "../testing/fixtures";

class StaticReader implements ModPayloadReader {
  constructor(private readonly files: Record<string, string>, private readonly metadataText?: string) {}

  async read(payloadPath: string): Promise<ModPayload> {
    return {
      sourceKind: "folder",
      sourcePath: payloadPath,
      defaultName: path.basename(payloadPath),
      metadataText: this.metadataText,
      files: Object.entries(this.files).map(([p, text]) => ({ path: p, data: Buffer.from(text) })),
    };
  }
}

describe("archive-store", () => {
  let root = "";
  let drops = "";
  let install: GameInstall;
  let state: InstallManifest;
  const blobs = new NodeBlobStore();

  function store(reader: ModPayloadReader = new NodeModPayloadReader()) {
    return new ArchiveStore({
      reader,
      blobs,
      hasher: new NodeFileHasher(),
      clock: new FixedClock(),
      logger: new MemoryLogger(),
    });
  }

  async function blobCount() {
    return (await fs.readdir(path.join(install.stateDir, "blobs")).catch(() => [])).length;
  }

  beforeEach(async () => {
    root = await makeTempDir();
    drops = await makeTempDir("modlayer-drops-");
    install = testInstall(root);
    state = createEmptyManifest(install);
  });

  afterEach(async () => {
    await removeDir(root);
    await removeDir(drops);
  });

  it("registers a folder payload with its metadata", async () => {
    await writeTree(drops, {
      "red/mod.json": JSON.stringify({ name: "Red Livery", version: "1.2", author: "someone", game: "TEST-GAME" }),
      "red/Mod/car/livery.dat": "red",
      "red/Mod/car/decal.dat": "decal",
    });

    const { mod, replaced } = await store().register(install, state, path.join(drops, "red"));

    expect(replaced).toBe(false);
    expect(mod).toEqual({
      id: "red-livery",
      name: "Red Livery",
      files: [
        { path: "car/decal.dat", hash: sha256Hex("decal"), sizeBytes: 5 },
        { path: "car/livery.dat", hash: sha256Hex("red"), sizeBytes: 3 },
      ],
      installedAtIso: "2024-05-01T10:00:00.000Z",
      metadata: { version: "1.2", author: "someone", game: "TEST-GAME" },
      source: { kind: "folder", path: path.join(drops, "red") },
    });
    expect(state.mods).toEqual([mod]);
    expect(await blobs.has(install, sha256Hex("red"))).toBe(true);
  });

  it("replaces a mod registered under the same name and drops its unused blobs", async () => {
    const first = store(new StaticReader({ "a.dat": "v1", "keep.dat": "kept" }, '{"name":"Pack"}'));
    const second = store(new StaticReader({ "a.dat": "v2", "b.dat": "new", "keep.dat": "kept" }, '{"name":"Pack"}'));

    await first.register(install, state, "/drops/pack-v1");
    expect(await blobCount()).toBe(2);

    const { mod, replaced } = await second.register(install, state, "/drops/pack-v2");

    expect(replaced).toBe(true);
    expect(state.mods).toEqual([mod]);
    expect(mod.id).toBe("pack");
    expect(mod.files.map((f) => f.path)).toEqual(["a.dat", "b.dat", "keep.dat"]);
    expect(await blobCount()).toBe(3);
    expect(await blobs.has(install, sha256Hex("v1"))).toBe(false);
    expect(await blobs.has(install, sha256Hex("kept"))).toBe(true);
  });

  it("keeps the id when the same payload path is registered again", async () => {
    await store(new StaticReader({ "a.dat": "v1" }, '{"name":"Old Name"}')).register(install, state, "/drops/pack");

    const { mod, replaced } = await store(new StaticReader({ "a.dat": "v2" }, '{"name":"New Name"}')).register(
      install,
      state,
      "/drops/pack"
    );

    expect(replaced).toBe(true);
    expect(mod.id).toBe("old-name");
    expect(state.mods.map((m) => [m.id, m.name])).toEqual([["old-name", "New Name"]]);
  });

  it("gives unrelated mods with the same slug distinct ids", async () => {
    await writeTree(drops, { "Car Mod/a.dat": "first", "car_mod/a.dat": "second", "CAR-MOD/a.dat": "third" });

    const ids: string[] = [];
    for (const folder of ["Car Mod", "car_mod", "CAR-MOD"]) {
      const { mod, replaced } = await store().register(install, state, path.join(drops, folder));
      expect(replaced).toBe(false);
      ids.push(mod.id);
    }

    expect(ids).toEqual(["car-mod", "car-mod-2", "car-mod-3"]);
    expect(state.mods.map((m) => m.name)).toEqual(["Car Mod", "car_mod", "CAR-MOD"]);
    expect(await blobCount()).toBe(3);
  });

  it("refuses to replace a mod of the active profile", async () => {
    await store(new StaticReader({ "a.dat": "v1" }, '{"name":"Pack"}')).register(install, state, "/drops/pack-v1");
    state.profiles.push(makeProfile("p1", ["pack"]));
    state.activeProfileId = "p1";

    await expect(
      store(new StaticReader({ "a.dat": "v2" }, '{"name":"Pack"}')).register(install, state, "/drops/pack-v2")
    ).rejects.toBeInstanceOf(InUseError);

    expect(state.mods.map((m) => m.source.path)).toEqual(["/drops/pack-v1"]);
    expect(await blobCount()).toBe(1);
  });

  it("names mods without mod.json after the payload", async () => {
    const { mod } = await store(new StaticReader({ "a.dat": "x" })).register(install, state, "/drops/My Pack");
    expect(mod.id).toBe("my-pack");
    expect(mod.name).toBe("My Pack");
  });

  const unsafe: [Record<string, string>, string][] = [
    [{ "../evil.dll": "x" }, 'entry "../evil.dll": escapes the install root'],
    [{ "/etc/evil": "x" }, 'entry "/etc/evil": absolute path'],
    [{ ".modlayer/manifest.json": "{}" }, 'entry ".modlayer/manifest.json" targets the reserved .modlayer directory'],
    [{ "a/b.dat": "1", "a\\b.dat": "2" }, 'entry "a/b.dat" is declared twice'],
    [{}, "payload contains no files"],
  ];

  it.each(unsafe)("rejects unsafe payload %#", async (files, reason) => {
    const err = await store(new StaticReader(files)).register(install, state, "/drops/bad").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CorruptArchiveError);
    expect(err).toMatchObject({ message: `corrupt mod payload /drops/bad: ${reason}` });
    expect(state.mods).toEqual([]);
    expect(await blobCount()).toBe(0);
  });

  it("rejects unparsable mod.json", async () => {
    await expect(
      store(new StaticReader({ "a.dat": "x" }, "{ nope")).register(install, state, "/drops/bad")
    ).rejects.toThrow("corrupt mod payload /drops/bad: mod.json cannot be parsed");
  });

  it("rejects mods made for another game", async () => {
    const reader = new StaticReader({ "a.dat": "x" }, '{"name":"Other","game":"other-game"}');
    await expect(store(reader).register(install, state, "/drops/other")).rejects.toBeInstanceOf(InvalidRequestError);
    expect(state.mods).toEqual([]);
  });

  it("lists summaries sorted by name", async () => {
    await store(new StaticReader({ "b.dat": "b" }, '{"name":"Zeta","category":"ui"}')).register(install, state, "/z");
    await store(new StaticReader({ "a.dat": "a" }, '{"name":"Alpha"}')).register(install, state, "/a");

    expect(store().list(state)).toEqual([
      { id: "alpha", name: "Alpha", version: undefined, author: undefined, category: undefined, fileCount: 1, installedAtIso: "2024-05-01T10:00:00.000Z" },
      { id: "zeta", name: "Zeta", version: undefined, author: undefined, category: "ui", fileCount: 1, installedAtIso: "2024-05-01T10:00:00.000Z" },
    ]);
    expect(() => store().get(state, "nope")).toThrow(NotFoundError);
  });

  describe("remove", () => {
    beforeEach(async () => {
      await store(new StaticReader({ "shared.dat": "same", "a.dat": "only a" }, '{"name":"A"}')).register(install, state, "/a");
      await store(new StaticReader({ "shared.dat": "same" }, '{"name":"B"}')).register(install, state, "/b");
    });

    it("deletes the record and the blobs no other mod uses", async () => {
      await store().remove(install, state, "a");

      expect(state.mods.map((m) => m.id)).toEqual(["b"]);
      expect(await blobs.has(install, sha256Hex("only a"))).toBe(false);
      expect(await blobs.has(install, sha256Hex("same"))).toBe(true);
    });

    it("refuses mods referenced by the active profile", async () => {
      state.profiles.push(makeProfile("p1", ["a"], [{ enabled: false }]));
      state.activeProfileId = "p1";

      await expect(store().remove(install, state, "a")).rejects.toBeInstanceOf(InUseError);
      expect(state.mods).toHaveLength(2);
    });

    it("refuses mods that still own overlaid files", async () => {
      state.overlay.push({ path: "a.dat", modId: "a", contentHash: sha256Hex("only a"), backupRef: { kind: "absent" } });
      await expect(store().remove(install, state, "a")).rejects.toThrow("mod a still owns overlaid files");
    });

    it("allows removing mods of inactive profiles", async () => {
      state.profiles.push(makeProfile("p1", ["a"]));
      await store().remove(install, state, "a");
      expect(state.mods.map((m) => m.id)).toEqual(["b"]);
    });
  });
});
