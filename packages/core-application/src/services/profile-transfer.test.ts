import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ProfileTransfer, uniqueImportName } from "./profile-transfer";
import { InvalidRequestError } from "../application/errors";
import { makeTempDir, removeDir, writeTree } from "../testing/fixtures";
import { createTestStack, type TestStack } from "../testing/stack";

describe("profile-transfer", () => {
  let root = "";
  let t: TestStack;
  let transfer: ProfileTransfer;

  beforeEach(async () => {
    root = await makeTempDir();
    t = createTestStack(root);
    transfer = new ProfileTransfer({ profiles: t.profiles, logger: t.logger, now: () => t.clock.now() });
    await t.addMod("m1", { "a.dat": "a" });
    await t.addMod("m2", { "b.dat": "b" });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("exports name, order and flags", async () => {
    const p = t.profiles.create(t.state, "Racing", [
      { modId: "m2", enabled: true },
      { modId: "m1", enabled: false },
    ]);
    const file = path.join(root, "exports", "racing.json");

    await transfer.exportTo(t.state, p.id, file);

    expect(JSON.parse(await fs.readFile(file, "utf-8"))).toEqual({
      format: "modlayer-profile",
      version: 1,
      name: "Racing",
      exportedAtIso: "2024-05-01T10:00:00.000Z",
      mods: [
        { id: "m2", name: "m2", enabled: true },
        { id: "m1", name: "m1", enabled: false },
      ],
    });
  });

  it("imports as a new profile with a unique name", async () => {
    const p = t.profiles.create(t.state, "Racing", [{ modId: "m1", enabled: true }]);
    const file = path.join(root, "racing.json");
    await transfer.exportTo(t.state, p.id, file);

    const imported = await transfer.importFrom(t.state, file);

    expect(imported.id).not.toBe(p.id);
    expect(imported.name).toBe("Racing (Imported 1)");
    expect(imported.entries).toEqual([{ modId: "m1", enabled: true }]);
  });

  it("keeps unknown mods, drops repeated ones and logs the unknown", async () => {
    await writeTree(root, {
      "shared.json": JSON.stringify({
        format: "modlayer-profile",
        version: 1,
        name: "Shared",
        mods: [{ id: "m1" }, { id: "elsewhere", enabled: false }, { id: "m1", enabled: false }],
      }),
    });

    const imported = await transfer.importFrom(t.state, path.join(root, "shared.json"));

    expect(imported.name).toBe("Shared");
    expect(imported.entries).toEqual([
      { modId: "m1", enabled: true },
      { modId: "elsewhere", enabled: false },
    ]);
    expect(t.logger.records).toContainEqual({
      level: "warn",
      scope: "profile-transfer",
      message: "imported profile references unregistered mods",
      fields: { mods: ["elsewhere"] },
    });
  });

  it("rejects files that are not exported profiles", async () => {
    await writeTree(root, { "other.json": '{"format":"something-else"}', "broken.json": "{" });

    await expect(transfer.importFrom(t.state, path.join(root, "other.json"))).rejects.toThrow(
      `${path.join(root, "other.json")} is not an exported profile`
    );
    await expect(transfer.importFrom(t.state, path.join(root, "broken.json"))).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(transfer.importFrom(t.state, path.join(root, "missing.json"))).rejects.toBeInstanceOf(InvalidRequestError);
  });

  it("numbers import names past existing ones", () => {
    expect(uniqueImportName(new Set(["A"]), "B")).toBe("B");
    expect(uniqueImportName(new Set(["A", "A (Imported 1)"]), "A")).toBe("A (Imported 2)");
  });
});
