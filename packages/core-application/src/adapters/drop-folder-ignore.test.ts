import path from "node:path";
import { describe, it, expect } from "vitest";
import { createDropFolderIgnore } from "./drop-folder-ignore";

describe("drop-folder-ignore", () => {
  const root = path.resolve("/drops");
  const ignore = createDropFolderIgnore(root);

  it("watches the folder itself and its payloads", () => {
    expect(ignore(root)).toBe(false);
    expect(ignore(path.join(root, "pack.zip"))).toBe(false);
    expect(ignore(path.join(root, "Red Livery", "mod.json"))).toBe(false);
  });

  it("ignores everything outside the folder", () => {
    expect(ignore(path.resolve("/elsewhere/pack.zip"))).toBe(true);
    expect(ignore(path.resolve("/drops-old/pack.zip"))).toBe(true);
  });

  it("ignores partial downloads and editor leftovers", () => {
    for (const name of ["pack.zip.part", "pack.zip.crdownload", "pack.tmp", "notes.txt~", ".DS_Store"]) {
      expect(ignore(path.join(root, name))).toBe(true);
    }
  });
});
