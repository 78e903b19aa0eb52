import type { ModSourceKind } from "@modlayer/core-domain";
import { comparePaths } from "./rel-path";

export type PayloadFile = {
  path: string;
  data: Buffer;
};

/** Every file found in a folder or archive, before the mod root is located. */
export type RawPayload = {
  sourceKind: ModSourceKind;
  sourcePath: string;
  defaultName: string;
  entries: PayloadFile[];
};

export type ModPayload = {
  sourceKind: ModSourceKind;
  sourcePath: string;
  defaultName: string;
  metadataText?: string;
  files: PayloadFile[];
};

const METADATA_FILE = "mod.json";
const ICON_FILE = "icon.png";
const FILES_DIR = "mod";

function toPosix(p: string) {
  return p.replaceAll("\\", "/");
}

function depth(p: string) {
  return p.split("/").length;
}

function basename(p: string) {
  const i = p.lastIndexOf("/");
  return i === -1 ? p : p.slice(i + 1);
}

function dirname(p: string) {
  const i = p.lastIndexOf("/");
  return i === -1 ? "" : p.slice(0, i);
}

function stripPrefix(p: string, prefix: string) {
  return prefix === "" ? p : p.slice(prefix.length + 1);
}

/**
 * Locates the mod root and the file set inside a raw payload.
 *
 * The shallowest `mod.json` marks the mod root. When the root has a `Mod/`
 * directory only its contents are overlaid; otherwise every file under the root
 * except `mod.json` and `icon.png` is. Without `mod.json` the whole payload is
 * the file set.
 */
export function selectPayloadLayout(raw: RawPayload): ModPayload {
  const entries = raw.entries.map((e) => ({ path: toPosix(e.path), data: e.data }));

  const metadataEntry = entries
    .filter((e) => basename(e.path).toLowerCase() === METADATA_FILE)
    .sort((a, b) => depth(a.path) - depth(b.path) || comparePaths(a.path, b.path))[0];

  if (!metadataEntry) {
    return {
      sourceKind: raw.sourceKind,
      sourcePath: raw.sourcePath,
      defaultName: raw.defaultName,
      files: entries,
    };
  }

  const root = dirname(metadataEntry.path);
  const underRoot = entries
    .filter((e) => root === "" || e.path.startsWith(`${root}/`))
    .map((e) => ({ path: stripPrefix(e.path, root), data: e.data }));

  const inFilesDir = underRoot.filter((e) => {
    const first = e.path.split("/")[0] ?? "";
    return e.path.includes("/") && first.toLowerCase() === FILES_DIR;
  });

  const files =
    inFilesDir.length > 0
      ? inFilesDir.map((e) => ({ path: e.path.slice(e.path.indexOf("/") + 1), data: e.data }))
      : underRoot.filter((e) => {
          const lower = e.path.toLowerCase();
          return lower !== METADATA_FILE && lower !== ICON_FILE;
        });

  return {
    sourceKind: raw.sourceKind,
    sourcePath: raw.sourcePath,
    defaultName: raw.defaultName,
    metadataText: metadataEntry.data.toString("utf-8"),
    files,
  };
}
