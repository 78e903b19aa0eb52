import fs from "node:fs/promises";
import type { Dirent, Stats } from "node:fs";
import path from "node:path";
import AdmZip from "adm-zip";

import type { ModPayloadReader } from "../ports/mod-payload-reader";
import {
  selectPayloadLayout,
  type ModPayload,
  type PayloadFile,
  type RawPayload,
} from "../value-objects/mod-payload";
import { checkRelPath } from "../value-objects/rel-path";
import { CorruptArchiveError } from "../application/errors";

function toPosix(p: string) {
  return p.replaceAll("\\", "/");
}

async function walkFiles(rootAbs: string, dirAbs: string, out: string[]) {
  const entries: Dirent[] = await fs.readdir(dirAbs, { withFileTypes: true });
  for (const e of entries) {
    const abs = path.join(dirAbs, e.name);
    if (e.isDirectory()) {
      await walkFiles(rootAbs, abs, out);
    } else if (e.isFile()) {
      out.push(abs);
    }
    // symlinks and special files are not part of a payload
  }
}

/**
 * Every raw entry must be a safe relative path, including the ones the layout
 * step leaves out of the file set.
 */
function layout(raw: RawPayload): ModPayload {
  for (const entry of raw.entries) {
    const checked = checkRelPath(entry.path);
    if (!checked.ok) {
      throw new CorruptArchiveError(raw.sourcePath, `entry "${entry.path}": ${checked.reason}`);
    }
  }
  return selectPayloadLayout(raw);
}

/**
 * Reads mod payloads from folders and zip archives. Any extension listed in
 * archiveExtensions is opened as a zip.
 */
export class NodeModPayloadReader implements ModPayloadReader {
  private readonly archiveExtensions: Set<string>;

  constructor(archiveExtensions: readonly string[] = [".zip"]) {
    this.archiveExtensions = new Set(archiveExtensions.map((e) => e.toLowerCase()));
  }

  isArchive(filePath: string): boolean {
    return this.archiveExtensions.has(path.extname(filePath).toLowerCase());
  }

  async read(payloadPath: string): Promise<ModPayload> {
    const abs = path.resolve(payloadPath);

    let stat: Stats;
    try {
      stat = await fs.stat(abs);
    } catch (err) {
      throw new CorruptArchiveError(abs, "cannot be read", err);
    }

    if (stat.isDirectory()) return layout(await this.readFolder(abs));
    if (stat.isFile() && this.isArchive(abs)) return layout(this.readArchive(abs));

    throw new CorruptArchiveError(abs, "not a folder or a supported archive");
  }

  private async readFolder(rootAbs: string): Promise<RawPayload> {
    const entries: PayloadFile[] = [];
    try {
      const files: string[] = [];
      await walkFiles(rootAbs, rootAbs, files);
      for (const abs of files) {
        entries.push({ path: toPosix(path.relative(rootAbs, abs)), data: await fs.readFile(abs) });
      }
    } catch (err) {
      throw new CorruptArchiveError(rootAbs, "folder cannot be read", err);
    }

    return {
      sourceKind: "folder",
      sourcePath: rootAbs,
      defaultName: path.basename(rootAbs),
      entries,
    };
  }

  private readArchive(fileAbs: string): RawPayload {
    const entries: PayloadFile[] = [];
    try {
      const zip = new AdmZip(fileAbs);
      for (const entry of zip.getEntries()) {
        if (entry.isDirectory) continue;
        entries.push({ path: toPosix(entry.entryName), data: entry.getData() });
      }
    } catch (err) {
      throw new CorruptArchiveError(fileAbs, "archive cannot be opened", err);
    }

    return {
      sourceKind: "archive",
      sourcePath: fileAbs,
      defaultName: path.basename(fileAbs, path.extname(fileAbs)),
      entries,
    };
  }
}
