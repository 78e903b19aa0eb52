import path from "node:path";

/** Predicate for the drop folder watcher: true for paths that are never payloads. */
export function createDropFolderIgnore(rootDir: string) {
  const root = path.resolve(rootDir);

  return (absPath: string) => {
    const p = path.resolve(absPath);

    if (p === root) return false;
    // only look inside the drop folder
    if (!p.startsWith(root + path.sep)) return true;

    const name = path.basename(p).toLowerCase();

    // partial downloads and editor leftovers
    if (name.endsWith("~")) return true;
    if (name.endsWith(".tmp")) return true;
    if (name.endsWith(".part")) return true;
    if (name.endsWith(".crdownload")) return true;
    if (name === ".ds_store") return true;

    return false;
  };
}
