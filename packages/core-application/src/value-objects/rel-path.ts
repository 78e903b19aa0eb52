export type RelPathCheck =
  | { ok: true; path: string }
  | { ok: false; reason: string };

/**
 * Normalizes a path declared by a mod into the posix form used as overlay key.
 * Anything that could land outside the game root is rejected.
 */
export function checkRelPath(raw: string): RelPathCheck {
  if (raw.includes("\0")) return { ok: false, reason: "contains a NUL byte" };

  const slashed = raw.replaceAll("\\", "/");
  if (slashed.startsWith("/")) return { ok: false, reason: "absolute path" };
  if (/^[a-zA-Z]:/.test(slashed)) return { ok: false, reason: "absolute path" };

  const segments: string[] = [];
  for (const seg of slashed.split("/")) {
    if (seg === "" || seg === ".") continue;
    if (seg === "..") return { ok: false, reason: "escapes the install root" };
    segments.push(seg);
  }

  if (segments.length === 0) return { ok: false, reason: "empty path" };
  return { ok: true, path: segments.join("/") };
}

export function normalizeRelPath(raw: string): string {
  const res = checkRelPath(raw);
  if (!res.ok) throw new Error(`unsafe relative path "${raw}": ${res.reason}`);
  return res.path;
}

/** True when relPath is dir itself or lives below it. */
export function isWithin(relPath: string, dir: string): boolean {
  return relPath === dir || relPath.startsWith(`${dir}/`);
}

/** Ordinal comparison, so path ordering does not depend on the host locale. */
export function comparePaths(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
