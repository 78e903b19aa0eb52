import { z } from "zod";
import type { ModMetadata } from "@modlayer/core-domain";

const looseText = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .transform((v) => (v.length > 0 ? v : undefined))
  .optional()
  .nullable();

export const modJsonSchema = z
  .object({
    name: looseText,
    description: looseText,
    version: looseText,
    author: looseText,
    game: looseText,
    category: looseText,
  })
  .passthrough();

export type ParsedModJson = {
  name?: string;
  metadata: ModMetadata;
};

function parseJsonLenient(text: string): unknown {
  const body = text.replace(/^\uFEFF/, "");
  try {
    return JSON.parse(body);
  } catch (strictErr) {
    // trailing commas, stray control chars
    const cleaned = body
      .replace(/,\s*([}\]])/g, "$1")
      .replace(/[\u0000-\u001F\u007F-\u009F]/g, "");
    try {
      return JSON.parse(cleaned);
    } catch {
      throw strictErr;
    }
  }
}

function compact(meta: Record<string, string | null | undefined>): ModMetadata {
  const out: ModMetadata = {};
  if (meta.description) out.description = meta.description;
  if (meta.version) out.version = meta.version;
  if (meta.author) out.author = meta.author;
  if (meta.game) out.game = meta.game;
  if (meta.category) out.category = meta.category;
  return out;
}

/** Parses a mod.json document. Throws when it is not a JSON object. */
export function parseModJson(text: string): ParsedModJson {
  const parsed = modJsonSchema.parse(parseJsonLenient(text));
  const { name, ...rest } = parsed;
  return {
    name: name ?? undefined,
    metadata: compact({
      description: rest.description,
      version: rest.version,
      author: rest.author,
      game: rest.game,
      category: rest.category,
    }),
  };
}

export function slugifyModName(name: string): string {
  const slug = name
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug.length > 0 ? slug : "mod";
}
