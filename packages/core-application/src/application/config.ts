import fs from "node:fs/promises";
import { z } from "zod";

import { InvalidConfigError } from "./errors";
import { errorCode } from "./default-io-retry-policy";

const logLevelSchema = z.enum(["error", "warn", "info", "debug"]);

export const modLayerConfigSchema = z.object({
  stateDirName: z
    .string()
    .min(1)
    .refine((v) => !v.includes("/") && !v.includes("\\") && v !== "." && v !== "..", {
      message: "must be a single directory name",
    })
    .default(".modlayer"),
  logLevel: logLevelSchema.default("info"),
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).max(10).default(3),
      baseDelayMs: z.number().int().nonnegative().default(25),
      maxDelayMs: z.number().int().nonnegative().default(400),
      jitterRatio: z.number().min(0).max(1).default(0.2),
    })
    .default({}),
  archiveExtensions: z
    .array(z.string().regex(/^\.[a-z0-9]+$/i))
    .default([".zip"])
    .transform((exts) => exts.map((e) => e.toLowerCase())),
  dropSettleMs: z.number().int().nonnegative().default(1500),
});

export type ModLayerConfig = z.infer<typeof modLayerConfigSchema>;

export const LOG_LEVEL_ENV = "MODLAYER_LOG_LEVEL";

export function parseConfig(raw: unknown): ModLayerConfig {
  const res = modLayerConfigSchema.safeParse(raw);
  if (!res.success) {
    const details = res.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new InvalidConfigError(`invalid configuration: ${details}`, res.error);
  }
  return res.data;
}

export function defaultConfig(): ModLayerConfig {
  return parseConfig({});
}

/**
 * Reads the optional JSON config file and merges it over the defaults.
 * A missing file is not an error. The log level can be forced through
 * MODLAYER_LOG_LEVEL.
 */
export async function loadConfig(
  filePath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<ModLayerConfig> {
  let raw: unknown = {};

  if (filePath) {
    try {
      raw = JSON.parse(await fs.readFile(filePath, "utf-8"));
    } catch (err) {
      if (errorCode(err) !== "ENOENT") {
        throw new InvalidConfigError(`cannot read config ${filePath}`, err);
      }
    }
  }

  const config = parseConfig(raw);

  const envLevel = env[LOG_LEVEL_ENV];
  if (envLevel) {
    const level = logLevelSchema.safeParse(envLevel.toLowerCase());
    if (!level.success) {
      throw new InvalidConfigError(`${LOG_LEVEL_ENV} must be one of error, warn, info, debug`);
    }
    config.logLevel = level.data;
  }

  return config;
}
