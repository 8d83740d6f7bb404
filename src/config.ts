/**
 * Configuration validation and loading.
 */
import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";

import { LogLevel } from "./core/logger.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const booleanish = z.union([
  z.boolean(),
  z
    .string()
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.enum(["yes", "y", "true", "1", "on", "no", "n", "false", "0", "off"]))
    .transform((v) => ["yes", "y", "true", "1", "on"].includes(v)),
]);

export const ConfigSchema = z.object({
  database_name: z.string().min(1).optional(),
  database_url: z.string().min(1).optional(),
  database_admin_url: z.string().min(1).optional(),
  /** Space-separated module list, or `all`. */
  database_modules: z.string().optional(),
  database_schema_path: z.string().min(1).optional(),
  database_force_drop: booleanish.optional(),
  schema_install_path: z.string().min(1).default("/usr/share/opensips"),
  log_level: z.nativeEnum(LogLevel).default(LogLevel.INFO),
});

export type Config = z.infer<typeof ConfigSchema>;

export type ConfigKey = keyof Config;

export const DEFAULT_CONFIG_FILE = "./sipdb.json";

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export function parseConfig(raw: Record<string, unknown>): Config {
  return ConfigSchema.parse(raw);
}

/** Split `key=value` override pairs as given on the command line. */
export function parseOverrides(pairs: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) throw new Error(`Invalid option override (expected key=value): ${pair}`);
    out[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }
  return out;
}

/**
 * Read the JSON config file (when present) and apply overrides on top.
 * An explicitly named file must exist; the default one is optional.
 */
export function loadConfig(
  path: string | undefined,
  overrides: Record<string, string> = {},
): Config {
  const file = path ?? DEFAULT_CONFIG_FILE;
  let raw: Record<string, unknown> = {};
  if (path !== undefined || existsSync(file)) {
    const parsed: unknown = JSON.parse(readFileSync(file, "utf-8"));
    raw = z.record(z.unknown()).parse(parsed);
  }
  return parseConfig({ ...raw, ...overrides });
}
