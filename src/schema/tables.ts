/**
 * Decides which modules a schema run installs.
 */
import type { Logger } from "../core/logger.js";
import type { Catalog } from "./catalog.js";

export const ALL_MODULES = "all";

export type TableSource = "explicit" | "all" | "configured" | "standard";

export interface TableSet {
  source: TableSource;
  modules: string[];
}

function unique(names: Iterable<string>): string[] {
  return [...new Set(names)];
}

/**
 * First match wins: an explicit list, then the `database_modules` setting
 * (`all` meaning every module with a creation script), then the catalog's
 * standard set. Extra modules are only installed when asked for.
 */
export async function resolveTableSet(
  explicit: readonly string[],
  configured: string | undefined,
  catalog: Catalog,
  listAvailable: () => Promise<string[]>,
  logger: Logger,
): Promise<TableSet> {
  if (explicit.length > 0) {
    return { source: "explicit", modules: unique(explicit) };
  }

  if (configured !== undefined) {
    const line = configured.trim().toLowerCase();
    if (line === ALL_MODULES) {
      logger.debug("creating all tables");
      return { source: "all", modules: await listAvailable() };
    }
    if (line !== "") {
      logger.debug("creating custom tables");
      return { source: "configured", modules: unique(line.split(/\s+/)) };
    }
  }

  logger.debug("creating standard tables");
  return { source: "standard", modules: [...catalog.modules.standard] };
}
