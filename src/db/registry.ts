/**
 * Backend registry – maps backend names to lazily loaded driver modules.
 */
import { NoSuchModuleError } from "../core/exceptions.js";
import { baseBackend } from "../credentials/scopes.js";
import type { DatabaseDriver, OpenOptions } from "./backend.js";
import { getUrlDriver } from "./url.js";

// ---------------------------------------------------------------------------
// Backend enum
// ---------------------------------------------------------------------------

export enum Backend {
  MySQL = "mysql",
  Postgres = "postgres",
  SQLite = "sqlite",
}

export const SUPPORTED_BACKENDS: readonly string[] = Object.values(Backend);

export function isBackend(name: string): name is Backend {
  return SUPPORTED_BACKENDS.includes(name);
}

/** Base backend of an identifier such as `mysql+mysql2`. */
export function parseBackend(id: string): Backend {
  const base = baseBackend(id.toLowerCase());
  if (!isBackend(base)) throw new NoSuchModuleError(base, SUPPORTED_BACKENDS);
  return base;
}

/** Base backend of a URL; throws NoSuchModuleError for unknown drivers. */
export function backendOf(url: string): Backend {
  return parseBackend(getUrlDriver(url));
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

type DriverLoader = (url: string, options: OpenOptions) => Promise<DatabaseDriver>;

export const DRIVER_REGISTRY: Record<Backend, DriverLoader> = {
  [Backend.MySQL]: async (url, options) => {
    const { MySQLDriver } = await import("./mysql.js");
    return MySQLDriver.open(url, options);
  },
  [Backend.Postgres]: async (url, options) => {
    const { PostgresDriver } = await import("./postgres.js");
    return PostgresDriver.open(url, options);
  },
  [Backend.SQLite]: async (url, options) => {
    const { SQLiteDriver } = await import("./sqlite.js");
    return SQLiteDriver.open(url, options);
  },
};

/** Open a driver handle for `url`; the default DatabaseOpener. */
export async function openDatabase(
  url: string,
  options: OpenOptions = {},
): Promise<DatabaseDriver> {
  return DRIVER_REGISTRY[backendOf(url)](url, options);
}
