/**
 * Locates the directory tree holding per-backend SQL schema files:
 *
 *   <root>/<backend>/standard-create.sql
 *   <root>/<backend>/<module>-create.sql
 *   <root>/<backend>/table-migrate.sql, db-migrate.sql
 */
import { existsSync, readdirSync, statSync } from "node:fs";
import { basename, dirname, join } from "node:path";

import {
  MissingMigrationScriptsError,
  SchemaNotFoundError,
} from "../core/exceptions.js";
import type { Logger } from "../core/logger.js";
import type { ParamReader } from "../core/params.js";
import { baseBackend } from "../credentials/scopes.js";

export const STANDARD_SCHEMA_FILE = "standard-create.sql";
export const CREATE_SUFFIX = "-create.sql";
export const MIGRATION_SCRIPTS = ["table-migrate.sql", "db-migrate.sql"] as const;

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

export class SchemaLocator {
  private root: string | null = null;
  private installPath: string;
  private params: ParamReader;
  private logger: Logger;

  constructor(installPath: string, params: ParamReader, logger: Logger) {
    this.installPath = installPath;
    this.params = params;
    this.logger = logger;
  }

  /** The cached schema root, once resolved. */
  get resolvedRoot(): string | null {
    return this.root;
  }

  /** Directory holding `backend`'s SQL files; throws SchemaNotFoundError. */
  async resolve(backendId: string): Promise<string> {
    const backend = baseBackend(backendId);

    if (this.root !== null) return join(this.root, backend);

    if (isFile(join(this.installPath, backend, STANDARD_SCHEMA_FILE))) {
      this.root = this.installPath;
      return join(this.root, backend);
    }

    const supplied = await this.params.read(
      "database_schema_path",
      `Could not locate DB schema files for ${backend}! Custom path`,
    );
    if (supplied === null) {
      throw new SchemaNotFoundError(backend);
    }

    const root = normalizeSchemaRoot(supplied, backend);
    if (!existsSync(root)) {
      throw new SchemaNotFoundError(backend, `Path '${root}' to DB scripts does not exist`);
    }
    if (!isDirectory(root)) {
      throw new SchemaNotFoundError(backend, `Path '${root}' to DB scripts is not a directory`);
    }
    const schemaDir = join(root, backend);
    if (!isDirectory(schemaDir)) {
      throw new SchemaNotFoundError(backend, `Invalid DB scripts dir: '${schemaDir}'`);
    }

    this.logger.debug({ root }, "schema root resolved");
    this.root = root;
    return schemaDir;
  }

  /** Every module with a `<module>-create.sql` file, sorted. */
  async listModules(backendId: string): Promise<string[]> {
    const dir = await this.resolve(backendId);
    return readdirSync(dir)
      .filter((f) => f.endsWith(CREATE_SUFFIX) && isFile(join(dir, f)))
      .map((f) => f.slice(0, -CREATE_SUFFIX.length))
      .sort();
  }

  /** Paths of the two migration scripts; throws when either is missing. */
  async migrationScripts(backendId: string): Promise<string[]> {
    const dir = await this.resolve(backendId);
    const scripts = MIGRATION_SCRIPTS.map((name) => join(dir, name));
    const missing = scripts.filter((p) => !isFile(p));
    if (missing.length > 0) {
      throw new MissingMigrationScriptsError(missing);
    }
    return scripts;
  }
}

/** Strip a trailing separator and a trailing `/<backend>` segment. */
export function normalizeSchemaRoot(path: string, backend: string): string {
  let root = path.length > 1 ? path.replace(/\/+$/, "") : path;
  if (basename(root) === backend) root = dirname(root);
  return root;
}
