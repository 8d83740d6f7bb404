/**
 * Applies module creation scripts to a database.
 *
 * Creation is a best-effort batch: a module that already exists or fails
 * is reported and the next one runs.
 */
import { existsSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { basename, join } from "node:path";

import {
  MissingStandardSchemaError,
  ModuleAlreadyExistsError,
  describeError,
} from "../core/exceptions.js";
import type { Logger } from "../core/logger.js";
import type { ApplyReport, ModuleOutcome } from "../core/types.js";
import type { AppScope } from "../credentials/scopes.js";
import type { DatabaseDriver } from "../db/backend.js";
import { Backend, parseBackend } from "../db/registry.js";
import type { Catalog } from "./catalog.js";
import type { GrantableObjectExtractor } from "./grants.js";
import { CREATE_SUFFIX, STANDARD_SCHEMA_FILE, type SchemaLocator } from "./locator.js";
import { resolveTableSet } from "./tables.js";

export const STANDARD_MODULE = "standard";

export interface ApplyRequest {
  dbName: string;
  app: AppScope;
  /** Admin handle; it is re-bound to `dbName`. */
  admin: DatabaseDriver;
  /** Explicit module list; empty means configured or default modules. */
  tables?: readonly string[];
  includeStandard?: boolean;
}

export interface SchemaApplierDeps {
  locator: SchemaLocator;
  catalog: Catalog;
  extractor: GrantableObjectExtractor;
  /** Value of `database_modules`, if configured. */
  configuredModules: string | undefined;
  logger: Logger;
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

export class SchemaApplier {
  private deps: SchemaApplierDeps;

  constructor(deps: SchemaApplierDeps) {
    this.deps = deps;
  }

  /**
   * Map module → creation script, built before anything runs. Modules
   * without a script come back separately.
   */
  async tableFiles(
    backend: string,
    tables: readonly string[],
    includeStandard: boolean,
  ): Promise<{ files: Map<string, string>; missing: ModuleOutcome[] }> {
    const { locator, catalog, configuredModules, logger } = this.deps;
    const schemaDir = await locator.resolve(backend);
    const files = new Map<string, string>();
    const missing: ModuleOutcome[] = [];

    if (includeStandard) {
      const standard = join(schemaDir, STANDARD_SCHEMA_FILE);
      if (!isFile(standard)) throw new MissingStandardSchemaError(standard);
      files.set(STANDARD_MODULE, standard);
    }

    const set = await resolveTableSet(
      tables,
      configuredModules,
      catalog,
      () => locator.listModules(backend),
      logger,
    );
    logger.debug(`checking tables: ${set.modules.join(" ")}`);

    for (const module of set.modules) {
      // standard-create.sql runs only through includeStandard
      if (module === STANDARD_MODULE || files.has(module)) continue;
      const file = join(schemaDir, `${module}${CREATE_SUFFIX}`);
      if (!isFile(file)) {
        logger.warn(`cannot find SQL file for module ${module}: ${file}`);
        missing.push({ module, result: "missing", file, grants: [] });
        continue;
      }
      files.set(module, file);
    }

    return { files, missing };
  }

  async apply(request: ApplyRequest): Promise<ApplyReport> {
    const { dbName, app, admin } = request;
    const { logger } = this.deps;

    try {
      if (!(await admin.exists(dbName))) {
        logger.warn(`database '${dbName}' does not exist!`);
        return { status: "failed", modules: [], error: `database '${dbName}' does not exist` };
      }
    } catch (err) {
      logger.error(`cannot check database '${dbName}': ${describeError(err)}`);
      return { status: "failed", modules: [], error: describeError(err) };
    }

    let files: Map<string, string>;
    let missing: ModuleOutcome[];
    try {
      ({ files, missing } = await this.tableFiles(
        app.backend,
        request.tables ?? [],
        request.includeStandard ?? true,
      ));
    } catch (err) {
      logger.error(describeError(err));
      return { status: "failed", modules: [], error: describeError(err) };
    }

    try {
      await admin.connect(dbName);
    } catch (err) {
      logger.error(`cannot connect to '${dbName}' as admin: ${describeError(err)}`);
      return { status: "failed", modules: missing, error: describeError(err) };
    }

    const grantAccess = parseBackend(app.backend) === Backend.Postgres;
    const outcomes: ModuleOutcome[] = [...missing];
    for (const [module, file] of files) {
      outcomes.push(await this.applyModule(module, file, admin, grantAccess ? app.user : null));
    }

    return { status: "ok", modules: outcomes };
  }

  private async applyModule(
    module: string,
    file: string,
    admin: DatabaseDriver,
    grantee: string | null,
  ): Promise<ModuleOutcome> {
    const { extractor, logger } = this.deps;
    logger.info(`Running ${basename(file)}...`);

    try {
      await admin.createModule(file);
    } catch (err) {
      if (err instanceof ModuleAlreadyExistsError) {
        logger.error(`${module} table(s) are already created!`);
        return { module, result: "exists", file, grants: [], error: err.message };
      }
      logger.error(`cannot import ${module}: ${describeError(err)}`);
      return { module, result: "failed", file, grants: [], error: describeError(err) };
    }

    const grants: string[] = [];
    if (grantee) {
      try {
        for (const object of extractor.extract(await readFile(file, "utf-8"))) {
          await admin.grantTableOptions(grantee, object);
          grants.push(object);
        }
      } catch (err) {
        logger.error(`cannot grant ${module} access to ${grantee}: ${describeError(err)}`);
        return { module, result: "failed", file, grants, error: describeError(err) };
      }
    }

    logger.info(`${module} tables created`);
    return { module, result: "created", file, grants };
  }
}
