/**
 * Copies data from a database on the previous schema version into a
 * freshly provisioned one, table by table, following a fixed manifest.
 */
import {
  ModuleAlreadyExistsError,
  SourceNotFoundError,
  UnsupportedBackendError,
  describeError,
} from "../core/exceptions.js";
import type { Logger } from "../core/logger.js";
import { Status } from "../core/types.js";
import type { Credentials } from "../credentials/resolver.js";
import type { DatabaseDriver, DatabaseOpener } from "../db/backend.js";
import { Backend } from "../db/registry.js";
import type { SchemaApplier } from "../schema/applier.js";
import type { MigrationManifest } from "../schema/catalog.js";
import type { SchemaLocator } from "../schema/locator.js";

export type MigrationStep =
  | "validate-backend"
  | "validate-source"
  | "create-destination"
  | "provision-destination"
  | "resolve-scripts"
  | "copy-tables"
  | "done";

export interface MigrationResult {
  status: Status;
  /** Last step entered; the failing one when status is not Ok. */
  step: MigrationStep;
  error?: string;
}

export interface MigratorDeps {
  open: DatabaseOpener;
  applier: SchemaApplier;
  locator: SchemaLocator;
  manifest: MigrationManifest;
  /** Modules provisioned into the destination before copying. */
  modules: readonly string[];
  logger: Logger;
}

class StepFailure extends Error {
  status: Status;

  constructor(message: string, status: Status = Status.Failed) {
    super(message);
    this.name = "StepFailure";
    this.status = status;
  }
}

function statusOf(err: unknown): Status {
  if (err instanceof StepFailure) return err.status;
  if (err instanceof SourceNotFoundError) return Status.NotFound;
  if (err instanceof ModuleAlreadyExistsError) return Status.AlreadyExists;
  return Status.Failed;
}

export class Migrator {
  private deps: MigratorDeps;
  private current: MigrationStep = "validate-backend";

  constructor(deps: MigratorDeps) {
    this.deps = deps;
  }

  private enter(step: MigrationStep): void {
    this.current = step;
    this.deps.logger.debug({ step }, "migration step");
  }

  async migrate(creds: Credentials, source: string, dest: string): Promise<MigrationResult> {
    const { open, logger } = this.deps;
    this.current = "validate-backend";

    let admin: DatabaseDriver;
    try {
      admin = await open(creds.admin.url, { database: dest });
    } catch (err) {
      logger.error(`failed to connect to DB as ${creds.admin.user ?? ""}: ${describeError(err)}`);
      return { status: Status.Failed, step: this.current, error: describeError(err) };
    }

    try {
      await this.run(admin, creds, source, dest);
      return { status: Status.Ok, step: this.current };
    } catch (err) {
      logger.error(describeError(err));
      return { status: statusOf(err), step: this.current, error: describeError(err) };
    } finally {
      await admin.destroy();
    }
  }

  private async run(
    admin: DatabaseDriver,
    creds: Credentials,
    source: string,
    dest: string,
  ): Promise<void> {
    const { applier, locator, manifest, modules, logger } = this.deps;

    this.enter("validate-backend");
    if (admin.dialect !== Backend.MySQL || manifest.backend !== Backend.MySQL) {
      throw new UnsupportedBackendError(admin.dialect, manifest.backend);
    }

    this.enter("validate-source");
    if (!(await admin.exists(source))) {
      throw new SourceNotFoundError(source);
    }

    this.enter("create-destination");
    if (await admin.exists(dest)) {
      throw new StepFailure(
        `the destination database (${dest}) already exists`,
        Status.AlreadyExists,
      );
    }
    logger.info(`Creating database ${dest}...`);
    if (!(await admin.create(dest))) {
      throw new StepFailure(`failed to create database ${dest}`);
    }

    this.enter("provision-destination");
    const report = await applier.apply({
      dbName: dest,
      app: creds.app,
      admin,
      tables: modules,
      includeStandard: true,
    });
    if (report.status !== "ok") {
      throw new StepFailure(report.error ?? `failed to provision ${dest}`);
    }
    const present = report.modules.filter((m) => m.result === "exists");
    if (present.length > 0) {
      throw new ModuleAlreadyExistsError(
        `destination already holds: ${present.map((m) => m.module).join(", ")}`,
      );
    }

    this.enter("resolve-scripts");
    const scripts = await locator.migrationScripts(admin.dialect);
    logger.debug({ scripts }, "migration scripts");

    this.enter("copy-tables");
    logger.info(
      `Migrating all matching tables (${manifest.from} -> ${manifest.to}, ${manifest.tables.length} tables)...`,
    );
    await admin.migrate(scripts, source, dest, manifest.tables, manifest.copyProcedure);
    logger.info(`Finished copying table data into database '${dest}'!`);

    this.enter("done");
  }
}
