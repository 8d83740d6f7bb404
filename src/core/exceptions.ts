/**
 * Error taxonomy for driver, asset and migration failures.
 */

// ---------------------------------------------------------------------------
// Driver errors
// ---------------------------------------------------------------------------

/** Base class for every failure raised by a database driver. */
export class DatabaseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DatabaseError";
  }
}

/** Malformed connection URL. */
export class ArgumentError extends DatabaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ArgumentError";
  }
}

/** Host unreachable or connection refused. */
export class ConnectError extends DatabaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectError";
  }
}

/** Authenticated (or authenticating) user lacks the privileges it needs. */
export class AccessDeniedError extends DatabaseError {
  user: string | null;

  constructor(user: string | null, message?: string, options?: { cause?: unknown }) {
    super(message ?? `Access denied for user ${user ?? "<anonymous>"}`, options);
    this.name = "AccessDeniedError";
    this.user = user;
  }
}

/** The URL names a driver this tool has no backend for. */
export class NoSuchModuleError extends DatabaseError {
  driver: string;

  constructor(driver: string, supported: readonly string[]) {
    super(
      `Unsupported database backend: ${driver} (supported: ${supported.join(", ")})`,
    );
    this.name = "NoSuchModuleError";
    this.driver = driver;
  }
}

/** A schema object created by a module script is already present. */
export class ModuleAlreadyExistsError extends DatabaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModuleAlreadyExistsError";
  }
}

// ---------------------------------------------------------------------------
// Asset errors
// ---------------------------------------------------------------------------

export class SchemaNotFoundError extends Error {
  backend: string;

  constructor(backend: string, message?: string) {
    super(message ?? `Failed to locate ${backend} DB schema files`);
    this.name = "SchemaNotFoundError";
    this.backend = backend;
  }
}

export class MissingStandardSchemaError extends Error {
  path: string;

  constructor(path: string) {
    super(`Cannot find standard DB schema file: ${path}`);
    this.name = "MissingStandardSchemaError";
    this.path = path;
  }
}

export class MissingMigrationScriptsError extends Error {
  missing: string[];

  constructor(missing: string[]) {
    super(`SQL migration scripts are missing: ${missing.join(", ")}`);
    this.name = "MissingMigrationScriptsError";
    this.missing = missing;
  }
}

// ---------------------------------------------------------------------------
// Migration preconditions
// ---------------------------------------------------------------------------

export class UnsupportedBackendError extends Error {
  backend: string;

  constructor(backend: string, supported: string) {
    super(`Migration is only available for ${supported}, not ${backend}`);
    this.name = "UnsupportedBackendError";
    this.backend = backend;
  }
}

export class SourceNotFoundError extends Error {
  database: string;

  constructor(database: string) {
    super(`The source database (${database}) does not exist`);
    this.name = "SourceNotFoundError";
    this.database = database;
  }
}

/** Render an unknown thrown value for a log line. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
