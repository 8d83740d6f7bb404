/**
 * Database driver interface.
 *
 * Every implementation runs raw SQL files; there is no ORM.
 */
import type { AppScope } from "../credentials/scopes.js";

export interface DatabaseDriver {
  /** Base backend name of this handle (`mysql`, `postgres`, `sqlite`). */
  readonly dialect: string;

  /** Whether database `name` (or the one this handle is bound to) exists. */
  exists(name?: string): Promise<boolean>;

  /** Create database `name`. Returns false when the server refused. */
  create(name: string): Promise<boolean>;

  /** Drop the database this handle was opened for. */
  drop(): Promise<boolean>;

  /** Re-bind the handle to database `name`. */
  connect(name: string): Promise<void>;

  /**
   * Execute the SQL file at `path` against the bound database.
   * Throws ModuleAlreadyExistsError when its objects are already there.
   */
  createModule(path: string): Promise<void>;

  /** Create the application user and grant it access to its database. */
  ensureUser(app: AppScope): Promise<boolean>;

  /** Grant all privileges on a table or sequence to `user`. */
  grantTableOptions(user: string, object: string): Promise<void>;

  /**
   * Load the migration scripts into `dest`, then copy every table in
   * `tables` from `source` through the scripts' copy procedure.
   */
  migrate(
    scripts: readonly string[],
    source: string,
    dest: string,
    tables: readonly string[],
    procedure: string,
  ): Promise<void>;

  /** Close the connection / release resources. */
  destroy(): Promise<void>;
}

export interface OpenOptions {
  /** Database the handle is for; the URL's own database is used otherwise. */
  database?: string;
}

/**
 * Opens a driver handle for a connection URL. Implementations test the
 * connection on open and raise AccessDeniedError, ConnectError or
 * ArgumentError before returning.
 */
export type DatabaseOpener = (
  url: string,
  options?: OpenOptions,
) => Promise<DatabaseDriver>;
