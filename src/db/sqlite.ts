/**
 * SQLite driver using better-sqlite3.
 *
 * A URL `sqlite:///var/lib/sipdb/telephony` names the database file
 * `telephony` inside `/var/lib/sipdb`; sibling files are sibling databases.
 * SQLite has no users, so user bootstrap and grants are no-ops.
 */
import { constants, accessSync, existsSync, unlinkSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import Database from "better-sqlite3";

import {
  ConnectError,
  type DatabaseError,
  ModuleAlreadyExistsError,
  UnsupportedBackendError,
  describeError,
} from "../core/exceptions.js";
import type { DatabaseDriver, OpenOptions } from "./backend.js";
import { type ErrorCodeTable, classifyError, errorCode } from "./errors.js";
import { getUrlPath } from "./url.js";

const SQLITE_ERROR_CODES: ErrorCodeTable = {
  accessDenied: new Set(["SQLITE_PERM", "SQLITE_READONLY", "SQLITE_AUTH", "EACCES", "EPERM"]),
  alreadyExists: new Set(["SQLITE_CONSTRAINT_UNIQUE", "SQLITE_CONSTRAINT_PRIMARYKEY"]),
  connect: new Set(["SQLITE_CANTOPEN", "ENOENT", "ENOTDIR"]),
};

const ALREADY_EXISTS_PATTERNS = [
  /table .* already exists/i,
  /index .* already exists/i,
  /trigger .* already exists/i,
  /view .* already exists/i,
];

export function classifySQLiteError(err: unknown): DatabaseError {
  const message = describeError(err);
  if (errorCode(err) === "SQLITE_ERROR" && ALREADY_EXISTS_PATTERNS.some((p) => p.test(message))) {
    return new ModuleAlreadyExistsError(message, { cause: err });
  }
  return classifyError(err, null, SQLITE_ERROR_CODES);
}

export class SQLiteDriver implements DatabaseDriver {
  readonly dialect = "sqlite";
  private dir: string;
  private database: string | null;
  private db: Database.Database | null = null;

  private constructor(dir: string, database: string | null) {
    this.dir = dir;
    this.database = database;
  }

  static async open(url: string, options: OpenOptions = {}): Promise<SQLiteDriver> {
    const path = getUrlPath(url);
    const dir = dirname(path);
    try {
      accessSync(dir, constants.R_OK | constants.W_OK);
    } catch (err) {
      throw classifySQLiteError(err);
    }
    const name = basename(path);
    return new SQLiteDriver(dir, options.database ?? (name || null));
  }

  private file(name: string): string {
    return join(this.dir, name);
  }

  private handle(): Database.Database {
    if (this.db) return this.db;
    if (!this.database) {
      throw new ConnectError("No SQLite database selected");
    }
    try {
      this.db = new Database(this.file(this.database), { fileMustExist: true });
    } catch (err) {
      throw classifySQLiteError(err);
    }
    return this.db;
  }

  async exists(name?: string): Promise<boolean> {
    const db = name ?? this.database;
    return db ? existsSync(this.file(db)) : false;
  }

  async create(name: string): Promise<boolean> {
    try {
      new Database(this.file(name)).close();
    } catch (err) {
      throw classifySQLiteError(err);
    }
    return true;
  }

  async drop(): Promise<boolean> {
    if (!this.database) return false;
    await this.destroy();
    try {
      unlinkSync(this.file(this.database));
    } catch (err) {
      throw classifySQLiteError(err);
    }
    return true;
  }

  async connect(name: string): Promise<void> {
    await this.destroy();
    this.database = name;
    this.handle();
  }

  async createModule(path: string): Promise<void> {
    const text = await readFile(path, "utf-8");
    const db = this.handle();
    try {
      db.exec(text);
    } catch (err) {
      if (db.inTransaction) db.exec("ROLLBACK");
      throw classifySQLiteError(err);
    }
  }

  async ensureUser(): Promise<boolean> {
    return true;
  }

  async grantTableOptions(): Promise<void> {
    // no users, nothing to grant
  }

  async migrate(): Promise<void> {
    throw new UnsupportedBackendError(this.dialect, "mysql");
  }

  async destroy(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
