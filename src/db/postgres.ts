/**
 * PostgreSQL driver using postgres-js.
 */
import { readFile } from "node:fs/promises";
import postgres from "postgres";

import { type DatabaseError, UnsupportedBackendError } from "../core/exceptions.js";
import type { AppScope } from "../credentials/scopes.js";
import type { DatabaseDriver, OpenOptions } from "./backend.js";
import { type ErrorCodeTable, NETWORK_ERROR_CODES, classifyError } from "./errors.js";
import { getUrlDb, getUrlUser, setUrlDb, setUrlDriver } from "./url.js";

const DEFAULT_TEMPLATE = "template1";

// SQLSTATE codes, see the "Errors" appendix of the PostgreSQL manual.
const POSTGRES_ERROR_CODES: ErrorCodeTable = {
  accessDenied: new Set(["28000", "28P01", "42501"]),
  alreadyExists: new Set(["42P07", "42710", "42P06", "23505"]),
  connect: new Set([...NETWORK_ERROR_CODES, "57P03", "08001", "08006"]),
};

export function classifyPostgresError(err: unknown, user: string | null): DatabaseError {
  return classifyError(err, user, POSTGRES_ERROR_CODES);
}

/** Double-quote an identifier. */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export class PostgresDriver implements DatabaseDriver {
  readonly dialect = "postgres";
  private sql: postgres.Sql;
  private url: string;
  private user: string | null;
  private database: string | null;

  private constructor(url: string, database: string | null) {
    this.url = setUrlDriver(url, "postgres");
    this.user = getUrlUser(url);
    this.database = database;
    this.sql = PostgresDriver.client(this.url);
  }

  static async open(url: string, options: OpenOptions = {}): Promise<PostgresDriver> {
    const driver = new PostgresDriver(url, options.database ?? getUrlDb(url));
    try {
      await driver.sql`SELECT 1`;
    } catch (err) {
      await driver.destroy();
      throw classifyPostgresError(err, driver.user);
    }
    return driver;
  }

  private static client(url: string): postgres.Sql {
    return postgres(url, { max: 1, onnotice: () => {} });
  }

  private async run(statement: string): Promise<void> {
    try {
      await this.sql.unsafe(statement);
    } catch (err) {
      throw classifyPostgresError(err, this.user);
    }
  }

  async exists(name?: string): Promise<boolean> {
    const db = name ?? this.database;
    if (!db) return false;
    try {
      const rows = await this.sql`SELECT 1 FROM pg_database WHERE datname = ${db}`;
      return rows.length > 0;
    } catch (err) {
      throw classifyPostgresError(err, this.user);
    }
  }

  async create(name: string): Promise<boolean> {
    await this.run(
      `CREATE DATABASE ${quoteIdent(name)} WITH TEMPLATE ${quoteIdent(DEFAULT_TEMPLATE)}`,
    );
    return true;
  }

  async drop(): Promise<boolean> {
    if (!this.database) return false;
    await this.run(`DROP DATABASE ${quoteIdent(this.database)}`);
    return true;
  }

  async connect(name: string): Promise<void> {
    await this.sql.end();
    this.url = setUrlDb(this.url, name);
    this.database = name;
    this.sql = PostgresDriver.client(this.url);
  }

  async createModule(path: string): Promise<void> {
    const text = await readFile(path, "utf-8");
    await this.run(text);
  }

  async ensureUser(app: AppScope): Promise<boolean> {
    if (!app.user || !app.database) return false;
    const password = app.password ? ` WITH PASSWORD ${quoteLiteral(app.password)}` : "";
    if (!(await this.roleExists(app.user))) {
      await this.run(`CREATE USER ${quoteIdent(app.user)}${password}`);
    } else if (password) {
      await this.run(`ALTER USER ${quoteIdent(app.user)}${password}`);
    }
    await this.run(
      `GRANT ALL PRIVILEGES ON DATABASE ${quoteIdent(app.database)} TO ${quoteIdent(app.user)}`,
    );
    return true;
  }

  private async roleExists(user: string): Promise<boolean> {
    try {
      const rows = await this.sql`SELECT 1 FROM pg_roles WHERE rolname = ${user}`;
      return rows.length > 0;
    } catch (err) {
      throw classifyPostgresError(err, this.user);
    }
  }

  async grantTableOptions(user: string, object: string): Promise<void> {
    await this.run(`GRANT ALL PRIVILEGES ON TABLE ${object} TO ${quoteIdent(user)}`);
  }

  async migrate(): Promise<void> {
    throw new UnsupportedBackendError(this.dialect, "mysql");
  }

  async destroy(): Promise<void> {
    await this.sql.end();
  }
}
