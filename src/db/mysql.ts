/**
 * MySQL driver using mysql2.
 */
import { readFile } from "node:fs/promises";
import { type Connection, type ConnectionOptions, createConnection } from "mysql2/promise";

import type { DatabaseError } from "../core/exceptions.js";
import type { AppScope } from "../credentials/scopes.js";
import type { DatabaseDriver, OpenOptions } from "./backend.js";
import { type ErrorCodeTable, NETWORK_ERROR_CODES, classifyError } from "./errors.js";
import { splitSqlScript } from "./script.js";
import {
  getUrlDb,
  getUrlHost,
  getUrlPassword,
  getUrlPort,
  getUrlUser,
} from "./url.js";

const MYSQL_ERROR_CODES: ErrorCodeTable = {
  accessDenied: new Set([
    "ER_ACCESS_DENIED_ERROR",
    "ER_DBACCESS_DENIED_ERROR",
    "ER_TABLEACCESS_DENIED_ERROR",
    "ER_SPECIFIC_ACCESS_DENIED_ERROR",
  ]),
  alreadyExists: new Set(["ER_TABLE_EXISTS_ERROR", "ER_DUP_ENTRY", "ER_DUP_KEYNAME"]),
  connect: new Set([...NETWORK_ERROR_CODES, "PROTOCOL_CONNECTION_LOST"]),
};

export function classifyMySQLError(err: unknown, user: string | null): DatabaseError {
  return classifyError(err, user, MYSQL_ERROR_CODES);
}

export function quoteIdent(name: string): string {
  return `\`${name.replace(/`/g, "``")}\``;
}

/** Host part of the application account: local users stay local. */
export function accountHost(host: string | null): string {
  if (!host || host === "localhost" || host === "127.0.0.1" || host === "::1") {
    return "localhost";
  }
  return "%";
}

export function connectionOptions(url: string, database: string | null): ConnectionOptions {
  const options: ConnectionOptions = {
    host: getUrlHost(url) ?? "localhost",
    user: getUrlUser(url) ?? undefined,
    password: getUrlPassword(url) ?? undefined,
  };
  const port = getUrlPort(url);
  if (port !== null) options.port = port;
  if (database) options.database = database;
  return options;
}

export class MySQLDriver implements DatabaseDriver {
  readonly dialect = "mysql";
  private conn: Connection;
  private user: string | null;
  private database: string | null;

  private constructor(conn: Connection, user: string | null, database: string | null) {
    this.conn = conn;
    this.user = user;
    this.database = database;
  }

  static async open(url: string, options: OpenOptions = {}): Promise<MySQLDriver> {
    const user = getUrlUser(url);
    const urlDb = getUrlDb(url);
    let conn: Connection;
    try {
      conn = await createConnection(connectionOptions(url, urlDb));
    } catch (err) {
      throw classifyMySQLError(err, user);
    }
    try {
      await conn.query("SELECT 1");
    } catch (err) {
      conn.destroy();
      throw classifyMySQLError(err, user);
    }
    return new MySQLDriver(conn, user, options.database ?? urlDb);
  }

  private async run(statement: string): Promise<void> {
    try {
      await this.conn.query(statement);
    } catch (err) {
      throw classifyMySQLError(err, this.user);
    }
  }

  private async runScript(path: string): Promise<void> {
    const text = await readFile(path, "utf-8");
    for (const statement of splitSqlScript(text)) {
      await this.run(statement);
    }
  }

  async exists(name?: string): Promise<boolean> {
    const db = name ?? this.database;
    if (!db) return false;
    try {
      const [rows] = await this.conn.query(
        "SELECT SCHEMA_NAME FROM INFORMATION_SCHEMA.SCHEMATA WHERE SCHEMA_NAME = ?",
        [db],
      );
      return Array.isArray(rows) && rows.length > 0;
    } catch (err) {
      throw classifyMySQLError(err, this.user);
    }
  }

  async create(name: string): Promise<boolean> {
    await this.run(`CREATE DATABASE ${quoteIdent(name)}`);
    return true;
  }

  async drop(): Promise<boolean> {
    if (!this.database) return false;
    await this.run(`DROP DATABASE ${quoteIdent(this.database)}`);
    return true;
  }

  async connect(name: string): Promise<void> {
    await this.run(`USE ${quoteIdent(name)}`);
    this.database = name;
  }

  async createModule(path: string): Promise<void> {
    await this.runScript(path);
  }

  async ensureUser(app: AppScope): Promise<boolean> {
    if (!app.user || !app.database) return false;
    const account = `${this.conn.escape(app.user)}@${this.conn.escape(accountHost(app.host))}`;
    const identified = app.password ? ` IDENTIFIED BY ${this.conn.escape(app.password)}` : "";
    await this.run(`CREATE USER IF NOT EXISTS ${account}${identified}`);
    if (identified) await this.run(`ALTER USER ${account}${identified}`);
    await this.run(`GRANT ALL PRIVILEGES ON ${quoteIdent(app.database)}.* TO ${account}`);
    await this.run("FLUSH PRIVILEGES");
    return true;
  }

  async grantTableOptions(user: string, object: string): Promise<void> {
    const db = this.database ? `${quoteIdent(this.database)}.` : "";
    await this.run(`GRANT ALL PRIVILEGES ON ${db}${object} TO ${this.conn.escape(user)}`);
  }

  async migrate(
    scripts: readonly string[],
    source: string,
    dest: string,
    tables: readonly string[],
    procedure: string,
  ): Promise<void> {
    await this.connect(dest);
    for (const script of scripts) {
      await this.runScript(script);
    }
    for (const table of tables) {
      try {
        await this.conn.query(`CALL ${quoteIdent(dest)}.${quoteIdent(procedure)}(?, ?, ?)`, [
          source,
          dest,
          table,
        ]);
      } catch (err) {
        throw classifyMySQLError(err, this.user);
      }
    }
  }

  async destroy(): Promise<void> {
    await this.conn.end();
  }
}
