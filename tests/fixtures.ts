/**
 * Shared test fixtures: an in-memory database server, schema trees on disk,
 * a capturing logger and a scripted prompter.
 */
import { mkdirSync, mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";

import { parseConfig } from "../src/config.js";
import {
  AccessDeniedError,
  ConnectError,
  DatabaseError,
  ModuleAlreadyExistsError,
} from "../src/core/exceptions.js";
import { type Logger, LogLevel, createLogger } from "../src/core/logger.js";
import type { Prompter } from "../src/core/prompt.js";
import type { AppScope } from "../src/credentials/scopes.js";
import type { DatabaseDriver, DatabaseOpener, OpenOptions } from "../src/db/backend.js";
import { Backend, backendOf } from "../src/db/registry.js";
import { getUrlDb, getUrlPassword, getUrlUser } from "../src/db/url.js";
import { SchemaAdmin } from "../src/index.js";
import { CREATE_SUFFIX } from "../src/schema/locator.js";

// ---------------------------------------------------------------------------
// In-memory database server
// ---------------------------------------------------------------------------

export interface FakeUser {
  password: string | null;
  databases: Set<string>;
}

export interface MigrateCall {
  scripts: string[];
  source: string;
  dest: string;
  tables: string[];
  procedure: string;
}

/** State shared by every handle opened against one fake server. */
export class FakeServer {
  /** database → modules created in it, in order */
  readonly databases = new Map<string, string[]>();
  readonly users = new Map<string, FakeUser>();
  readonly grants: { user: string; object: string }[] = [];
  readonly migrations: MigrateCall[] = [];
  /** Accounts that may open any database. */
  readonly admins = new Set(["root", "postgres"]);
  ensureUserCalls = 0;
  ensureUserResult = true;
  opened = 0;
  destroyed = 0;
  /** When set, every open fails with this error. */
  openError: Error | null = null;

  opener: DatabaseOpener = async (url: string, options: OpenOptions = {}) => {
    if (this.openError) throw this.openError;
    const dialect = backendOf(url);
    const user = getUrlUser(url);
    const database = options.database ?? getUrlDb(url);

    if (dialect !== Backend.SQLite && !(user !== null && this.admins.has(user))) {
      const account = user === null ? undefined : this.users.get(user);
      const allowed =
        account !== undefined &&
        account.password === getUrlPassword(url) &&
        database !== null &&
        account.databases.has(database);
      if (!allowed) throw new AccessDeniedError(user);
    }

    this.opened++;
    return new FakeDriver(this, dialect, database);
  };

  addDatabase(name: string, modules: string[] = []): void {
    this.databases.set(name, [...modules]);
  }
}

export class FakeDriver implements DatabaseDriver {
  readonly dialect: string;
  private server: FakeServer;
  private database: string | null;

  constructor(server: FakeServer, dialect: string, database: string | null) {
    this.server = server;
    this.dialect = dialect;
    this.database = database;
  }

  async exists(name?: string): Promise<boolean> {
    const db = name ?? this.database;
    return db !== null && this.server.databases.has(db);
  }

  async create(name: string): Promise<boolean> {
    this.server.databases.set(name, []);
    return true;
  }

  async drop(): Promise<boolean> {
    if (this.database === null) return false;
    return this.server.databases.delete(this.database);
  }

  async connect(name: string): Promise<void> {
    if (!this.server.databases.has(name)) {
      throw new ConnectError(`unknown database ${name}`);
    }
    this.database = name;
  }

  async createModule(path: string): Promise<void> {
    const modules = this.database === null ? undefined : this.server.databases.get(this.database);
    if (modules === undefined) throw new ConnectError("no database selected");

    const module = basename(path).replace(CREATE_SUFFIX, "");
    if (readFileSync(path, "utf-8").includes("-- broken")) {
      throw new DatabaseError(`syntax error in ${basename(path)}`);
    }
    if (modules.includes(module)) {
      throw new ModuleAlreadyExistsError(`table for ${module} already exists`);
    }
    modules.push(module);
  }

  async ensureUser(app: AppScope): Promise<boolean> {
    this.server.ensureUserCalls++;
    if (!this.server.ensureUserResult || app.user === null || app.database === null) {
      return false;
    }
    const account = this.server.users.get(app.user) ?? {
      password: app.password,
      databases: new Set<string>(),
    };
    account.password = app.password;
    account.databases.add(app.database);
    this.server.users.set(app.user, account);
    return true;
  }

  async grantTableOptions(user: string, object: string): Promise<void> {
    this.server.grants.push({ user, object });
  }

  async migrate(
    scripts: readonly string[],
    source: string,
    dest: string,
    tables: readonly string[],
    procedure: string,
  ): Promise<void> {
    this.server.migrations.push({
      scripts: [...scripts],
      source,
      dest,
      tables: [...tables],
      procedure,
    });
  }

  async destroy(): Promise<void> {
    this.server.destroyed++;
  }
}

// ---------------------------------------------------------------------------
// Schema trees
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "sipdb-test-"));
}

export const STANDARD_SQL = "CREATE TABLE version (\n  table_name CHAR(32) NOT NULL\n);\n";

export function moduleSql(table: string): string {
  return `CREATE TABLE ${table} (\n  id INTEGER PRIMARY KEY\n);\n`;
}

export interface SchemaTreeOptions {
  standard?: boolean;
  /** Migration scripts to write (`table-migrate.sql`, `db-migrate.sql`). */
  migrationScripts?: string[];
}

/**
 * Write `<root>/<backend>/` with a standard script and one
 * `<module>-create.sql` per entry of `modules`.
 */
export function writeSchemaTree(
  root: string,
  backend: string,
  modules: Record<string, string>,
  options: SchemaTreeOptions = {},
): string {
  const dir = join(root, backend);
  mkdirSync(dir, { recursive: true });
  if (options.standard ?? true) {
    writeFileSync(join(dir, "standard-create.sql"), STANDARD_SQL);
  }
  for (const [module, sql] of Object.entries(modules)) {
    writeFileSync(join(dir, `${module}${CREATE_SUFFIX}`), sql);
  }
  for (const script of options.migrationScripts ?? []) {
    writeFileSync(join(dir, script), "-- migration helpers\n");
  }
  return dir;
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export interface LogLine {
  level: string;
  msg: string;
  [key: string]: unknown;
}

export interface CapturedLog {
  logger: Logger;
  lines: LogLine[];
  /** Messages logged at `level`, in order. */
  messages(level: string): string[];
}

export function captureLogger(): CapturedLog {
  const lines: LogLine[] = [];
  const logger = createLogger({
    level: LogLevel.DEBUG,
    serviceName: "sipdb-test",
    destination: {
      write(msg: string) {
        const parsed: unknown = JSON.parse(msg);
        if (typeof parsed === "object" && parsed !== null && "level" in parsed && "msg" in parsed) {
          lines.push({ ...parsed, level: String(parsed.level), msg: String(parsed.msg) });
        }
      },
    },
  });
  return {
    logger,
    lines,
    messages: (level) => lines.filter((l) => l.level === level).map((l) => l.msg),
  };
}

// ---------------------------------------------------------------------------
// Prompting
// ---------------------------------------------------------------------------

/** Answers questions from a fixed script and records what was asked. */
export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];
  private answers: string[];
  private secrets: string[];

  constructor(answers: string[] = [], secrets: string[] = []) {
    this.answers = [...answers];
    this.secrets = [...secrets];
  }

  async ask(question: string): Promise<string> {
    this.asked.push(question);
    return this.answers.shift() ?? "";
  }

  async secret(question: string): Promise<string> {
    this.asked.push(question);
    return this.secrets.shift() ?? "";
  }
}

// ---------------------------------------------------------------------------
// Command surface
// ---------------------------------------------------------------------------

export interface AdminHarness {
  admin: SchemaAdmin;
  server: FakeServer;
  log: CapturedLog;
  prompter: Prompter;
}

/** A SchemaAdmin wired to a fake server and a capturing logger. */
export function makeAdmin(
  raw: Record<string, unknown>,
  options: { server?: FakeServer; prompter?: Prompter; osUser?: string } = {},
): AdminHarness {
  const server = options.server ?? new FakeServer();
  const log = captureLogger();
  const prompter = options.prompter ?? new ScriptedPrompter();
  const osUser = options.osUser ?? "postgres";
  const admin = new SchemaAdmin({
    config: parseConfig(raw),
    open: server.opener,
    logger: log.logger,
    prompter,
    osUser: () => osUser,
  });
  return { admin, server, log, prompter };
}
