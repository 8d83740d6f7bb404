/**
 * Derives the administrative and application connection scopes for a
 * target database from configuration, asking for the admin password when
 * none is configured.
 */
import { userInfo } from "node:os";

import type { Config } from "../config.js";
import { describeError } from "../core/exceptions.js";
import type { Logger } from "../core/logger.js";
import type { ParamReader } from "../core/params.js";
import { Backend, backendOf, parseBackend } from "../db/registry.js";
import { getUrlDriver, redactUrl, setUrlDb, setUrlDriver } from "../db/url.js";
import {
  type AdminScope,
  type AppScope,
  adminScope,
  appScope,
  withPassword,
} from "./scopes.js";

/** Database every PostgreSQL admin session starts in. */
export const POSTGRES_BOOTSTRAP_DB = "postgres";
/** OS account PostgreSQL's peer authentication maps to the superuser. */
export const POSTGRES_OS_USER = "postgres";

export interface Credentials {
  admin: AdminScope;
  app: AppScope;
}

export interface CredentialResolverOptions {
  config: Config;
  params: ParamReader;
  logger: Logger;
  /** Name of the OS account running the process. */
  osUser?: () => string;
}

export class CredentialResolver {
  private config: Config;
  private params: ParamReader;
  private logger: Logger;
  private osUser: () => string;

  constructor(options: CredentialResolverOptions) {
    this.config = options.config;
    this.params = options.params;
    this.logger = options.logger;
    this.osUser = options.osUser ?? (() => userInfo().username);
  }

  /**
   * Backend identifier in use: the admin URL's driver when one is
   * configured, else the application URL's. Null (logged) when neither
   * is usable.
   */
  activeBackend(): string | null {
    const url = this.config.database_admin_url ?? this.config.database_url;
    if (!url) {
      this.logger.error("no 'database_url' configured: aborting");
      return null;
    }
    try {
      backendOf(url);
      return getUrlDriver(url);
    } catch (err) {
      this.logger.error({ url: redactUrl(url) }, describeError(err));
      return null;
    }
  }

  /** Application scope bound to `dbName`, using the active backend's driver. */
  appScope(dbName: string): AppScope | null {
    const engine = this.activeBackend();
    if (!engine) return null;
    const url = this.config.database_url;
    if (!url) {
      this.logger.error("no 'database_url' configured: aborting");
      return null;
    }
    try {
      const scope = appScope(engine, setUrlDb(setUrlDriver(url, engine), dbName));
      this.logger.debug({ url: redactUrl(scope.url) }, "application DB URL");
      return scope;
    } catch (err) {
      this.logger.error({ url: redactUrl(url) }, describeError(err));
      return null;
    }
  }

  /** Administrative scope for work on `dbName`. */
  async adminScope(dbName: string): Promise<AdminScope | null> {
    const engine = this.activeBackend();
    if (!engine) return null;

    let scope: AdminScope;
    try {
      const url = this.adminUrl(engine, dbName);
      if (url === null) return null;
      scope = adminScope(engine, url);
    } catch (err) {
      this.logger.error(describeError(err));
      return null;
    }

    if (parseBackend(engine) !== Backend.SQLite && scope.password === null) {
      const password = await this.params.secret(
        `Password for admin DB user (${scope.user ?? ""}): `,
      );
      if (password === null) return null;
      scope = withPassword(scope, password);
    }

    this.logger.debug({ url: redactUrl(scope.url) }, "admin DB URL");
    return scope;
  }

  async resolve(dbName: string): Promise<Credentials | null> {
    const admin = await this.adminScope(dbName);
    if (!admin) return null;
    const app = this.appScope(dbName);
    if (!app) return null;
    return { admin, app };
  }

  private adminUrl(engine: string, dbName: string): string | null {
    const backend = parseBackend(engine);
    const configured = this.config.database_admin_url;

    if (configured) {
      return backend === Backend.Postgres ? setUrlDb(configured, POSTGRES_BOOTSTRAP_DB) : configured;
    }

    switch (backend) {
      case Backend.Postgres: {
        const user = this.osUser();
        if (user !== POSTGRES_OS_USER) {
          this.logger.error(
            `Command must be run as '${POSTGRES_OS_USER}' user (running as '${user}'): ` +
              `sudo -u ${POSTGRES_OS_USER} sipdb ...`,
          );
          return null;
        }
        return `${engine}://${POSTGRES_OS_USER}@localhost/${POSTGRES_BOOTSTRAP_DB}`;
      }
      case Backend.SQLite: {
        const url = this.config.database_url;
        if (!url) {
          this.logger.error("no 'database_url' configured: aborting");
          return null;
        }
        return setUrlDb(url, dbName);
      }
      default:
        return `${engine}://root@localhost`;
    }
  }
}
