/**
 * Makes sure the application user can reach its database, creating the
 * user through the admin connection when it cannot.
 *
 *   unverified ──granted──────────────────────────▶ granted
 *        │
 *        └─denied─▶ escalating ──retry ok──▶ granted
 *                        └──────retry fails─▶ failed
 */
import { AccessDeniedError, describeError } from "../core/exceptions.js";
import type { Logger } from "../core/logger.js";
import type { DatabaseDriver, DatabaseOpener } from "../db/backend.js";
import type { AppScope } from "./scopes.js";

export type BootstrapState =
  | { phase: "unverified" }
  | { phase: "escalating"; reason: string }
  | { phase: "granted"; escalated: boolean }
  | { phase: "failed"; reason: string };

export interface BootstrapOutcome {
  ok: boolean;
  /** Every state visited, first to last. */
  trace: BootstrapState["phase"][];
  state: BootstrapState;
}

type AccessCheck = { access: "granted" } | { access: "denied" | "error"; reason: string };

export class PrivilegeBootstrapper {
  private open: DatabaseOpener;
  private logger: Logger;

  constructor(open: DatabaseOpener, logger: Logger) {
    this.open = open;
    this.logger = logger;
  }

  /** Open the app scope on `dbName` and release the handle. */
  private async checkAccess(app: AppScope, dbName: string): Promise<AccessCheck> {
    let handle: DatabaseDriver;
    try {
      handle = await this.open(app.url, { database: dbName });
    } catch (err) {
      if (err instanceof AccessDeniedError) {
        return { access: "denied", reason: err.message };
      }
      return { access: "error", reason: describeError(err) };
    }
    await handle.destroy();
    return { access: "granted" };
  }

  private async step(
    state: BootstrapState,
    app: AppScope,
    dbName: string,
    admin: DatabaseDriver,
  ): Promise<BootstrapState> {
    switch (state.phase) {
      case "unverified": {
        const check = await this.checkAccess(app, dbName);
        if (check.access === "granted") {
          this.logger.info(`access works, user '${app.user ?? ""}' already exists`);
          return { phase: "granted", escalated: false };
        }
        if (check.access === "denied") {
          return { phase: "escalating", reason: check.reason };
        }
        return { phase: "failed", reason: check.reason };
      }
      case "escalating": {
        this.logger.info(`creating access user for ${dbName} ...`);
        try {
          if (!(await admin.ensureUser(app))) {
            return { phase: "failed", reason: `failed to create user on ${dbName} DB` };
          }
        } catch (err) {
          return { phase: "failed", reason: describeError(err) };
        }
        const retry = await this.checkAccess(app, dbName);
        if (retry.access === "granted") return { phase: "granted", escalated: true };
        return {
          phase: "failed",
          reason: `failed to connect to ${dbName} with non-admin user: ${retry.reason}`,
        };
      }
      default:
        return state;
    }
  }

  async ensureAccess(
    app: AppScope,
    dbName: string,
    admin: DatabaseDriver,
  ): Promise<BootstrapOutcome> {
    let state: BootstrapState = { phase: "unverified" };
    const trace: BootstrapState["phase"][] = [state.phase];

    while (state.phase === "unverified" || state.phase === "escalating") {
      state = await this.step(state, app, dbName, admin);
      trace.push(state.phase);
    }

    if (state.phase === "failed") {
      this.logger.error({ database: dbName, user: app.user }, state.reason);
    }
    return { ok: state.phase === "granted", trace, state };
  }
}
