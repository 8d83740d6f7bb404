/**
 * Connection scopes: the administrative identity that creates databases and
 * roles, and the least-privilege identity the server runs with.
 *
 * Both are frozen values; deriving a new URL yields a new scope.
 */
import {
  getUrlDb,
  getUrlHost,
  getUrlPassword,
  getUrlUser,
  setUrlPassword,
} from "../db/url.js";

interface ScopeFields {
  /** Backend identifier, including any `+variant` suffix. */
  readonly backend: string;
  readonly url: string;
  readonly host: string | null;
  readonly user: string | null;
  readonly password: string | null;
  readonly database: string | null;
}

export interface AdminScope extends ScopeFields {
  readonly kind: "admin";
}

export interface AppScope extends ScopeFields {
  readonly kind: "app";
}

export type ConnectionScope = AdminScope | AppScope;

function fields(backend: string, url: string): ScopeFields {
  return {
    backend,
    url,
    host: getUrlHost(url),
    user: getUrlUser(url),
    password: getUrlPassword(url),
    database: getUrlDb(url),
  };
}

export function adminScope(backend: string, url: string): AdminScope {
  return Object.freeze({ kind: "admin", ...fields(backend, url) });
}

export function appScope(backend: string, url: string): AppScope {
  return Object.freeze({ kind: "app", ...fields(backend, url) });
}

export function withPassword(scope: AdminScope, password: string): AdminScope {
  return adminScope(scope.backend, setUrlPassword(scope.url, password));
}

/** Backend name without its driver variant (`mysql+mysql2` → `mysql`). */
export function baseBackend(backend: string): string {
  const plus = backend.indexOf("+");
  const base = plus === -1 ? backend : backend.slice(0, plus);
  return base === "postgresql" ? "postgres" : base;
}
