/**
 * Maps native driver errors onto the DatabaseError taxonomy.
 */
import {
  AccessDeniedError,
  ConnectError,
  DatabaseError,
  ModuleAlreadyExistsError,
  describeError,
} from "../core/exceptions.js";

export interface ErrorCodeTable {
  accessDenied: ReadonlySet<string>;
  alreadyExists: ReadonlySet<string>;
  connect: ReadonlySet<string>;
}

/** Socket-level codes Node reports for every network driver. */
export const NETWORK_ERROR_CODES: readonly string[] = [
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ETIMEDOUT",
];

export function errorCode(err: unknown): string | null {
  if (typeof err === "object" && err !== null && "code" in err) {
    const code = err.code;
    return typeof code === "string" ? code : null;
  }
  return null;
}

export function classifyError(
  err: unknown,
  user: string | null,
  codes: ErrorCodeTable,
): DatabaseError {
  if (err instanceof DatabaseError) return err;
  const code = errorCode(err);
  const message = describeError(err);
  if (code === null) return new DatabaseError(message, { cause: err });
  if (codes.accessDenied.has(code)) {
    return new AccessDeniedError(user, message, { cause: err });
  }
  if (codes.alreadyExists.has(code)) {
    return new ModuleAlreadyExistsError(message, { cause: err });
  }
  if (codes.connect.has(code)) {
    return new ConnectError(message, { cause: err });
  }
  return new DatabaseError(message, { cause: err });
}
