/**
 * Connection URL helpers.
 *
 * URLs look like `<driver>://[user[:password]@]host[:port][/database]`.
 * SQLite URLs carry an absolute file path instead of a host:
 * `sqlite:///var/lib/sipdb/telephony`, whose last segment is the database.
 */
import { ArgumentError } from "../core/exceptions.js";

function parse(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (err) {
    throw new ArgumentError(`Bad database URL: ${redactUrl(url)}`, { cause: err });
  }
  if (!parsed.protocol || parsed.protocol === ":") {
    throw new ArgumentError(`Database URL has no driver: ${redactUrl(url)}`);
  }
  return parsed;
}

function segments(parsed: URL): string[] {
  return parsed.pathname.split("/").filter((s) => s.length > 0);
}

function decode(value: string): string {
  return decodeURIComponent(value);
}

/** Driver component, lower-cased, including any `+variant` suffix. */
export function getUrlDriver(url: string): string {
  return parse(url).protocol.slice(0, -1).toLowerCase();
}

export function setUrlDriver(url: string, driver: string): string {
  const scheme = /^[a-z][a-z0-9+.-]*:/i;
  if (!scheme.test(url)) {
    throw new ArgumentError(`Database URL has no driver: ${redactUrl(url)}`);
  }
  return url.replace(scheme, `${driver}:`);
}

export function getUrlDb(url: string): string | null {
  const parts = segments(parse(url));
  const last = parts[parts.length - 1];
  return last === undefined ? null : decode(last);
}

/** Replace the database component (the last path segment), or append one. */
export function setUrlDb(url: string, db: string): string {
  const parsed = parse(url);
  const parts = segments(parsed);
  if (parts.length > 0) parts.pop();
  parts.push(encodeURIComponent(db));
  parsed.pathname = `/${parts.join("/")}`;
  return parsed.toString();
}

export function getUrlUser(url: string): string | null {
  const user = parse(url).username;
  return user ? decode(user) : null;
}

export function getUrlPassword(url: string): string | null {
  const password = parse(url).password;
  return password ? decode(password) : null;
}

export function setUrlPassword(url: string, password: string): string {
  const parsed = parse(url);
  parsed.password = encodeURIComponent(password);
  return parsed.toString();
}

export function getUrlHost(url: string): string | null {
  const host = parse(url).hostname;
  return host || null;
}

export function getUrlPort(url: string): number | null {
  const port = parse(url).port;
  return port ? Number(port) : null;
}

/** Absolute filesystem path of a SQLite URL. */
export function getUrlPath(url: string): string {
  return decode(parse(url).pathname);
}

/** URL safe to log: the password is masked. */
export function redactUrl(url: string): string {
  return url.replace(/(\/\/[^:/@]*:)[^@/]*@/, "$1***@");
}
