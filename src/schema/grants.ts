/**
 * Grant-target extraction from module creation scripts.
 *
 * The scan is line based and trusts the layout of the bundled SQL files:
 * one `CREATE TABLE <name> (` or `ALTER SEQUENCE <name> MAXVALUE ...` per line.
 */

export interface GrantableObjectExtractor {
  /** Tables and sequences the application user must be granted access to. */
  extract(sql: string): string[];
}

const CREATE_TABLE = /CREATE TABLE (?:IF NOT EXISTS )?([^\s(]+)/i;
const ALTER_SEQUENCE = /ALTER SEQUENCE (\S+) MAXVALUE/i;

export function extractGrantableObjects(sql: string): string[] {
  const names: string[] = [];
  for (const line of sql.split(/\r?\n/)) {
    for (const pattern of [CREATE_TABLE, ALTER_SEQUENCE]) {
      const match = line.match(pattern);
      if (match && !names.includes(match[1])) names.push(match[1]);
    }
  }
  return names;
}

export const lineScanExtractor: GrantableObjectExtractor = {
  extract: extractGrantableObjects,
};
