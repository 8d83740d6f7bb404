/**
 * Split a SQL script into statements.
 *
 * Understands quoted strings, `--` / `#` line comments, block comments and the
 * client-side `DELIMITER <token>` directive used around stored procedures.
 */
export function splitSqlScript(sql: string): string[] {
  const statements: string[] = [];
  let delimiter = ";";
  let current = "";
  let quote: string | null = null;
  let inComment = false;

  const flush = () => {
    const stmt = current.trim();
    if (stmt) statements.push(stmt);
    current = "";
  };

  for (const line of sql.split(/\r?\n/)) {
    const directive = line.match(/^\s*DELIMITER\s+(\S+)\s*$/i);
    if (directive && !quote && !inComment && current.trim() === "") {
      delimiter = directive[1];
      continue;
    }

    let i = 0;
    while (i < line.length) {
      const ch = line[i];

      if (inComment) {
        const end = line.indexOf("*/", i);
        if (end === -1) break;
        inComment = false;
        i = end + 2;
        continue;
      }

      if (quote) {
        current += ch;
        if (ch === "\\" && i + 1 < line.length) {
          current += line[i + 1];
          i += 2;
          continue;
        }
        if (ch === quote) quote = null;
        i++;
        continue;
      }

      if (ch === "'" || ch === '"' || ch === "`") {
        quote = ch;
        current += ch;
        i++;
        continue;
      }
      if (ch === "#" || line.startsWith("-- ", i) || line.slice(i) === "--") {
        break;
      }
      if (line.startsWith("/*", i)) {
        inComment = true;
        i += 2;
        continue;
      }
      if (line.startsWith(delimiter, i)) {
        flush();
        i += delimiter.length;
        continue;
      }

      current += ch;
      i++;
    }
    current += "\n";
  }

  flush();
  return statements;
}
