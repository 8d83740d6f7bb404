#!/usr/bin/env node
/**
 * CLI entrypoint for sipdb.
 *
 * Usage:
 *   sipdb create sipdb
 *   sipdb add dialog sipdb
 *   sipdb migrate sipdb_old sipdb
 */
import { parseArgs } from "node:util";

import { loadConfig, parseOverrides } from "./config.js";
import { describeError } from "./core/exceptions.js";
import { LogLevel, createLogger, setDefaultLogger } from "./core/logger.js";
import { NoPrompter, TerminalPrompter } from "./core/prompt.js";
import { COMMANDS, SchemaAdmin, Status } from "./index.js";

const USAGE = `
sipdb - SIP server database provisioning

Usage:
  sipdb create [database]
  sipdb drop [database]
  sipdb add <module> [database]
  sipdb migrate <old-database> <new-database>
  sipdb complete <command> [prefix]

Options:
  --config <file>        JSON configuration file (default: ./sipdb.json)
  -o, --option <k=v>     Override a configuration value (repeatable)
  --log-level <level>    trace, debug, info, warn, error
  --batch                Fail instead of prompting for missing values
  -h, --help             Show this help
`.trim();

const { values, positionals } = parseArgs({
  args: process.argv.slice(2),
  options: {
    config: { type: "string" },
    option: { type: "string", short: "o", multiple: true, default: [] },
    "log-level": { type: "string" },
    batch: { type: "boolean", default: false },
    help: { type: "boolean", short: "h", default: false },
  },
  allowPositionals: true,
  strict: true,
});

const [command, ...args] = positionals;

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

if (!command) {
  console.error(USAGE);
  process.exit(1);
}

let admin: SchemaAdmin;
try {
  const overrides = parseOverrides(values.option);
  if (values["log-level"]) overrides.log_level = values["log-level"];
  const config = loadConfig(values.config, overrides);

  const logger = createLogger({
    level: config.log_level,
    serviceName: "sipdb",
    pretty: config.log_level !== LogLevel.SILENT,
  });
  setDefaultLogger(logger);

  admin = new SchemaAdmin({
    config,
    logger,
    prompter: values.batch ? new NoPrompter() : new TerminalPrompter(),
  });
} catch (err) {
  console.error(`sipdb: ${describeError(err)}`);
  process.exit(1);
}

let status: Status;
switch (command) {
  case "create":
    status = await admin.create(args[0]);
    break;
  case "drop":
    status = await admin.drop(args[0]);
    break;
  case "add":
    status = await admin.add(args[0], args[1]);
    break;
  case "migrate":
    status = await admin.migrate(args[0], args[1]);
    break;
  case "complete":
    for (const candidate of admin.complete(args[0] ?? "", args[1])) console.log(candidate);
    status = Status.Ok;
    break;
  default:
    console.error(`sipdb: unknown command '${command}' (expected one of ${COMMANDS.join(", ")})`);
    status = Status.Failed;
}

process.exit(status === Status.Ok ? 0 : 1);
