/**
 * Pino logger setup shared by the engine and the CLI.
 */
import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

export const LogLevel = {
  TRACE: "trace",
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
  FATAL: "fatal",
  SILENT: "silent",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export interface LoggerConfig {
  level: LogLevel;
  serviceName: string;
  /** Human-readable output through pino-pretty (CLI use). */
  pretty?: boolean;
  /** Write to this stream instead of stdout. */
  destination?: DestinationStream;
}

export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    level: config.level,
    base: { service: config.serviceName },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname,service",
        },
      },
    });
  }

  if (config.destination) {
    return pino(options, config.destination);
  }
  return pino(options);
}

let defaultLogger: Logger = pino({ level: "info" });

export function setDefaultLogger(logger: Logger): void {
  defaultLogger = logger;
}

export function getLogger(): Logger {
  return defaultLogger;
}
