import pino, { type Logger, type TransportTargetOptions } from "pino";

export type { Logger } from "pino";

/** Verbosity names accepted on the command line and in LOG_LEVEL */
export type LogLevelName = "DEBUG" | "INFO" | "WARNING" | "ERROR";

const PINO_LEVELS: Record<LogLevelName, pino.Level> = {
  DEBUG: "debug",
  INFO: "info",
  WARNING: "warn",
  ERROR: "error",
};

export interface LoggerOptions {
  level: LogLevelName;
  /** Also append JSON lines to this file */
  logFile?: string;
}

const isDev = process.env.NODE_ENV !== "production";

/**
 * Build the root logger. Outside production the console output goes
 * through pino-pretty; in production it is plain JSON lines.
 */
export function createLogger(options: LoggerOptions): Logger {
  const level = PINO_LEVELS[options.level];
  const targets: TransportTargetOptions[] = [
    isDev
      ? { target: "pino-pretty", level, options: { colorize: true } }
      : { target: "pino/file", level, options: { destination: 1 } },
  ];
  if (options.logFile) {
    targets.push({
      target: "pino/file",
      level,
      options: { destination: options.logFile, mkdir: true },
    });
  }

  return pino({ level, transport: { targets } });
}
