import { formatWithOptions } from "node:util";
import { Logger } from "tslog";

export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/** Loggers that follow LOG_LEVEL; those created with an explicit level are not tracked. */
const followers = new Set<Logger<unknown>>();

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_MAP, value);
}

export function resolveLogLevel(envLevel: string | undefined): number {
  const normalized = envLevel?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) {
    return LOG_LEVEL_MAP[normalized];
  }
  return LOG_LEVEL_MAP.info;
}

/**
 * Log lines go to stderr. stdout carries the chat, so `concierge > transcript.txt`
 * captures the conversation without log noise.
 */
function writeToStderr(logMetaMarkup: string, logArgs: unknown[], logErrors: string[]): void {
  const colors = process.stderr.isTTY === true;
  const errors = logErrors.length > 0 ? `${logArgs.length > 0 ? "\n" : ""}${logErrors.join("\n")}` : "";
  process.stderr.write(`${logMetaMarkup}${formatWithOptions({ colors }, ...logArgs)}${errors}\n`);
}

export function createLogger(name: string, minLevel?: LogLevel): Logger<unknown> {
  const log = new Logger<unknown>({
    name,
    minLevel: minLevel ? LOG_LEVEL_MAP[minLevel] : resolveLogLevel(process.env.LOG_LEVEL),
    prettyLogTemplate: "{{dateIsoStr}} {{logLevelName}} [{{name}}] ",
    stylePrettyLogs: process.stderr.isTTY === true,
    overwrite: { transportFormatted: writeToStderr },
  });
  if (!minLevel) {
    followers.add(log);
  }
  return log;
}

/**
 * Re-reads the level for every logger that follows LOG_LEVEL. Module-level
 * loggers are built on import, before `.env` is loaded; entry points call
 * this once the environment is complete.
 */
export function applyLogLevel(envLevel: string | undefined = process.env.LOG_LEVEL): number {
  const level = resolveLogLevel(envLevel);
  for (const log of followers) {
    log.settings.minLevel = level;
  }
  return level;
}

export const logger = createLogger("concierge");
