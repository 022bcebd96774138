import pino, { type Logger } from "pino";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const created = new Set<Logger>();

let currentLevel: LogLevel = levelFromEnv(process.env.LOG_LEVEL);

function levelFromEnv(raw: string | undefined): LogLevel {
  for (const level of LOG_LEVELS) {
    if (raw === level) return level;
  }
  return "info";
}

/**
 * Named module logger. Loggers are created at import time, before settings
 * are parsed, so they are tracked here and re-levelled by `setLogLevel`.
 */
export function createLogger(name: string): Logger {
  const logger = pino({ name, level: currentLevel });
  created.add(logger);
  return logger;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
  for (const logger of created) logger.level = level;
}
