import winston from "winston";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Minimal logging surface the harvester depends on.
 * A winston logger satisfies it, and so does a plain object of spies in tests.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a console logger.
 *
 * Lines look like `2024-05-01T10:00:00.000Z - WARN - [pipeline] HTTP 404 for ...`
 * and go to stderr so the CLI's stdout stays free for summaries.
 */
export function createLogger(name = "harvester", level?: LogLevel): Logger {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  const resolvedLevel = level ?? (envLevel && isLogLevel(envLevel) ? envLevel : "info");

  return winston.createLogger({
    level: resolvedLevel,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(
        (info) => `${info.timestamp} - ${info.level.toUpperCase()} - [${name}] ${info.message}`
      )
    ),
    transports: [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })],
  });
}
