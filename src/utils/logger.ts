/**
 * Logger Module
 * Structured logging using pino, written to stderr
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/** stderr, so stdout stays free for rendered graphs and JSON */
const STDERR_FD = 2;

const createdLoggers = new Set<PinoLogger>();

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

function isTest(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
}

export function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (isTest()) return "silent";
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "tracer", "planner", "cli")
 * @returns A configured pino logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger("tracer");
 * logger.info({ script: "demand" }, "Dry run started");
 * logger.error({ err }, "Dry run failed");
 * ```
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {}
): PinoLogger {
  const logger = buildLogger(component, options);
  createdLoggers.add(logger);
  return logger;
}

function buildLogger(component: string, options: LoggerOptions): PinoLogger {
  const { level = getLogLevel() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  // Pretty output for humans; nothing to format when silent
  if (isDevelopment() && level !== "silent") {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: STDERR_FD,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(STDERR_FD));
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;

/**
 * Changes the level of every logger created so far and of those created afterwards
 */
export function setDefaultLogLevel(level: LogLevel): void {
  process.env.LOG_LEVEL = level;
  for (const logger of createdLoggers) {
    logger.level = level;
  }
}
