/**
 * Logger Module
 * Structured logging using pino with console or file output
 */

import pino, { type Logger as PinoLogger } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";
import { getLogsDir } from "./paths.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  enableFileLogging?: boolean;
  logDir?: string;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/**
 * Ensures the log directory exists
 */
function ensureLogDir(logDir: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";
}

/**
 * Get log level from environment or default
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (process.env.NODE_ENV === "test") return "silent";
  return isDevelopment() ? "debug" : "info";
}

let baseLogger: PinoLogger | null = null;

/**
 * Shared root logger. Pretty-printed in development; the pino-pretty
 * transport is started once and every component logger is a child of it.
 */
function getBaseLogger(): PinoLogger {
  if (!baseLogger) {
    const level = getLogLevel();
    baseLogger =
      isDevelopment() && level !== "silent"
        ? pino({
            name: "storyweave",
            level,
            transport: {
              target: "pino-pretty",
              options: {
                colorize: true,
                translateTime: "SYS:HH:MM:ss",
                ignore: "pid,hostname",
              },
            },
          })
        : pino({ name: "storyweave", level });
  }
  return baseLogger;
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "coordinator", "ledger")
 *
 * @example
 * ```typescript
 * const logger = createLogger("coordinator");
 * logger.debug({ transactionId }, "Transaction prepared");
 * logger.error({ err }, "Vector commit failed");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  if (options.enableFileLogging) {
    const dir = options.logDir ?? getLogsDir();
    ensureLogDir(dir);

    const destination = pino.destination({
      dest: path.join(dir, `${component}.log`),
      sync: false,
    });

    return pino({ name: component, level: options.level ?? getLogLevel() }, destination);
  }

  const child = getBaseLogger().child({ component });
  if (options.level) {
    child.level = options.level;
  }
  return child;
}

export type Logger = PinoLogger;
