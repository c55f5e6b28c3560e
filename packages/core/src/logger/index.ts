/**
 * Structured logging module using pino
 *
 * Every engine component accepts an optional logger and falls back to a
 * named child of the default one. Pretty output is only enabled for
 * NODE_ENV=development; everything else emits JSON.
 */

import pino from 'pino';

/** Log levels supported by the logger */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/** Context that can be attached to log messages */
export interface LogContext {
  [key: string]: unknown;
}

/** Configuration options for creating a logger */
export interface LoggerOptions {
  /** Name of the component */
  name: string;
  /** Minimum log level to output */
  level?: LogLevel;
  /** Additional base context to include in all logs */
  base?: LogContext;
}

const LOG_LEVELS: ReadonlySet<string> = new Set([
  'fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent',
]);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

function nodeEnv(): string {
  return process.env['NODE_ENV'] ?? 'development';
}

/** Get the log level from environment or default */
function getLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL'];
  if (envLevel !== undefined && isLogLevel(envLevel)) {
    return envLevel;
  }
  const env = nodeEnv();
  if (env === 'test') return 'silent';
  return env === 'production' ? 'info' : 'debug';
}

/**
 * Create a configured pino logger instance
 */
export function createLogger(options: LoggerOptions): pino.Logger {
  const level = options.level ?? getLogLevel();

  const transport = nodeEnv() === 'development'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      }
    : undefined;

  return pino({
    name: options.name,
    level,
    base: {
      ...options.base,
      env: nodeEnv(),
    },
    transport,
  });
}

/**
 * Create a child logger with additional context
 */
export function childLogger(
  parent: pino.Logger,
  context: LogContext
): pino.Logger {
  return parent.child(context);
}

let defaultLogger: pino.Logger | null = null;

/**
 * Get or create the default gatehouse logger
 */
export function getLogger(): pino.Logger {
  if (defaultLogger === null) {
    defaultLogger = createLogger({ name: 'gatehouse' });
  }
  return defaultLogger;
}

/**
 * Set the default logger (useful for testing)
 */
export function setLogger(logger: pino.Logger): void {
  defaultLogger = logger;
}

/**
 * Resolve the logger a component should use: the caller's, or a child of
 * the default logger tagged with the component name.
 */
export function componentLogger(component: string, logger?: pino.Logger): pino.Logger {
  return logger ?? getLogger().child({ component });
}

export type { Logger } from 'pino';
