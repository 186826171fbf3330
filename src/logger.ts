/**
 * Structured Logging Module
 *
 * Provides pino-based structured logging with scoped child loggers.
 * Diagnostics always go to stderr; stdout is reserved for operator output
 * (property values, samples), which flows through an OutputSink instead.
 */

import pino, { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

let rootLogger: Logger | null = null;

function envLevel(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === raw);
}

/**
 * Initialize the root logger. Call once at startup; calling again replaces
 * the root, so loggers obtained later pick up the new level.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = envLevel() ?? config.level ?? 'info';
  const pretty = config.pretty ?? false;

  if (pretty && level !== 'silent') {
    rootLogger = pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          messageFormat: '[{module}] {msg}',
        },
      },
    });
  } else {
    rootLogger = pino({ level }, pino.destination(2));
  }
  return rootLogger;
}

/** Get the root logger instance, initializing with defaults on first use. */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module.
 */
export function getLogger(module: string): Logger {
  return getRootLogger().child({ module });
}
