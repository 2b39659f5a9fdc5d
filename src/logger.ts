/**
 * Structured Logging Module
 *
 * pino-based logging with scoped child loggers. Pretty-prints when
 * attached to a terminal, plain JSON lines otherwise.
 */

import pino, { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  /** Plain JSON output target; ignored when pretty-printing */
  destination?: pino.DestinationStream;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

let rootLogger: Logger | null = null;

function envLevel(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === raw);
}

/**
 * Initialize the root logger. Call once at startup; later calls replace it.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? envLevel() ?? 'warn';
  const pretty = config.pretty ?? (process.stdout.isTTY === true && process.env.NODE_ENV !== 'production');

  if (pretty) {
    rootLogger = pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname,module',
          messageFormat: '[{module}] {msg}',
        },
      },
    });
  } else {
    rootLogger = config.destination ? pino({ level }, config.destination) : pino({ level });
  }
  return rootLogger;
}

/**
 * Get the root logger, creating it with defaults on first use.
 */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module.
 */
export function getLogger(module: string): Logger {
  return getRootLogger().child({ module });
}

/**
 * Flush buffered output, including a pretty-print worker, before the
 * process exits.
 */
export function flushLogger(): Promise<void> {
  const logger = rootLogger;
  if (!logger) return Promise.resolve();
  return new Promise((resolve, reject) => {
    logger.flush((err) => (err ? reject(err) : resolve()));
  });
}
