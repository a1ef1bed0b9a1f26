/**
 * Structured Logger
 *
 * JSON-formatted logging with per-connection context propagation.
 * Built on pino for high-performance structured logging.
 */

import { AsyncLocalStorage } from 'async_hooks';
import pino from 'pino';

// -----------------------------------------------------------------------------
// Logger Configuration
// -----------------------------------------------------------------------------

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  /** Log level */
  level: LogLevel;
  /** Pretty print for development */
  pretty: boolean;
  /** Base context to include in all logs */
  base?: Record<string, unknown>;
  /** Custom serializers */
  serializers?: Record<string, (value: unknown) => unknown>;
}

const NODE_ENV = process.env['NODE_ENV'];

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: NODE_ENV === 'test' ? 'silent' : 'info',
  pretty: NODE_ENV !== 'production' && NODE_ENV !== 'test',
};

// -----------------------------------------------------------------------------
// Log Context
// -----------------------------------------------------------------------------

export interface LogContext {
  connectionId?: string;
  host?: string;
  [key: string]: unknown;
}

const logContext = new AsyncLocalStorage<LogContext>();

/**
 * Run a function with a specific logging context.
 */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return logContext.run(context, fn);
}

/**
 * Get the current logging context.
 */
export function getLogContext(): LogContext | undefined {
  return logContext.getStore();
}

// -----------------------------------------------------------------------------
// Logger Factory
// -----------------------------------------------------------------------------

let rootLogger: pino.Logger | null = null;

/**
 * Initialise the root logger.
 */
export function initLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const finalConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };

  const options: pino.LoggerOptions = {
    level: finalConfig.level,
    base: {
      service: 'pck-client',
      ...finalConfig.base,
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
      ...finalConfig.serializers,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    mixin() {
      const ctx = getLogContext();
      if (ctx) {
        return {
          connectionId: ctx.connectionId,
          host: ctx.host,
        };
      }
      return {};
    },
  };

  if (finalConfig.pretty) {
    rootLogger = pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    });
  } else {
    rootLogger = pino(options);
  }

  return rootLogger;
}

/**
 * Get the root logger instance.
 */
export function getLogger(): pino.Logger {
  if (!rootLogger) {
    rootLogger = initLogger();
  }
  return rootLogger;
}

/**
 * Create a child logger with additional context.
 */
export function createLogger(bindings: pino.Bindings): pino.Logger {
  return getLogger().child(bindings);
}

// -----------------------------------------------------------------------------
// Scoped Loggers
// -----------------------------------------------------------------------------

/**
 * Logger for the connection manager.
 */
export const connectionLogger = () => createLogger({ component: 'connection' });

/**
 * Logger for per-module connections.
 */
export const moduleLogger = () => createLogger({ component: 'module' });

/**
 * Logger for the status requester.
 */
export const requesterLogger = () => createLogger({ component: 'status-requester' });

/**
 * Logger for retry schedulers.
 */
export const schedulerLogger = () => createLogger({ component: 'scheduler' });
