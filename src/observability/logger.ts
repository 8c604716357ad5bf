/**
 * Structured Logger
 *
 * Built on pino. Every line carries the `service` tag; pretty mode prints it
 * as a `[ws-mqtt-bridge]` prefix for human-readable stdout.
 */

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
}

export const SERVICE_NAME = 'ws-mqtt-bridge';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function resolveEnvLevel(): LogLevel {
  const fromEnv = process.env['LOG_LEVEL']?.toLowerCase();
  return LOG_LEVELS.find((level) => level === fromEnv) ?? 'info';
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: resolveEnvLevel(),
  pretty: process.env['NODE_ENV'] !== 'production' && process.env['NODE_ENV'] !== 'test',
};

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
      service: SERVICE_NAME,
      ...finalConfig.base,
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (finalConfig.pretty) {
    rootLogger = pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname,service,component',
          messageFormat: '[{service}] {if component}{component}: {end}{msg}',
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

export const bridgeLogger = () => createLogger({ component: 'bridge' });

export const upstreamLogger = () => createLogger({ component: 'upstream' });

export const busLogger = () => createLogger({ component: 'mqtt' });
