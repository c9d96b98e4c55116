/**
 * Structured logging for Keelson
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

// Re-export pino.Logger type for convenience
export type Logger = pino.Logger;

export interface LogContext {
  runId?: string;
  phase?: string;
  component?: string;
  [key: string]: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

export interface LoggerOptions {
  level: LogLevel;
  /** Human-readable output through pino-pretty */
  pretty?: boolean;
  /** Defaults to stderr; stdout carries the deploy outputs */
  destination?: pino.DestinationStream;
}

// Create base logger
function createBaseLogger(options: LoggerOptions): pino.Logger {
  const loggerOptions: pino.LoggerOptions = {
    level: options.level,
    base: {
      service: 'keelson',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (options.pretty && !options.destination) {
    return pino({
      ...loggerOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(loggerOptions, options.destination ?? pino.destination(2));
}

// Singleton logger instance
let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const envLevel = process.env.LOG_LEVEL;
    loggerInstance = createBaseLogger({
      level: isLogLevel(envLevel) ? envLevel : 'info',
      pretty: process.env.NODE_ENV === 'development',
    });
  }
  return loggerInstance;
}

/**
 * Replace the root logger once configuration is loaded. Child loggers
 * created before this call keep the previous settings.
 */
export function configureLogger(options: LoggerOptions): pino.Logger {
  loggerInstance = createBaseLogger(options);
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

// Convenience function to create a named logger
export function createLogger(name: string): pino.Logger {
  return createChildLogger({ component: name });
}

// Structured event logging for pipeline phases
export function logPhaseTransition(
  runId: string,
  fromPhase: string,
  toPhase: string,
  reason: string
): void {
  getLogger().info(
    {
      event: 'phase_transition',
      runId,
      fromPhase,
      toPhase,
      reason,
    },
    `Phase transition: ${fromPhase} -> ${toPhase}`
  );
}

export function logResourceApplied(
  kind: string,
  name: string,
  namespace: string,
  action: string
): void {
  getLogger().info(
    {
      event: 'resource_applied',
      kind,
      name,
      namespace,
      action,
    },
    `Applied ${kind}/${name}: ${action}`
  );
}
