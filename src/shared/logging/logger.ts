/**
 * Logger Configuration
 *
 * Configures pino logger with environment-aware formatting:
 * - Production: JSON output for log aggregation
 * - Development: Pretty-printed colorized output for readability
 * - Test: silent unless LOG_LEVEL says otherwise
 *
 * Usage:
 *   import { loggers } from '../shared/logging/logger';
 *   loggers.pipeline.info({ pipeline: 'one_shot' }, 'Pipeline started');
 *   loggers.llm.error({ err: serializeError(err) }, 'Request failed');
 */

import pino, { Logger, LoggerOptions } from 'pino';
import { env } from '../config';

// =============================================================================
// Configuration
// =============================================================================

/**
 * Base logger options shared across environments
 */
const baseOptions: LoggerOptions = {
  level: env.logLevel,
  base: {
    pid: process.pid,
    env: env.nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Credentials are dropped from log output
  redact: {
    paths: [
      'apiKey',
      'token',
      'secret',
      '*.apiKey',
      '*.token',
      '*.secret',
    ],
    remove: true,
  },
};

/**
 * Development-specific options with pretty printing
 */
const developmentOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:HH:MM:ss.l',
      ignore: 'pid,hostname,env',
      messageFormat: '{component} {msg}',
      singleLine: false,
    },
  },
};

/**
 * Production options - JSON output for log aggregation
 */
const productionOptions: LoggerOptions = {
  ...baseOptions,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      env: env.nodeEnv,
    }),
  },
};

// =============================================================================
// Logger Instance
// =============================================================================

/**
 * Main application logger instance
 */
export const logger: Logger = pino(
  env.isDevelopment ? developmentOptions : productionOptions
);

/**
 * Create a child logger for a specific component/module
 *
 * @example
 * const log = createComponentLogger('collector');
 * log.warn({ runDir }, 'Run directory already exists');
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

/**
 * Pre-configured loggers for common components
 */
export const loggers = {
  /** Vendor completion calls */
  llm: createComponentLogger('llm'),
  /** Ranking pipeline execution */
  pipeline: createComponentLogger('pipeline'),
  /** Run persistence and reports */
  collector: createComponentLogger('collector'),
  /** Model × pipeline experiment loop */
  experiment: createComponentLogger('experiment'),
  /** Error records */
  errors: createComponentLogger('errors'),
  /** Command-line entry point */
  cli: createComponentLogger('cli'),
};

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Serialize an error for structured logging
 * Extracts useful properties from Error objects
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const extras: Record<string, unknown> = {};
    for (const key of Object.getOwnPropertyNames(err)) {
      if (!['name', 'message', 'stack'].includes(key)) {
        extras[key] = Reflect.get(err, key);
      }
    }
    return {
      type: err.constructor.name,
      message: err.message,
      stack: env.isDevelopment ? err.stack : undefined,
      ...extras,
    };
  }
  return { message: String(err) };
}

export default logger;
