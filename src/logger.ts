/**
 * Logger Configuration
 *
 * Configures pino logger with environment-aware formatting:
 * - Production: JSON output for log aggregation
 * - Development: Pretty-printed colorized output for readability
 * - Test: silent unless LOG_LEVEL says otherwise
 *
 * Usage:
 *   import { loggers } from './logger';
 *   loggers.pipeline.info({ row: 3 }, 'Row tailored');
 */

import pino, { Logger, LoggerOptions } from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const NODE_ENV = process.env.NODE_ENV || 'development';
const isDevelopment = NODE_ENV === 'development';
const LOG_LEVEL = process.env.LOG_LEVEL || (NODE_ENV === 'test' ? 'silent' : 'info');

/**
 * Base logger options shared across environments
 */
const baseOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: {
    pid: process.pid,
    env: NODE_ENV,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Redact sensitive fields from logs
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
      ignore: 'pid,hostname,env,component',
      messageFormat: '{msg}',
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
      env: NODE_ENV,
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
  isDevelopment ? developmentOptions : productionOptions
);

/**
 * Create a child logger for a specific component/module
 *
 * @example
 * const csvLogger = createComponentLogger('csv');
 * csvLogger.debug({ rows: 12 }, 'Parsed job postings');
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

/**
 * Pre-configured loggers for common components
 */
export const loggers = {
  /** Command-line entry points */
  cli: createComponentLogger('cli'),
  /** Row loop and result accumulation */
  pipeline: createComponentLogger('pipeline'),
  /** LLM/AI operations */
  llm: createComponentLogger('llm'),
  /** Resume text extraction */
  extractor: createComponentLogger('extractor'),
  /** CSV reading and writing */
  csv: createComponentLogger('csv'),
  /** Error records */
  errors: createComponentLogger('errors'),
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
    for (const [key, value] of Object.entries(err)) {
      // Summarised elsewhere in the log entry
      if (!['name', 'message', 'stack', 'rawResponse', 'timestamp', 'context'].includes(key)) {
        extras[key] = value;
      }
    }
    return {
      type: err.name,
      message: err.message,
      stack: isDevelopment ? err.stack : undefined,
      ...extras,
    };
  }
  return { message: String(err) };
}

export default logger;
