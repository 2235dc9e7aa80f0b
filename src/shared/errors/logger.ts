/**
 * Error Logger
 *
 * Forwards errors raised during a run to the structured logger, at warn
 * level when the run can carry on and at error level when it cannot.
 */

import { ErrorInfo, AppError, ErrorCategory, ErrorSeverity } from './types';
import { loggers, serializeError } from '../../logger';

/**
 * Error logger class for managing error logs
 */
export class ErrorLogger {
  /**
   * Log an error with technical details
   */
  static logError(error: AppError | Error, context?: Record<string, unknown>): void {
    const errorInfo: ErrorInfo = error instanceof AppError
      ? {
          category: error.category,
          severity: error.severity,
          userMessage: error.userMessage,
          technicalDetails: error.technicalDetails,
          timestamp: error.timestamp,
          context: { ...error.context, ...context },
          recoverable: error.recoverable,
          suggestedAction: error.suggestedAction
        }
      : {
          category: ErrorCategory.UNEXPECTED,
          severity: ErrorSeverity.CRITICAL,
          userMessage: 'An unexpected error occurred',
          technicalDetails: error.message,
          timestamp: new Date(),
          context,
          recoverable: false
        };

    const entry = {
      category: errorInfo.category,
      severity: errorInfo.severity,
      details: errorInfo.technicalDetails,
      context: errorInfo.context,
      err: serializeError(error)
    };
    if (errorInfo.recoverable) {
      loggers.errors.warn(entry, errorInfo.userMessage);
    } else {
      loggers.errors.error(entry, errorInfo.userMessage);
    }
  }
}
