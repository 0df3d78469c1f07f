/**
 * Error Logger
 *
 * Turns application errors into structured records on the `errors`
 * component logger.
 */

import { ErrorInfo, AppError, ErrorCategory, ErrorSeverity } from './types';
import { loggers } from '../logging/logger';

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

    const payload = {
      category: errorInfo.category,
      severity: errorInfo.severity,
      details: errorInfo.technicalDetails,
      context: errorInfo.context
    };
    if (errorInfo.recoverable) {
      loggers.errors.warn(payload, errorInfo.userMessage);
    } else {
      loggers.errors.error(payload, errorInfo.userMessage);
    }
  }
}
