/**
 * Error Handler
 *
 * Standardized error handling utilities for consistent error management.
 */

import {
  AppError,
  ErrorCategory,
  ErrorSeverity,
  ProviderError,
  ProviderErrorKind
} from './types';
import { ErrorLogger } from './logger';

/**
 * Options for {@link ErrorHandler.retry}
 */
export interface RetryOptions {
  /** Total attempts, including the first one */
  maxAttempts?: number;
  delayMs?: number;
  /** 1 keeps the delay fixed between attempts */
  backoffMultiplier?: number;
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number) => void;
}

const NETWORK_ERROR_NAMES = ['APIConnectionError', 'APIConnectionTimeoutError', 'AbortError', 'FetchError'];
const NETWORK_ERROR_CODES = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE'];

function readProperty(error: unknown, key: string): unknown {
  if (typeof error === 'object' && error !== null && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

/**
 * Error handler class for managing errors throughout the application
 */
export class ErrorHandler {
  /**
   * Create a parsing error
   */
  static createParsingError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): AppError {
    return new AppError({
      category: ErrorCategory.PARSING,
      severity: ErrorSeverity.MEDIUM,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: true,
      suggestedAction: 'Retry the request or try a different model.'
    });
  }

  /**
   * Create an unexpected error
   */
  static createUnexpectedError(
    error: unknown,
    context?: Record<string, unknown>
  ): AppError {
    const message = error instanceof Error ? error.message : String(error);
    return new AppError({
      category: ErrorCategory.UNEXPECTED,
      severity: ErrorSeverity.CRITICAL,
      userMessage: 'An unexpected error occurred.',
      technicalDetails: message,
      timestamp: new Date(),
      context,
      recoverable: false
    });
  }

  /**
   * Convert whatever a vendor SDK threw into a classified ProviderError.
   *
   * The three SDKs all expose an HTTP `status` on their API errors and
   * raise connection errors without one.
   */
  static classifyProviderError(
    provider: string,
    error: unknown,
    context?: Record<string, unknown>
  ): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const name = error instanceof Error ? error.name : '';
    const rawStatus = readProperty(error, 'status');
    const status = typeof rawStatus === 'number' ? rawStatus : undefined;
    const code = readProperty(error, 'code');

    let kind: ProviderErrorKind = 'unknown';
    if (status === 401 || status === 403) {
      kind = 'authentication';
    } else if (status === 429) {
      kind = 'rate_limit';
    } else if (status !== undefined && status >= 500) {
      kind = 'server';
    } else if (status !== undefined && status >= 400) {
      kind = 'invalid_request';
    } else if (
      NETWORK_ERROR_NAMES.includes(name) ||
      (typeof code === 'string' && NETWORK_ERROR_CODES.includes(code)) ||
      /network|fetch failed|timed? ?out|socket hang up/i.test(message)
    ) {
      kind = 'network';
    }

    const retryable = kind === 'rate_limit' || kind === 'network' || kind === 'server';
    return new ProviderError(provider, kind, message, { status, retryable, context });
  }

  /**
   * Log an error with technical details
   */
  static logError(error: AppError | Error, context?: Record<string, unknown>): void {
    ErrorLogger.logError(error, context);
  }

  /**
   * Format error message for display to user
   */
  static formatUserMessage(error: AppError | Error): string {
    if (error instanceof AppError) {
      let message = error.userMessage;
      if (error.technicalDetails && error.technicalDetails !== error.userMessage) {
        message += `: ${error.technicalDetails}`;
      }
      if (error.suggestedAction) {
        message += `\n\n${error.suggestedAction}`;
      }
      return message;
    }
    return error.message;
  }

  /**
   * Retry logic for transient failures
   */
  static async retry<T>(
    operation: () => Promise<T>,
    options: RetryOptions = {}
  ): Promise<T> {
    const {
      maxAttempts = 3,
      delayMs = 1000,
      backoffMultiplier = 2,
      shouldRetry = () => true,
      onRetry
    } = options;

    let currentDelay = delayMs;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));

        // Don't retry if we've exhausted attempts or if error is not retryable
        if (attempt >= maxAttempts || !shouldRetry(lastError)) {
          throw lastError;
        }

        onRetry?.(lastError, attempt);
        await new Promise(resolve => setTimeout(resolve, currentDelay));
        currentDelay *= backoffMultiplier;
      }
    }
  }
}
