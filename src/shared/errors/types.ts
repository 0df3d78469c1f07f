/**
 * Error Types
 *
 * Type definitions for error categories and error structures.
 * Shared by the provider backends, the ranking pipelines and the result collector.
 */

/**
 * Error categories for different types of failures
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  PROVIDER = 'PROVIDER',
  PARSING = 'PARSING',
  STORAGE = 'STORAGE',
  VALIDATION = 'VALIDATION',
  UNEXPECTED = 'UNEXPECTED'
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  userMessage: string;
  technicalDetails: string;
  timestamp: Date;
  context?: Record<string, unknown>;
  recoverable: boolean;
  suggestedAction?: string;
}

/**
 * Custom error class with additional context
 */
export class AppError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly userMessage: string;
  public readonly technicalDetails: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly recoverable: boolean;
  public readonly suggestedAction?: string;

  constructor(info: ErrorInfo) {
    super(info.userMessage);
    this.name = 'AppError';
    this.category = info.category;
    this.severity = info.severity;
    this.userMessage = info.userMessage;
    this.technicalDetails = info.technicalDetails;
    this.timestamp = info.timestamp;
    this.context = info.context;
    this.recoverable = info.recoverable;
    this.suggestedAction = info.suggestedAction;
  }
}

/**
 * Missing credential, missing input file or invalid configuration.
 * Always fatal: raised before any ranking work starts.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      category: ErrorCategory.CONFIGURATION,
      severity: ErrorSeverity.CRITICAL,
      userMessage: message,
      technicalDetails: message,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'Check your .env file, config file and input paths.'
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Classification of a failed completion call
 */
export type ProviderErrorKind =
  | 'authentication'
  | 'rate_limit'
  | 'network'
  | 'server'
  | 'invalid_request'
  | 'unknown';

/**
 * A completion call failed inside a vendor backend
 */
export class ProviderError extends AppError {
  public readonly provider: string;
  public readonly kind: ProviderErrorKind;
  public readonly status?: number;
  public readonly retryable: boolean;

  constructor(
    provider: string,
    kind: ProviderErrorKind,
    technicalDetails: string,
    options: { status?: number; retryable: boolean; context?: Record<string, unknown> }
  ) {
    super({
      category: ErrorCategory.PROVIDER,
      severity: options.retryable ? ErrorSeverity.MEDIUM : ErrorSeverity.HIGH,
      userMessage: `${provider} request failed (${kind})`,
      technicalDetails,
      timestamp: new Date(),
      context: { ...options.context, provider, kind, status: options.status },
      recoverable: options.retryable
    });
    this.name = 'ProviderError';
    this.provider = provider;
    this.kind = kind;
    this.status = options.status;
    this.retryable = options.retryable;
  }
}

/**
 * Reading or writing persisted run artifacts failed
 */
export class StorageError extends AppError {
  constructor(message: string, technicalDetails: string, context?: Record<string, unknown>) {
    super({
      category: ErrorCategory.STORAGE,
      severity: ErrorSeverity.HIGH,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'Check the results directory and its permissions.'
    });
    this.name = 'StorageError';
  }
}
