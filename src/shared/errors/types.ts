/**
 * Error Types
 *
 * Type definitions for error codes and error structures.
 * Fatal errors abort the whole run; recoverable ones are isolated to a single row.
 */

/**
 * Error categories for different types of failures
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  FILE_HANDLING = 'FILE_HANDLING',
  PARSING = 'PARSING',
  VALIDATION = 'VALIDATION',
  AUTHENTICATION = 'AUTHENTICATION',
  NETWORK = 'NETWORK',
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

// ============================================================================
// Fatal errors
// ============================================================================

/** Missing or invalid process configuration (API key, provider, policy) */
export class ConfigurationError extends AppError {
  constructor(info: ErrorInfo) {
    super(info);
    this.name = 'ConfigurationError';
  }
}

/** The resume document could not be turned into text */
export class ExtractionError extends AppError {
  constructor(info: ErrorInfo) {
    super(info);
    this.name = 'ExtractionError';
  }
}

/** The job postings file is missing, unreadable or empty */
export class SourceFileError extends AppError {
  constructor(info: ErrorInfo) {
    super(info);
    this.name = 'SourceFileError';
  }
}

/** The job postings header lacks a required column or repeats a column name */
export class SchemaError extends AppError {
  public readonly missingColumns: string[];
  public readonly duplicateColumns: string[];

  constructor(info: ErrorInfo, missingColumns: string[], duplicateColumns: string[] = []) {
    super(info);
    this.name = 'SchemaError';
    this.missingColumns = missingColumns;
    this.duplicateColumns = duplicateColumns;
  }
}

/** The model provider rejected the credential */
export class AuthenticationError extends AppError {
  constructor(info: ErrorInfo) {
    super(info);
    this.name = 'AuthenticationError';
  }
}

// ============================================================================
// Per-row errors
// ============================================================================

/** Network or service fault while calling the model */
export class TransientServiceError extends AppError {
  constructor(info: ErrorInfo) {
    super(info);
    this.name = 'TransientServiceError';
  }
}

/** The model call succeeded but returned no text */
export class ResponseEmptyError extends AppError {
  constructor(info: ErrorInfo) {
    super(info);
    this.name = 'ResponseEmptyError';
  }
}

/** The model stopped at its output token limit, so the reply is incomplete */
export class ResponseTruncatedError extends AppError {
  public readonly finishReason: string;

  constructor(info: ErrorInfo, finishReason: string) {
    super(info);
    this.name = 'ResponseTruncatedError';
    this.finishReason = finishReason;
  }
}

/** The model response could not be read as the expected JSON object */
export class ResponseParseError extends AppError {
  public readonly rawResponse: string;

  constructor(info: ErrorInfo, rawResponse: string) {
    super(info);
    this.name = 'ResponseParseError';
    this.rawResponse = rawResponse;
  }
}

/** The model response parsed but lacks one or more required fields */
export class MissingFieldError extends AppError {
  public readonly missingFields: string[];

  constructor(info: ErrorInfo, missingFields: string[]) {
    super(info);
    this.name = 'MissingFieldError';
    this.missingFields = missingFields;
  }
}
