/**
 * Error Handler
 *
 * Standardized error handling utilities for consistent error management.
 * Every failure in the tailoring run is built here so that category, severity
 * and recoverability stay consistent between the CLI and the pipeline.
 */

import {
  AppError,
  AuthenticationError,
  ConfigurationError,
  ErrorCategory,
  ErrorSeverity,
  ExtractionError,
  MissingFieldError,
  ResponseEmptyError,
  ResponseParseError,
  ResponseTruncatedError,
  SchemaError,
  SourceFileError,
  TransientServiceError
} from './types';
import { ErrorLogger } from './logger';

/** Characters of a raw model response kept in error context */
const RAW_PREVIEW_LENGTH = 500;

/**
 * Error handler class for managing errors throughout the application
 */
export class ErrorHandler {
  /**
   * Create a configuration error
   */
  static createConfigurationError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): ConfigurationError {
    return new ConfigurationError({
      category: ErrorCategory.CONFIGURATION,
      severity: ErrorSeverity.CRITICAL,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'Check your .env file (see .env.example) and run the script again.'
    });
  }

  /**
   * Create a resume extraction error
   */
  static createExtractionError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): ExtractionError {
    return new ExtractionError({
      category: ErrorCategory.FILE_HANDLING,
      severity: ErrorSeverity.CRITICAL,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: this.getFileErrorSuggestion(technicalDetails)
    });
  }

  /**
   * Create an input file error
   */
  static createSourceFileError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): SourceFileError {
    return new SourceFileError({
      category: ErrorCategory.FILE_HANDLING,
      severity: ErrorSeverity.CRITICAL,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: this.getFileErrorSuggestion(technicalDetails)
    });
  }

  /**
   * Create a schema error for missing input columns
   */
  static createSchemaError(
    missingColumns: string[],
    availableColumns: readonly string[],
    context?: Record<string, unknown>
  ): SchemaError {
    const names = missingColumns.map(column => `'${column}'`).join(', ');
    return new SchemaError(
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.CRITICAL,
        userMessage: `Input CSV is missing the required column(s): ${names}.`,
        technicalDetails: `Found columns: ${availableColumns.join(', ') || '(none)'}`,
        timestamp: new Date(),
        context: { ...context, missingColumns, availableColumns: [...availableColumns] },
        recoverable: false,
        suggestedAction: 'Add the missing column header to the first row of the CSV.'
      },
      missingColumns
    );
  }

  /**
   * Create a schema error for header names that appear more than once
   */
  static createDuplicateColumnError(
    duplicateColumns: string[],
    availableColumns: readonly string[],
    context?: Record<string, unknown>
  ): SchemaError {
    const names = duplicateColumns.map(column => `'${column}'`).join(', ');
    return new SchemaError(
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.CRITICAL,
        userMessage: `Input CSV repeats the column name(s): ${names}.`,
        technicalDetails: `Found columns: ${availableColumns.join(', ')}`,
        timestamp: new Date(),
        context: { ...context, duplicateColumns, availableColumns: [...availableColumns] },
        recoverable: false,
        suggestedAction: 'Give every column in the header row a distinct name.'
      },
      [],
      duplicateColumns
    );
  }

  /**
   * Create an authentication error
   */
  static createAuthenticationError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): AuthenticationError {
    return new AuthenticationError({
      category: ErrorCategory.AUTHENTICATION,
      severity: ErrorSeverity.CRITICAL,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'Verify the API key for the configured LLM provider.'
    });
  }

  /**
   * Create a network or service error
   */
  static createServiceError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): TransientServiceError {
    return new TransientServiceError({
      category: ErrorCategory.NETWORK,
      severity: ErrorSeverity.HIGH,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: true,
      suggestedAction: 'Re-run the script later for the failed rows.'
    });
  }

  /**
   * Create an error for a model call that returned no text
   */
  static createEmptyResponseError(
    technicalDetails: string,
    context?: Record<string, unknown>
  ): ResponseEmptyError {
    return new ResponseEmptyError({
      category: ErrorCategory.NETWORK,
      severity: ErrorSeverity.MEDIUM,
      userMessage: 'The model returned an empty response.',
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: true
    });
  }

  /**
   * Create an error for a reply cut off at the output token limit
   */
  static createTruncatedResponseError(
    finishReason: string,
    context?: Record<string, unknown>
  ): ResponseTruncatedError {
    return new ResponseTruncatedError(
      {
        category: ErrorCategory.PARSING,
        severity: ErrorSeverity.MEDIUM,
        userMessage: 'The model reply was cut off at the output token limit.',
        technicalDetails: `Finish reason: ${finishReason}`,
        timestamp: new Date(),
        context,
        recoverable: true,
        suggestedAction: 'Raise LLM_MAX_TOKENS or shorten the resume.'
      },
      finishReason
    );
  }

  /**
   * Create an error for a response that is not the expected JSON object
   */
  static createResponseParseError(
    technicalDetails: string,
    rawResponse: string,
    context?: Record<string, unknown>
  ): ResponseParseError {
    return new ResponseParseError(
      {
        category: ErrorCategory.PARSING,
        severity: ErrorSeverity.MEDIUM,
        userMessage: `Failed to parse LLM response as JSON: ${technicalDetails}`,
        technicalDetails,
        timestamp: new Date(),
        context: { ...context, responsePreview: rawResponse.substring(0, RAW_PREVIEW_LENGTH) },
        recoverable: true,
        suggestedAction: 'Try a different model or a shorter resume/job description.'
      },
      rawResponse
    );
  }

  /**
   * Create an error for a response missing required fields
   */
  static createMissingFieldError(
    missingFields: string[],
    context?: Record<string, unknown>
  ): MissingFieldError {
    return new MissingFieldError(
      {
        category: ErrorCategory.PARSING,
        severity: ErrorSeverity.MEDIUM,
        userMessage: `LLM response is missing required field(s): ${missingFields.join(', ')}`,
        technicalDetails: `Missing: ${missingFields.join(', ')}`,
        timestamp: new Date(),
        context: { ...context, missingFields },
        recoverable: true
      },
      missingFields
    );
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
      userMessage: 'An unexpected error occurred during processing.',
      technicalDetails: message,
      timestamp: new Date(),
      context,
      recoverable: false
    });
  }

  /**
   * Whether an error must abort the whole run rather than a single row
   */
  static isFatal(error: unknown): boolean {
    return error instanceof AppError && !error.recoverable;
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
      if (error.suggestedAction) {
        message += `\n\n${error.suggestedAction}`;
      }
      return message;
    }
    return error.message;
  }

  /**
   * Get suggested action for file errors
   */
  private static getFileErrorSuggestion(technicalDetails: string): string {
    if (technicalDetails.includes('not found')) {
      return 'Ensure the file exists in the current directory or set its path in .env.';
    }
    if (technicalDetails.includes('format')) {
      return 'Please provide a PDF, DOCX, or TXT resume.';
    }
    if (technicalDetails.includes('no extractable text')) {
      return 'The document looks like a scanned image. Export a PDF with a text layer.';
    }
    if (technicalDetails.includes('corrupted') || technicalDetails.includes('read')) {
      return 'The file may be corrupted. Please re-export it and try again.';
    }
    if (technicalDetails.includes('permission')) {
      return 'Please check file permissions and try again.';
    }
    return 'Please check the file and try again.';
  }
}
