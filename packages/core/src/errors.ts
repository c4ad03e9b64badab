/**
 * Custom error classes for the engine
 * These errors provide safe error details for presentation layers
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for display (no stack, no input values)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Validation error for invalid input
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Lookup outside a closed reference table (unknown treatment, metabolite, ...)
 * Always a programming error, never a data condition
 */
export class ReferenceDataError extends AppError {
  public readonly table: string;
  public readonly key: string;

  constructor(table: string, key: string) {
    super(`Unknown ${table} entry: "${key}"`, 'REFERENCE_DATA_ERROR', 500);
    this.name = 'ReferenceDataError';
    this.table = table;
    this.key = key;
  }
}

/**
 * Environment or reference-data configuration rejected at startup
 */
export class ConfigurationError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR', 500);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Check if error is operational (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Convert any error to safe response format
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (error instanceof AppError) {
    return error.toSafeError();
  }

  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}
