/**
 * Custom error classes for the scoring platform
 * These errors provide safe, non-PHI error messages for API responses
 */

import type { ZodError } from 'zod';

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
   * Get safe error details for API response (no sensitive info)
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
 *
 * Raised before any computation runs; a required field is never defaulted.
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
 * Unexpected failure while extracting features or computing a score
 */
export class ComputationError extends AppError {
  public readonly originalError: unknown;

  constructor(message: string, originalError?: unknown) {
    super(message, 'COMPUTATION_ERROR', 500);
    this.name = 'ComputationError';
    this.originalError = originalError;
  }
}

/**
 * Not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Database operation error (query failed, constraint violation, etc.)
 */
export class DatabaseOperationError extends AppError {
  public readonly operation: string;
  public readonly originalError: Error | undefined;

  constructor(operation: string, message: string, originalError?: Error) {
    super(`Database ${operation} failed: ${message}`, 'DATABASE_OPERATION_ERROR', 500);
    this.name = 'DatabaseOperationError';
    this.operation = operation;
    this.originalError = originalError;
  }
}

/**
 * Build a ValidationError carrying zod's flattened field errors
 */
export function validationErrorFromZod(message: string, error: ZodError): ValidationError {
  return new ValidationError(message, error.flatten());
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Convert unknown error to safe error response
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  // For unexpected errors, return a generic message
  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}
