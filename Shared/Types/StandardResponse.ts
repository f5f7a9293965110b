import { BaseError } from './errors.js';

/**
 * Error envelope returned by HTTP endpoints when a request cannot be served
 * (bad payload, unknown route, unexpected server fault).
 */
export interface ErrorEnvelope {
  success: false;
  error: string;
  errorCode?: string;
  errorDetails?: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Create an error envelope, optionally with a structured error code and details.
 */
export function createError(
  error: string,
  errorCode?: string,
  errorDetails?: Record<string, unknown>,
): ErrorEnvelope {
  const response: ErrorEnvelope = { success: false, error };
  if (errorCode !== undefined) response.errorCode = errorCode;
  if (errorDetails !== undefined) response.errorDetails = errorDetails;
  return response;
}

/**
 * Create an envelope from a caught exception.
 * BaseError subclasses keep their code and details; stacks are only
 * attached outside production.
 */
export function createErrorFromException(
  error: unknown,
  includeStack: boolean = process.env.NODE_ENV !== 'production',
): ErrorEnvelope {
  if (error instanceof BaseError) {
    const response = createError(error.message, error.code);
    if (isRecord(error.details)) response.errorDetails = { ...error.details };
    if (includeStack && error.stack) {
      response.errorDetails = { ...response.errorDetails, stack: error.stack };
    }
    return response;
  }

  if (error instanceof Error) {
    const response = createError(error.message, 'INTERNAL_ERROR');
    if (includeStack && error.stack) {
      response.errorDetails = { stack: error.stack };
    }
    return response;
  }

  if (typeof error === 'string') {
    return createError(error, 'UNKNOWN_ERROR');
  }

  return createError(String(error) || 'Unknown error occurred', 'UNKNOWN_ERROR');
}
