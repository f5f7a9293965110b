import { BaseError } from '@code-coach/shared/Types/errors.js';

/**
 * Base error for Runner service errors
 */
export class RunnerError extends BaseError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, code, details);
    this.name = 'RunnerError';
  }
}

/**
 * The remote reasoning model could not produce a usable explanation
 * (network failure, timeout, or a reply that is not an Explanation).
 */
export class ExplanationUnavailableError extends RunnerError {
  constructor(message: string, details?: unknown) {
    super(message, 'EXPLANATION_UNAVAILABLE', details);
    this.name = 'ExplanationUnavailableError';
  }
}

/**
 * Route matched nothing
 */
export class NotFoundError extends RunnerError {
  constructor(method: string, path: string) {
    super(`Cannot ${method} ${path}`, 'NOT_FOUND', { method, path });
    this.name = 'NotFoundError';
  }
}
