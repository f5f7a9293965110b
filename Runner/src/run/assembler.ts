/**
 * Turns one execution outcome into exactly one response record.
 */

import type { Explanation } from '../explain/types.js';
import { INPUT_STARVATION_EXPLANATION, fromTemplate } from '../explain/templates.js';
import type {
  CompletedOutcome,
  DispatchFailedOutcome,
  TimedOutOutcome,
} from '../executor/types.js';
import type { RunResponse } from './types.js';

export const NO_OUTPUT_PLACEHOLDER = '(no output)';
export const INPUT_STARVATION_MESSAGE = 'Your code is waiting for input, but no input was provided.';

export function timeoutMessage(timeoutSeconds: number): string {
  return `Execution timed out after ${timeoutSeconds} seconds`;
}

/** Exit code 0, whatever was written to stderr. */
export function assembleSuccess(outcome: CompletedOutcome): RunResponse {
  return {
    status: 'success',
    output: outcome.stdout || NO_OUTPUT_PLACEHOLDER,
    execution_time: outcome.durationSeconds,
  };
}

export function assembleProgramFailure(outcome: CompletedOutcome, explanation: Explanation): RunResponse {
  return {
    status: 'error',
    error: outcome.stderr,
    explanation,
    execution_time: outcome.durationSeconds,
  };
}

/** Cause is known from the request itself, so the classifier is skipped. */
export function assembleInputStarvation(outcome: TimedOutOutcome): RunResponse {
  return {
    status: 'error',
    error: INPUT_STARVATION_MESSAGE,
    explanation: fromTemplate(INPUT_STARVATION_EXPLANATION),
    execution_time: outcome.durationSeconds,
  };
}

export function assembleTimeout(outcome: TimedOutOutcome, timeoutSeconds: number): RunResponse {
  return {
    status: 'error',
    error: timeoutMessage(timeoutSeconds),
    execution_time: outcome.durationSeconds,
  };
}

export function assembleDispatchFailure(outcome: DispatchFailedOutcome): RunResponse {
  return {
    status: 'error',
    error: outcome.message,
    execution_time: outcome.durationSeconds,
  };
}
