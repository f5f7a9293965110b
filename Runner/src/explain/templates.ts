import type { Explanation } from './types.js';

/**
 * Fixed explanations that do not come from matching error text.
 */

/** Timeout while the program sat in input() with nothing supplied. */
export const INPUT_STARVATION_EXPLANATION: Readonly<Explanation> = Object.freeze({
  summary: 'Your code is waiting for user input.',
  why_it_happened: 'The script calls input() but the request did not supply any stdin data.',
  how_to_fix: [
    "Add the expected input in the 'Program input' field before running",
    'Or remove input() calls if they are not required',
  ],
  corrected_example: null,
  confidence: 0.95,
});

/** The remote explainer is configured but could not answer for this run. */
export const EXPLANATION_UNAVAILABLE_NOTICE: Readonly<Explanation> = Object.freeze({
  summary: 'A full AI explanation is not available right now.',
  why_it_happened: 'The AI explanation service could not be reached or returned an unusable answer.',
  how_to_fix: [
    'Read the error message above for the exact cause',
    'Run the code again later to get a full explanation',
  ],
  corrected_example: null,
  confidence: 0.5,
});

/** Copy a frozen template so callers can never mutate the shared instance. */
export function fromTemplate(template: Readonly<Explanation>): Explanation {
  return { ...template, how_to_fix: [...template.how_to_fix] };
}
