import type { Explanation } from '../explain/types.js';

/**
 * Body of a POST /run response.
 */
export type RunResponse =
  | {
      status: 'success';
      output: string;
      execution_time: number;
    }
  | {
      status: 'error';
      error: string;
      explanation?: Explanation;
      execution_time: number;
    };
