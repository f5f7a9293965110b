/**
 * ID generators using Node's built-in crypto.
 */

import { randomUUID } from 'node:crypto';

/** Correlates the log lines of one /run request. */
export function generateExecutionId(): string {
  return `exec_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}
