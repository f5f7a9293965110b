/**
 * Input-starvation heuristic.
 *
 * Decides whether a timeout was caused by the program waiting on input()
 * that never arrived rather than by a long computation. Only consulted for
 * timed-out runs.
 *
 * Lexical check only, no parsing. Known limitations:
 * - an input( call in unreachable code still counts
 * - aliased or indirect reads (`ask = input`, sys.stdin.readline()) are missed
 */

const INPUT_CALL_SPELLINGS = ['input(', 'raw_input('] as const;

export function expectsInput(code: string): boolean {
  return INPUT_CALL_SPELLINGS.some((spelling) => code.includes(spelling));
}

export function isAwaitingInput(code: string, stdin: string): boolean {
  return expectsInput(code) && stdin.trim().length === 0;
}
