import { describe, it, expect } from 'vitest';
import { expectsInput, isAwaitingInput } from '../../src/executor/starvation.js';

describe('expectsInput', () => {
  it('should detect both input spellings', () => {
    expect(expectsInput('name = input("Name? ")')).toBe(true);
    expect(expectsInput('name = raw_input()')).toBe(true);
  });

  it('should ignore programs without an input call', () => {
    expect(expectsInput('while True:\n    pass')).toBe(false);
    expect(expectsInput('print("input")')).toBe(false);
  });

  // Lexical check by design: these are accepted limitations
  it('should flag input( even in unreachable code', () => {
    expect(expectsInput('if False:\n    input()\nwhile True: pass')).toBe(true);
  });

  it('should miss indirect reads', () => {
    expect(expectsInput('import sys\nline = sys.stdin.readline()')).toBe(false);
    expect(expectsInput('ask = input\nask()')).toBe(false);
  });
});

describe('isAwaitingInput', () => {
  const code = 'x = int(input())\nprint(x * 2)';

  it('should report starvation when no stdin was supplied', () => {
    expect(isAwaitingInput(code, '')).toBe(true);
  });

  it('should treat whitespace-only stdin as absent', () => {
    expect(isAwaitingInput(code, '  \n\t')).toBe(true);
  });

  it('should not report starvation when stdin was supplied', () => {
    expect(isAwaitingInput(code, '21\n')).toBe(false);
  });

  it('should not report starvation for code without input calls', () => {
    expect(isAwaitingInput('while True: pass', '')).toBe(false);
  });
});
