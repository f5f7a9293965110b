import { describe, it, expect } from 'vitest';
import {
  FALLBACK_RULES,
  GENERIC_EXPLANATION,
  OfflineExplainer,
  fallbackExplain,
  matchFallbackRule,
} from '../../src/explain/fallback.js';

const NAME_ERROR = `Traceback (most recent call last):
  File "<string>", line 1, in <module>
NameError: name 'total' is not defined`;

const ZERO_DIVISION = `Traceback (most recent call last):
  File "<string>", line 1, in <module>
ZeroDivisionError: division by zero`;

const SYNTAX_ERROR = `  File "<string>", line 1
    def foo(
           ^
SyntaxError: '(' was never closed`;

describe('fallbackExplain', () => {
  it('should explain an undefined name', () => {
    const explanation = fallbackExplain(NAME_ERROR);
    expect(explanation).toEqual({
      summary: 'You used a variable before defining it.',
      why_it_happened: 'Python could not find the variable name.',
      how_to_fix: ['Define the variable before using it', 'Check spelling'],
      corrected_example: 'x = 10\nprint(x)',
      confidence: 0.95,
    });
  });

  it('should explain division by zero', () => {
    const explanation = fallbackExplain(ZERO_DIVISION);
    expect(explanation.summary).toBe('You divided a number by zero.');
    expect(explanation.confidence).toBe(0.95);
    expect(explanation.how_to_fix).toEqual(['Ensure the denominator is not zero']);
    expect(explanation.corrected_example).toBe('if y != 0:\n    print(x / y)');
  });

  it('should explain a syntax error without a corrected example', () => {
    const explanation = fallbackExplain(SYNTAX_ERROR);
    expect(explanation.summary).toBe('There is a syntax mistake in your code.');
    expect(explanation.confidence).toBe(0.85);
    expect(explanation.corrected_example).toBeNull();
  });

  it('should treat indentation and tab errors as syntax mistakes', () => {
    expect(matchFallbackRule('IndentationError: expected an indented block')).toBe('syntax');
    expect(matchFallbackRule('TabError: inconsistent use of tabs and spaces')).toBe('syntax');
  });

  it('should treat UnboundLocalError as an undefined name', () => {
    expect(matchFallbackRule("UnboundLocalError: cannot access local variable 'n'")).toBe('undefined-name');
  });

  it('should fall back to the generic explanation', () => {
    const explanation = fallbackExplain('TypeError: can only concatenate str (not "int") to str');
    expect(explanation).toEqual(GENERIC_EXPLANATION);
    expect(explanation.confidence).toBe(0.7);
    expect(explanation.how_to_fix).toEqual(['Read the error message', 'Fix the issue and retry']);
  });

  it('should use the generic explanation for empty error text', () => {
    expect(matchFallbackRule('')).toBe('generic');
  });

  it('should match case-insensitively', () => {
    expect(matchFallbackRule('zerodivisionerror')).toBe('division-by-zero');
    expect(matchFallbackRule('NAMEERROR')).toBe('undefined-name');
  });

  it('should return a fresh copy each time', () => {
    const first = fallbackExplain(NAME_ERROR);
    first.how_to_fix.push('mutated');
    expect(fallbackExplain(NAME_ERROR).how_to_fix).toEqual(['Define the variable before using it', 'Check spelling']);
  });
});

describe('rule precedence', () => {
  it('should be ordered undefined-name, division-by-zero, syntax', () => {
    expect(FALLBACK_RULES.map((rule) => rule.id)).toEqual(['undefined-name', 'division-by-zero', 'syntax']);
  });

  it('should let the earlier rule win when a traceback mentions two errors', () => {
    const chained = `${ZERO_DIVISION}\n\nDuring handling of the above exception, another exception occurred:\n\n${NAME_ERROR}`;
    expect(matchFallbackRule(chained)).toBe('undefined-name');
  });

  it('should keep every template inside the documented bounds', () => {
    for (const { explanation } of [...FALLBACK_RULES, { explanation: GENERIC_EXPLANATION }]) {
      expect(explanation.how_to_fix.length).toBeGreaterThan(0);
      expect(explanation.confidence).toBeGreaterThanOrEqual(0);
      expect(explanation.confidence).toBeLessThanOrEqual(1);
    }
  });
});

describe('OfflineExplainer', () => {
  it('should report offline mode and ignore the code', async () => {
    const explainer = new OfflineExplainer();
    expect(explainer.mode).toBe('offline');
    await expect(explainer.explain('print(1/0)', ZERO_DIVISION)).resolves.toEqual(fallbackExplain(ZERO_DIVISION));
  });
});
