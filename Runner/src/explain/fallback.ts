/**
 * Offline error classifier.
 *
 * Rules are tested in order against the lower-cased error text and the first
 * match wins. Order matters: a traceback can mention more than one error
 * name (e.g. a NameError raised while handling a ZeroDivisionError), and the
 * earlier rule takes precedence.
 */

import { fromTemplate } from './templates.js';
import type { Explanation, ExplanationProvider } from './types.js';

export type FallbackRuleId = 'undefined-name' | 'division-by-zero' | 'syntax' | 'generic';

export interface FallbackRule {
  id: FallbackRuleId;
  matches: (errorTextLower: string) => boolean;
  explanation: Readonly<Explanation>;
}

const containsAny = (...needles: string[]) => (text: string): boolean =>
  needles.some((needle) => text.includes(needle));

export const FALLBACK_RULES: readonly FallbackRule[] = [
  {
    id: 'undefined-name',
    matches: containsAny('nameerror', 'unboundlocalerror'),
    explanation: {
      summary: 'You used a variable before defining it.',
      why_it_happened: 'Python could not find the variable name.',
      how_to_fix: ['Define the variable before using it', 'Check spelling'],
      corrected_example: 'x = 10\nprint(x)',
      confidence: 0.95,
    },
  },
  {
    id: 'division-by-zero',
    matches: containsAny('zerodivisionerror'),
    explanation: {
      summary: 'You divided a number by zero.',
      why_it_happened: 'Division by zero is undefined.',
      how_to_fix: ['Ensure the denominator is not zero'],
      corrected_example: 'if y != 0:\n    print(x / y)',
      confidence: 0.95,
    },
  },
  {
    id: 'syntax',
    matches: containsAny('syntaxerror', 'indentationerror', 'taberror'),
    explanation: {
      summary: 'There is a syntax mistake in your code.',
      why_it_happened: 'Python could not parse the code.',
      how_to_fix: ['Check brackets, colons, indentation'],
      corrected_example: null,
      confidence: 0.85,
    },
  },
];

export const GENERIC_EXPLANATION: Readonly<Explanation> = {
  summary: 'Your code caused an error.',
  why_it_happened: 'Python encountered a runtime problem.',
  how_to_fix: ['Read the error message', 'Fix the issue and retry'],
  corrected_example: null,
  confidence: 0.7,
};

function findRule(errorText: string): FallbackRule | undefined {
  const lower = errorText.toLowerCase();
  return FALLBACK_RULES.find((rule) => rule.matches(lower));
}

/**
 * Id of the rule that explains the error text; 'generic' when none does.
 */
export function matchFallbackRule(errorText: string): FallbackRuleId {
  return findRule(errorText)?.id ?? 'generic';
}

export function fallbackExplain(errorText: string): Explanation {
  return fromTemplate(findRule(errorText)?.explanation ?? GENERIC_EXPLANATION);
}

/**
 * Deterministic provider used whenever the remote path is not configured.
 */
export class OfflineExplainer implements ExplanationProvider {
  readonly mode = 'offline' as const;

  async explain(_code: string, errorText: string): Promise<Explanation> {
    return fallbackExplain(errorText);
  }
}
