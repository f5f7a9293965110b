import { generateText, type LanguageModelV1 } from 'ai';
import { Logger } from '@code-coach/shared/Utils/logger.js';
import { ExplanationUnavailableError } from '../utils/errors.js';
import { ExplanationSchema, type Explanation, type ExplanationProvider } from './types.js';

const logger = new Logger('runner:remote-explainer');

export interface RemoteExplainerOptions {
  /** Upper bound for one model call */
  timeoutMs: number;
}

/**
 * Build the prompt sent to the model for one failed run
 */
export function buildExplanationPrompt(code: string, errorText: string): string {
  return `A beginner ran this Python program and it failed.

Program:
\`\`\`python
${code}
\`\`\`

Error output:
\`\`\`
${errorText}
\`\`\`

Explain the failure to the beginner in plain language.

Rules:
- summary: one sentence saying what went wrong
- why_it_happened: one sentence saying why Python raised this error
- how_to_fix: 1-4 short, concrete steps
- corrected_example: a short fixed version of the relevant lines, or null
- confidence: 0.0-1.0, how sure you are of the diagnosis

Return ONLY valid JSON in this exact format:
{
  "summary": "...",
  "why_it_happened": "...",
  "how_to_fix": ["..."],
  "corrected_example": "..." or null,
  "confidence": 0.9
}`;
}

/**
 * Pull the Explanation object out of a model reply. Accepts replies wrapped
 * in markdown fences or prose; checks shape only, not content.
 */
export function parseExplanationReply(responseText: string): Explanation {
  const jsonMatch = responseText.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new ExplanationUnavailableError('No JSON found in model reply');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonMatch[0]);
  } catch (error) {
    throw new ExplanationUnavailableError('Model reply is not valid JSON', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const validated = ExplanationSchema.safeParse(parsed);
  if (!validated.success) {
    throw new ExplanationUnavailableError('Model reply does not match the explanation shape', {
      issues: validated.error.flatten().fieldErrors,
    });
  }
  return validated.data;
}

/**
 * Explains failures with a hosted language model. Throws
 * ExplanationUnavailableError on any failure; the gate decides what the
 * caller sees instead.
 */
export class RemoteExplainer implements ExplanationProvider {
  readonly mode = 'remote' as const;

  constructor(
    private readonly model: LanguageModelV1,
    private readonly options: RemoteExplainerOptions,
  ) {}

  async explain(code: string, errorText: string): Promise<Explanation> {
    let responseText: string;
    try {
      const result = await generateText({
        model: this.model,
        messages: [{ role: 'user', content: buildExplanationPrompt(code, errorText) }],
        temperature: 0,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(this.options.timeoutMs),
      });
      responseText = result.text;
    } catch (error) {
      throw new ExplanationUnavailableError('Model call failed', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    const explanation = parseExplanationReply(responseText);
    logger.debug('Remote explanation received', { confidence: explanation.confidence });
    return explanation;
  }
}
