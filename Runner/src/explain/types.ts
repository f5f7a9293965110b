import { z } from 'zod';

/**
 * Wire shape of an explanation. Field names match the /run response body.
 */
export const ExplanationSchema = z.object({
  summary: z.string().min(1),
  why_it_happened: z.string().min(1),
  how_to_fix: z.array(z.string().min(1)).min(1),
  corrected_example: z.string().nullable(),
  confidence: z.number().min(0).max(1),
});

export type Explanation = z.infer<typeof ExplanationSchema>;

export type ExplainerMode = 'remote' | 'offline';

/**
 * Produces an explanation for a failed run. The offline classifier always
 * answers; the remote explainer throws ExplanationUnavailableError when it
 * cannot, and ExplanationGate turns that into the unavailable notice.
 * Only the gate guarantees a result, so that is what the service wires in.
 */
export interface ExplanationProvider {
  readonly mode: ExplainerMode;
  explain(code: string, errorText: string): Promise<Explanation>;
}
