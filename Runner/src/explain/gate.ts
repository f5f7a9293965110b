/**
 * Readiness gate in front of the two explainers.
 *
 * The remote/offline choice is fixed when the gate is built from a
 * Readiness value; each call only follows that choice.
 */

import type { LanguageModelV1 } from 'ai';
import { Logger } from '@code-coach/shared/Utils/logger.js';
import { createExplainerModel } from '../llm/providers.js';
import { OfflineExplainer } from './fallback.js';
import type { AzureCredentials, Readiness } from './readiness.js';
import { RemoteExplainer } from './remote.js';
import { EXPLANATION_UNAVAILABLE_NOTICE, fromTemplate } from './templates.js';
import type { ExplainerMode, Explanation, ExplanationProvider } from './types.js';

const defaultLogger = new Logger('runner:explain');

export class ExplanationGate implements ExplanationProvider {
  readonly mode: ExplainerMode;
  private readonly logger: Logger;

  constructor(
    private readonly remote: ExplanationProvider | null,
    private readonly offline: ExplanationProvider = new OfflineExplainer(),
    logger: Logger = defaultLogger,
  ) {
    this.mode = remote ? 'remote' : 'offline';
    this.logger = logger;
  }

  async explain(code: string, errorText: string): Promise<Explanation> {
    if (!this.remote) {
      return this.offline.explain(code, errorText);
    }

    try {
      return await this.remote.explain(code, errorText);
    } catch (error) {
      this.logger.warn('Remote explanation unavailable, returning notice', { error });
      return fromTemplate(EXPLANATION_UNAVAILABLE_NOTICE);
    }
  }
}

export interface ExplanationProviderOptions {
  timeoutMs: number;
  /** Override model construction (tests) */
  createModel?: (credentials: AzureCredentials) => LanguageModelV1;
  logger?: Logger;
}

/**
 * Build the process-wide explanation provider. Call once at startup.
 */
export function createExplanationProvider(
  readiness: Readiness,
  options: ExplanationProviderOptions,
): ExplanationGate {
  const logger = options.logger ?? defaultLogger;

  if (!readiness.ready) {
    logger.info('AI explanations disabled, using offline classifier', { missing: readiness.missing });
    return new ExplanationGate(null, new OfflineExplainer(), logger);
  }

  const model = (options.createModel ?? createExplainerModel)(readiness.credentials);
  const remote = new RemoteExplainer(model, { timeoutMs: options.timeoutMs });
  logger.info('AI explanations enabled', { deployment: readiness.credentials.deployment });
  return new ExplanationGate(remote, new OfflineExplainer(), logger);
}
