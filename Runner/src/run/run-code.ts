/**
 * /run pipeline: validate, execute once, explain, assemble.
 */

import { z } from 'zod';
import { Logger } from '@code-coach/shared/Utils/logger.js';
import type { RunnerConfig } from '../config.js';
import { isAwaitingInput } from '../executor/starvation.js';
import type { ExecutionRunner, RunRequest } from '../executor/types.js';
import type { ExplanationProvider } from '../explain/types.js';
import { generateExecutionId } from '../utils/id-generator.js';
import {
  assembleDispatchFailure,
  assembleInputStarvation,
  assembleProgramFailure,
  assembleSuccess,
  assembleTimeout,
} from './assembler.js';
import type { RunResponse } from './types.js';

const defaultLogger = new Logger('runner:run');

type TimeoutLimits = Pick<RunnerConfig, 'minTimeoutSeconds' | 'maxTimeoutSeconds' | 'defaultTimeoutSeconds'>;

/**
 * Request body schema for POST /run. `null` is treated like an absent field.
 */
export function createRunCodeSchema(limits: TimeoutLimits) {
  return z.object({
    code: z.string().min(1)
      .describe('Python source to execute'),
    stdin: z.string().nullish()
      .transform((value) => value ?? '')
      .describe('Text fed to the program as standard input'),
    timeout: z.number().int().min(limits.minTimeoutSeconds).max(limits.maxTimeoutSeconds).nullish()
      .transform((value) => value ?? limits.defaultTimeoutSeconds)
      .describe(`Deadline in seconds (default ${limits.defaultTimeoutSeconds}, range ${limits.minTimeoutSeconds}-${limits.maxTimeoutSeconds})`),
  });
}

export type RunCodeSchema = ReturnType<typeof createRunCodeSchema>;

export function toRunRequest(input: z.output<RunCodeSchema>): RunRequest {
  return { code: input.code, stdin: input.stdin, timeoutSeconds: input.timeout };
}

export interface RunDependencies {
  runner: ExecutionRunner;
  explainer: ExplanationProvider;
  logger?: Logger;
}

/**
 * Execute one request exactly once and describe the result.
 * Every program-level outcome becomes a RunResponse; nothing is retried.
 */
export async function runAndExplain(request: RunRequest, deps: RunDependencies): Promise<RunResponse> {
  const log = (deps.logger ?? defaultLogger).child(generateExecutionId());
  log.debug('Dispatching', { timeoutSeconds: request.timeoutSeconds, codeLength: request.code.length });

  const outcome = await deps.runner.run(request);

  switch (outcome.kind) {
    case 'completed': {
      if (outcome.exitCode === 0) {
        log.info('Succeeded', { durationSeconds: outcome.durationSeconds });
        return assembleSuccess(outcome);
      }
      log.info('Failed', { exitCode: outcome.exitCode, durationSeconds: outcome.durationSeconds });
      const explanation = await deps.explainer.explain(request.code, outcome.stderr);
      return assembleProgramFailure(outcome, explanation);
    }

    case 'timed_out': {
      const starved = isAwaitingInput(request.code, request.stdin);
      log.info('Timed out', { timeoutSeconds: request.timeoutSeconds, starved });
      return starved
        ? assembleInputStarvation(outcome)
        : assembleTimeout(outcome, request.timeoutSeconds);
    }

    case 'dispatch_failed':
      log.error('Could not start program', { message: outcome.message });
      return assembleDispatchFailure(outcome);
  }
}
