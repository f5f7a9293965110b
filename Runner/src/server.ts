/**
 * HTTP surface of the runner: POST /run, GET /health, GET /.
 */

import { existsSync } from 'node:fs';
import express, { type NextFunction, type Request, type Response } from 'express';
import { Logger } from '@code-coach/shared/Utils/logger.js';
import { ValidationError } from '@code-coach/shared/Types/errors.js';
import { createErrorFromException } from '@code-coach/shared/Types/StandardResponse.js';
import { parseCorsOrigins, type RunnerConfig } from './config.js';
import type { ExecutionRunner } from './executor/types.js';
import type { ExplanationProvider } from './explain/types.js';
import { createRunCodeSchema, runAndExplain, toRunRequest } from './run/run-code.js';
import { NotFoundError } from './utils/errors.js';

const HEALTH_PAYLOAD = Object.freeze({
  service: 'Code Execution Service',
  status: 'running',
  endpoint: '/run',
});

export type AppConfig = Pick<
  RunnerConfig,
  'corsOrigins' | 'frontendIndexPath' | 'minTimeoutSeconds' | 'maxTimeoutSeconds' | 'defaultTimeoutSeconds'
>;

export interface AppDependencies {
  config: AppConfig;
  runner: ExecutionRunner;
  explainer: ExplanationProvider;
  logger?: Logger;
}

function isBodyParseError(error: unknown): error is SyntaxError & { status: number } {
  return error instanceof SyntaxError && 'status' in error && error.status === 400;
}

/**
 * Create the Express application. Listening is left to the caller so tests
 * can drive the app in-process.
 */
export function createApp(deps: AppDependencies) {
  const logger = deps.logger ?? new Logger('runner:http');
  const allowedOrigins = parseCorsOrigins(deps.config.corsOrigins);
  const runCodeSchema = createRunCodeSchema(deps.config);

  const app = express();
  app.disable('x-powered-by');

  app.use((req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    if (allowedOrigins === '*') {
      res.setHeader('Access-Control-Allow-Origin', '*');
    } else if (origin && allowedOrigins.includes(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Vary', 'Origin');
    }
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    next();
  });

  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req: Request, res: Response) => {
    if (existsSync(deps.config.frontendIndexPath)) {
      res.sendFile(deps.config.frontendIndexPath);
      return;
    }
    res.json(HEALTH_PAYLOAD);
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json(HEALTH_PAYLOAD);
  });

  app.post('/run', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = runCodeSchema.safeParse(req.body);
    if (!parsed.success) {
      const error = new ValidationError('Invalid run request', {
        issues: parsed.error.flatten().fieldErrors,
      });
      res.status(422).json(createErrorFromException(error, false));
      return;
    }

    try {
      const response = await runAndExplain(toRunRequest(parsed.data), {
        runner: deps.runner,
        explainer: deps.explainer,
        logger,
      });
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json(createErrorFromException(new NotFoundError(req.method, req.path), false));
  });

  // Express recognises error handlers by their four parameters
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(error)) {
      res.status(400).json(createErrorFromException(new ValidationError('Request body is not valid JSON'), false));
      return;
    }
    logger.error(`Unhandled error on ${req.method} ${req.path}`, error);
    res.status(500).json(createErrorFromException(error));
  });

  return app;
}
