/**
 * Runner service entry point
 */

import { loadEnvSafely } from '@code-coach/shared/Utils/env.js';
import { Logger } from '@code-coach/shared/Utils/logger.js';
import { loadConfig } from './config.js';
import { createSubprocessRunner } from './executor/subprocess.js';
import { createExplanationProvider } from './explain/gate.js';
import { resolveReadiness } from './explain/readiness.js';
import { createApp } from './server.js';

const logger = new Logger('runner');

async function main(): Promise<void> {
  const envPath = loadEnvSafely(import.meta.url);
  if (envPath) logger.info(`Loaded environment from ${envPath}`);

  // Configuration and readiness are fixed for the life of the process
  const config = loadConfig();
  const readiness = resolveReadiness(config);

  const explainer = createExplanationProvider(readiness, { timeoutMs: config.explainerTimeoutMs });
  const runner = createSubprocessRunner(config);
  const app = createApp({ config, runner, explainer });

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Listening on http://${config.host}:${config.port}`, {
      python: config.pythonBin,
      explainer: explainer.mode,
      timeoutRange: [config.minTimeoutSeconds, config.maxTimeoutSeconds],
    });
  });
  server.on('error', (error) => {
    logger.error('HTTP server error', error);
    process.exit(1);
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down`);
    server.close((error) => {
      if (error) {
        logger.error('Error while closing server', error);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
