/**
 * Runner configuration
 *
 * Zod-validated environment config and the stripped environment handed to
 * child processes.
 */

import { z } from 'zod';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '@code-coach/shared/Types/errors.js';

const PACKAGE_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..');

// ── Schema ───────────────────────────────────────────────────────────────────

const configSchema = z
  .object({
    host: z.string().min(1).default('0.0.0.0'),
    port: z.coerce.number().int().min(0).max(65535).default(8000),
    pythonBin: z.string().min(1).default('python3'),
    defaultTimeoutSeconds: z.coerce.number().int().positive().default(10),
    minTimeoutSeconds: z.coerce.number().int().positive().default(1),
    maxTimeoutSeconds: z.coerce.number().int().positive().default(60),
    killGraceMs: z.coerce.number().int().nonnegative().default(2_000),
    maxOutputChars: z.coerce.number().int().positive().default(20_000),
    truncationHead: z.coerce.number().int().positive().default(8_000),
    truncationTail: z.coerce.number().int().positive().default(8_000),
    corsOrigins: z.string().default('*'),
    frontendIndexPath: z.string().default(resolve(PACKAGE_ROOT, '../Frontend/index.html')),
    azureEndpoint: z.string().optional(),
    azureApiKey: z.string().optional(),
    azureDeployment: z.string().optional(),
    azureApiVersion: z.string().optional(),
    explainerTimeoutMs: z.coerce.number().int().positive().default(20_000),
  })
  .refine((c) => c.minTimeoutSeconds <= c.maxTimeoutSeconds, {
    message: 'RUNNER_MIN_TIMEOUT_SECONDS must not exceed RUNNER_MAX_TIMEOUT_SECONDS',
    path: ['minTimeoutSeconds'],
  })
  .refine(
    (c) => c.defaultTimeoutSeconds >= c.minTimeoutSeconds && c.defaultTimeoutSeconds <= c.maxTimeoutSeconds,
    {
      message: 'RUNNER_DEFAULT_TIMEOUT_SECONDS must lie within the min/max timeout range',
      path: ['defaultTimeoutSeconds'],
    },
  )
  .refine((c) => c.truncationHead + c.truncationTail <= c.maxOutputChars, {
    message: 'RUNNER_TRUNCATION_HEAD + RUNNER_TRUNCATION_TAIL must not exceed RUNNER_MAX_OUTPUT_CHARS',
    path: ['maxOutputChars'],
  });

export type RunnerConfig = Readonly<z.infer<typeof configSchema>>;

// ── Loading ──────────────────────────────────────────────────────────────────

/**
 * Build the service configuration from environment variables.
 * Call once at startup and pass the result down; nothing re-reads the
 * environment afterwards.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const raw = {
    host: env.HOST,
    port: env.PORT,
    pythonBin: env.RUNNER_PYTHON_BIN,
    defaultTimeoutSeconds: env.RUNNER_DEFAULT_TIMEOUT_SECONDS,
    minTimeoutSeconds: env.RUNNER_MIN_TIMEOUT_SECONDS,
    maxTimeoutSeconds: env.RUNNER_MAX_TIMEOUT_SECONDS,
    killGraceMs: env.RUNNER_KILL_GRACE_MS,
    maxOutputChars: env.RUNNER_MAX_OUTPUT_CHARS,
    truncationHead: env.RUNNER_TRUNCATION_HEAD,
    truncationTail: env.RUNNER_TRUNCATION_TAIL,
    corsOrigins: env.CORS_ORIGINS,
    frontendIndexPath: env.FRONTEND_INDEX_PATH,
    azureEndpoint: env.AZURE_OPENAI_ENDPOINT,
    azureApiKey: env.AZURE_OPENAI_API_KEY,
    azureDeployment: env.AZURE_OPENAI_DEPLOYMENT,
    azureApiVersion: env.AZURE_OPENAI_API_VERSION,
    explainerTimeoutMs: env.EXPLAINER_TIMEOUT_MS,
  };

  // Strip undefined keys so Zod defaults kick in
  const cleaned = Object.fromEntries(
    Object.entries(raw).filter(([, v]) => v !== undefined),
  );

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigurationError(`Runner config error: ${result.error.message}`, {
      issues: result.error.flatten().fieldErrors,
    });
  }

  return Object.freeze({
    ...result.data,
    frontendIndexPath: resolve(result.data.frontendIndexPath),
  });
}

/**
 * Parse CORS_ORIGINS: '*' allows any origin, otherwise a comma-separated list.
 */
export function parseCorsOrigins(value: string): '*' | string[] {
  const origins = value
    .split(',')
    .map((o) => o.trim())
    .filter((o) => o.length > 0);
  if (origins.length === 0 || origins.includes('*')) return '*';
  return origins;
}

// ── Stripped Environment ─────────────────────────────────────────────────────

const ENV_ALLOWLIST = ['PATH', 'HOME', 'LANG', 'TERM', 'TMPDIR', 'USER'];

/**
 * Build a minimal environment for the child process.
 * Only allowlisted vars pass through, so reasoning-service credentials stay
 * in this process. Python output is unbuffered so prints made before a
 * timeout kill still reach the pipe.
 */
export function getStrippedEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const stripped: Record<string, string> = {};
  for (const key of ENV_ALLOWLIST) {
    const val = env[key];
    if (val !== undefined) {
      stripped[key] = val;
    }
  }
  stripped.PYTHONUNBUFFERED = '1';
  stripped.PYTHONIOENCODING = 'utf-8';
  return stripped;
}
