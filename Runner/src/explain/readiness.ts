import type { RunnerConfig } from '../config.js';

/**
 * Connection details for the Azure OpenAI deployment used by the remote
 * explainer.
 */
export interface AzureCredentials {
  endpoint: string;
  apiKey: string;
  deployment: string;
  apiVersion?: string;
}

/**
 * Whether the remote explanation path is usable. Computed once at startup
 * and frozen; later changes to the environment do not affect it.
 */
export type Readiness =
  | { readonly ready: true; readonly credentials: Readonly<AzureCredentials> }
  | { readonly ready: false; readonly missing: readonly string[] };

type AzureSettings = Pick<RunnerConfig, 'azureEndpoint' | 'azureApiKey' | 'azureDeployment' | 'azureApiVersion'>;

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

export function resolveReadiness(settings: AzureSettings): Readiness {
  const { azureEndpoint, azureApiKey, azureDeployment, azureApiVersion } = settings;

  if (present(azureEndpoint) && present(azureApiKey) && present(azureDeployment)) {
    return Object.freeze({
      ready: true,
      credentials: Object.freeze({
        endpoint: azureEndpoint.trim(),
        apiKey: azureApiKey.trim(),
        deployment: azureDeployment.trim(),
        ...(present(azureApiVersion) ? { apiVersion: azureApiVersion.trim() } : {}),
      }),
    });
  }

  const required: Array<[name: string, value: string | undefined]> = [
    ['AZURE_OPENAI_ENDPOINT', azureEndpoint],
    ['AZURE_OPENAI_API_KEY', azureApiKey],
    ['AZURE_OPENAI_DEPLOYMENT', azureDeployment],
  ];
  const missing = required
    .filter(([, value]) => !present(value))
    .map(([name]) => name);

  return Object.freeze({ ready: false, missing: Object.freeze(missing) });
}
