import { createAzure } from '@ai-sdk/azure';
import type { LanguageModelV1 } from 'ai';
import { Logger } from '@code-coach/shared/Utils/logger.js';
import type { AzureCredentials } from '../explain/readiness.js';

const logger = new Logger('runner:llm');

/**
 * Create an Azure OpenAI provider from a resource endpoint such as
 * https://my-resource.openai.azure.com/
 */
export function createAzureProvider(credentials: AzureCredentials) {
  const endpoint = credentials.endpoint.replace(/\/+$/, '');

  return createAzure({
    baseURL: `${endpoint}/openai/deployments`,
    apiKey: credentials.apiKey,
    ...(credentials.apiVersion ? { apiVersion: credentials.apiVersion } : {}),
  });
}

/**
 * Create the language model behind the remote explainer
 */
export function createExplainerModel(credentials: AzureCredentials): LanguageModelV1 {
  logger.info(`Initializing Azure OpenAI with deployment: ${credentials.deployment}`);
  const azure = createAzureProvider(credentials);
  return azure(credentials.deployment);
}
