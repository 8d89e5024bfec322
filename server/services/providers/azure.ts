import { AzureOpenAI } from 'openai';
import { InsightsError } from '../../errors';
import { completeChat } from './openai';
import { trimTrailingSlash } from './shared';
import type { AiSettings, InsightProvider } from './types';

export const createAzureProvider = (settings: AiSettings): InsightProvider => {
  let client: AzureOpenAI | null = null;

  return {
    name: 'azure',
    async generate(request) {
      const { endpoint, apiKey, deployment, apiVersion } = settings.azure;
      if (!endpoint?.trim() || !apiKey?.trim() || !deployment?.trim()) {
        throw new InsightsError('MisconfiguredProvider', 'Azure OpenAI configuration is not complete');
      }
      if (!client) {
        client = new AzureOpenAI({
          endpoint: trimTrailingSlash(endpoint.trim()),
          apiKey: apiKey.trim(),
          deployment: deployment.trim(),
          apiVersion,
          maxRetries: 0,
        });
      }
      // The deployment picks the model; the field is still required by the client.
      return completeChat(client, deployment.trim(), settings, request, 'Azure OpenAI');
    },
  };
};
