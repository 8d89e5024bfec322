import Anthropic, { APIConnectionTimeoutError, APIError, APIUserAbortError } from '@anthropic-ai/sdk';
import { type SdkErrorClasses, fromSdkError, requireSetting, requireText } from './shared';
import type { AiSettings, InsightProvider } from './types';

export const ANTHROPIC_ERRORS: SdkErrorClasses = {
  apiError: APIError,
  timeoutError: APIConnectionTimeoutError,
  userAbortError: APIUserAbortError,
};

export const createAnthropicProvider = (settings: AiSettings): InsightProvider => {
  let client: Anthropic | null = null;

  return {
    name: 'anthropic',
    async generate(request) {
      const apiKey = requireSetting(settings.anthropic.apiKey, 'Anthropic API key is not configured');
      if (!client) {
        client = new Anthropic({ apiKey, maxRetries: 0 });
      }
      try {
        const message = await client.messages.create(
          {
            model: settings.anthropic.model,
            max_tokens: settings.maxTokens,
            temperature: settings.temperature,
            system: request.systemPrompt,
            messages: [{ role: 'user', content: request.prompt }],
          },
          { timeout: settings.requestTimeoutMs, signal: request.signal },
        );
        const first = message.content[0];
        return requireText(first?.type === 'text' ? first.text : undefined, 'Claude');
      } catch (error) {
        throw fromSdkError(error, 'Anthropic', settings.requestTimeoutMs, ANTHROPIC_ERRORS);
      }
    },
  };
};
