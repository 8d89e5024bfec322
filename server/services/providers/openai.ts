import OpenAI, { APIConnectionTimeoutError, APIError, APIUserAbortError } from 'openai';
import { type SdkErrorClasses, fromSdkError, requireSetting, requireText } from './shared';
import type { AiSettings, InsightProvider, ProviderRequest } from './types';

export const OPENAI_ERRORS: SdkErrorClasses = {
  apiError: APIError,
  timeoutError: APIConnectionTimeoutError,
  userAbortError: APIUserAbortError,
};

type ChatClient = Pick<OpenAI, 'chat'>;

/**
 * One chat completion with the system and user prompts. Shared by the OpenAI
 * and Azure adapters; retries are off at the client so a failure surfaces once.
 */
export const completeChat = async (
  client: ChatClient,
  model: string,
  settings: AiSettings,
  request: ProviderRequest,
  service: string,
): Promise<string> => {
  try {
    const completion = await client.chat.completions.create(
      {
        model,
        max_tokens: settings.maxTokens,
        temperature: settings.temperature,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.prompt },
        ],
      },
      { timeout: settings.requestTimeoutMs, signal: request.signal },
    );
    return requireText(completion.choices[0]?.message?.content, service);
  } catch (error) {
    throw fromSdkError(error, service, settings.requestTimeoutMs, OPENAI_ERRORS);
  }
};

export const createOpenAiProvider = (settings: AiSettings): InsightProvider => {
  let client: OpenAI | null = null;

  return {
    name: 'openai',
    async generate(request) {
      const apiKey = requireSetting(settings.openai.apiKey, 'OpenAI API key is not configured');
      if (!client) {
        client = new OpenAI({ apiKey, maxRetries: 0 });
      }
      return completeChat(client, settings.openai.model, settings, request, 'OpenAI');
    },
  };
};
