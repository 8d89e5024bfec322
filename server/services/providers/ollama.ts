import { pick } from '../../utils/http';
import { postJson, requireSetting, requireText, trimTrailingSlash } from './shared';
import type { AiSettings, InsightProvider } from './types';

export const createOllamaProvider = (settings: AiSettings): InsightProvider => ({
  name: 'ollama',
  async generate(request) {
    const baseUrl = requireSetting(settings.ollama.baseUrl, 'Ollama base URL is not configured');
    const body = {
      model: settings.ollama.model,
      prompt: `${request.systemPrompt}\n\n${request.prompt}`,
      stream: false,
      options: {
        temperature: settings.temperature,
        num_predict: settings.maxTokens,
      },
    };
    const payload = await postJson(`${trimTrailingSlash(baseUrl)}/api/generate`, body, {
      service: 'Ollama',
      timeoutMs: settings.requestTimeoutMs,
      signal: request.signal,
    });
    return requireText(pick(payload, 'response'), 'Ollama');
  },
});
