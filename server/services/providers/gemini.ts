import { ApiError, GoogleGenAI } from '@google/genai';
import { InsightsError, RemoteError, isInsightsError } from '../../errors';
import { requireSetting, requireText } from './shared';
import type { AiSettings, InsightProvider } from './types';

export const createGeminiProvider = (settings: AiSettings): InsightProvider => {
  let ai: GoogleGenAI | null = null;

  return {
    name: 'google',
    async generate(request) {
      const apiKey = requireSetting(settings.google.apiKey, 'Google Gemini API key is not configured');
      if (!ai) {
        ai = new GoogleGenAI({ apiKey });
      }

      const controller = new AbortController();
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, settings.requestTimeoutMs);
      const onCallerAbort = () => controller.abort();
      request.signal?.addEventListener('abort', onCallerAbort, { once: true });

      try {
        const response = await ai.models.generateContent({
          model: settings.google.model,
          contents: `${request.systemPrompt}\n\n${request.prompt}`,
          config: {
            temperature: settings.temperature,
            maxOutputTokens: settings.maxTokens,
            abortSignal: controller.signal,
          },
        });
        return requireText(response.text, 'Gemini');
      } catch (error) {
        if (timedOut) {
          throw new InsightsError('Timeout', `Gemini request timed out after ${settings.requestTimeoutMs} ms`, {
            cause: error,
          });
        }
        if (error instanceof ApiError) {
          throw new RemoteError('Gemini', error.status, error.message);
        }
        if (isInsightsError(error) || request.signal?.aborted) {
          throw error;
        }
        throw new RemoteError('Gemini', 0, error instanceof Error ? error.message : String(error));
      } finally {
        clearTimeout(timer);
        request.signal?.removeEventListener('abort', onCallerAbort);
      }
    },
  };
};
