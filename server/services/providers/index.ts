import { PROVIDER_NAMES, type ProviderName } from '../../../shared/config';
import { InsightsError } from '../../errors';
import { createAnthropicProvider } from './anthropic';
import { createAzureProvider } from './azure';
import { buildInsightPrompts } from './context';
import { createDemoProvider } from './demo';
import { createGeminiProvider } from './gemini';
import { createOllamaProvider } from './ollama';
import { createOpenAiProvider } from './openai';
import type { AiSettings, InsightDocument, InsightProvider } from './types';

export type { InsightDocument, InsightProvider, ProviderRequest } from './types';

export type ProviderTable = Record<ProviderName, InsightProvider>;

export const createProviderTable = (settings: AiSettings): ProviderTable => ({
  openai: createOpenAiProvider(settings),
  azure: createAzureProvider(settings),
  google: createGeminiProvider(settings),
  anthropic: createAnthropicProvider(settings),
  ollama: createOllamaProvider(settings),
  demo: createDemoProvider(),
});

export const isProviderName = (value: string): value is ProviderName =>
  PROVIDER_NAMES.some((name) => name === value);

/**
 * Picks one adapter per call by configured name and hands it the shared
 * prompt. Stateless; failures surface untouched and nothing is retried.
 */
export class ProviderRouter {
  constructor(
    private readonly providers: ProviderTable,
    private readonly defaultProvider: string,
  ) {}

  resolve(providerName?: string | null): InsightProvider {
    const name = (providerName?.trim() || this.defaultProvider).toLowerCase();
    if (!isProviderName(name)) {
      throw new InsightsError('UnsupportedProvider', `Unsupported AI provider: ${name}`);
    }
    return this.providers[name];
  }

  async generate(
    query: string,
    documents: InsightDocument[],
    providerName?: string | null,
    signal?: AbortSignal,
  ): Promise<string> {
    if (!query.trim()) {
      throw new InsightsError('InvalidRequest', 'Query must not be empty');
    }
    const provider = this.resolve(providerName);
    const prompts = buildInsightPrompts(query, documents);
    return provider.generate({ query, documents, ...prompts, signal });
  }
}
