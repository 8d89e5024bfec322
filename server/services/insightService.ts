import type { AppConfig, ProviderName } from '../../shared/config';
import { InsightsError } from '../errors';
import { errorMessage, type Logger } from '../obs/logger';
import { loadPrompt } from '../prompts/loader';
import { parseStringList } from '../utils/jsonExtract';
import { type TtlCache, createTtlCache, documentsFingerprint, insightCacheKey } from './insightCache';
import { ProviderRouter, createProviderTable } from './providers';
import { DEMO_TOPICS, renderDemoSummary } from './providers/demo';
import type { InsightDocument } from './providers/types';

export interface InsightCaches {
  insights: TtlCache<string>;
  documentSummaries: TtlCache<string>;
  keyTopics: TtlCache<string[]>;
}

export const createInsightCaches = (config: Pick<AppConfig, 'cache'>, now?: () => number): InsightCaches => ({
  insights: createTtlCache<string>('insights', config.cache.insights, now),
  documentSummaries: createTtlCache<string>('documentSummaries', config.cache.documentSummaries, now),
  keyTopics: createTtlCache<string[]>('keyTopics', config.cache.keyTopics, now),
});

const preview = (value: string, max = 100): string => value.slice(0, Math.min(value.length, max));

export class InsightService {
  private readonly router: ProviderRouter;
  readonly caches: InsightCaches;

  constructor(
    config: AppConfig,
    private logger: Logger,
    deps: { router?: ProviderRouter; caches?: InsightCaches } = {},
  ) {
    this.router = deps.router ?? new ProviderRouter(createProviderTable(config.ai), config.ai.provider);
    this.caches = deps.caches ?? createInsightCaches(config);
  }

  resolveProvider(name?: string | null): ProviderName {
    return this.router.resolve(name).name;
  }

  /**
   * Answers a query over the given documents with the named (or configured)
   * provider. Concurrent identical requests share one provider call; `signal`
   * detaches this caller only, and the call is cancelled once all callers left.
   */
  async generateInsights(
    query: string,
    documents: InsightDocument[],
    providerName?: string | null,
    signal?: AbortSignal,
  ): Promise<string> {
    const provider = this.router.resolve(providerName);
    const key = `${provider.name}:${insightCacheKey(query, documents)}`;

    return this.caches.insights.getOrCompute(
      key,
      (computeSignal) => this.callProvider(provider.name, query, documents, computeSignal),
      signal,
    );
  }

  private async callProvider(
    providerName: ProviderName,
    query: string,
    documents: InsightDocument[],
    signal: AbortSignal,
  ): Promise<string> {
    this.logger.info('Generating AI insights', {
      provider: providerName,
      query: preview(query),
      documents: documents.length,
    });
    const startedAt = Date.now();
    try {
      const text = await this.router.generate(query, documents, providerName, signal);
      this.logger.info('AI insights generated', { provider: providerName, elapsedMs: Date.now() - startedAt });
      return text;
    } catch (error) {
      this.logger.error('Error generating AI insights', {
        provider: providerName,
        error: errorMessage(error),
        kind: error instanceof InsightsError ? error.kind : undefined,
      });
      throw error;
    }
  }

  async summarizeDocument(document: InsightDocument, providerName?: string | null): Promise<string> {
    const provider = this.router.resolve(providerName);
    return this.caches.documentSummaries.getOrCompute(`${provider.name}:${document.id}`, async () => {
      if (provider.name === 'demo') {
        return renderDemoSummary(document);
      }
      return this.generateInsights(loadPrompt('document_summary.md'), [document], provider.name);
    });
  }

  async extractKeyTopics(documents: InsightDocument[], providerName?: string | null): Promise<string[]> {
    const provider = this.router.resolve(providerName);
    const topics = await this.caches.keyTopics.getOrCompute(
      `${provider.name}:${documentsFingerprint(documents)}`,
      async () => {
        if (provider.name === 'demo') {
          return [...DEMO_TOPICS];
        }
        const raw = await this.router.generate(loadPrompt('key_topics.md'), documents, provider.name);
        const parsed = parseStringList(raw);
        if (!parsed) {
          this.logger.warn('Key topic answer was not a JSON list', { provider: provider.name, answer: preview(raw, 200) });
          throw new InsightsError('EmptyResponse', `No topics could be parsed from the ${provider.name} response`);
        }
        return parsed;
      },
    );
    return [...topics];
  }
}
