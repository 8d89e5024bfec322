import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { buildConfig, csvFromEnv, numberFromEnv } from '../config';

describe('numberFromEnv', () => {
  it('falls back on blank or non-numeric values', () => {
    expect(numberFromEnv(undefined, 5)).toBe(5);
    expect(numberFromEnv('  ', 5)).toBe(5);
    expect(numberFromEnv('abc', 5)).toBe(5);
    expect(numberFromEnv('42', 5)).toBe(42);
  });
});

describe('csvFromEnv', () => {
  it('splits and trims entries', () => {
    expect(csvFromEnv(' http://a.test , ,http://b.test')).toEqual(['http://a.test', 'http://b.test']);
    expect(csvFromEnv(undefined)).toEqual([]);
  });
});

describe('buildConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = buildConfig({ DATA_ROOT: '/srv/insights' });

    expect(config.environment).toBe('development');
    expect(config.server).toEqual({ port: 8080, bodyLimit: '1mb', corsOrigins: ['http://localhost:3000'] });
    expect(config.uploads.maxBytes).toBe(100 * 1024 * 1024);
    expect(config.persistence).toEqual({
      rootDir: path.resolve('/srv/insights'),
      documentsDir: path.join(path.resolve('/srv/insights'), 'documents'),
      uploadsDir: path.join(path.resolve('/srv/insights'), 'uploads'),
    });
    expect(config.ai.provider).toBe('demo');
    expect(config.ai.temperature).toBe(0.7);
    expect(config.ai.maxTokens).toBe(2000);
    expect(config.ai.azure.deployment).toBe('gpt-35-turbo');
    expect(config.ai.ollama).toEqual({ baseUrl: 'http://localhost:11434', model: 'llama3' });
    expect(config.cache.insights).toEqual({ ttlSeconds: 1800, maxEntries: 1000 });
    expect(config.cache.documentSummaries).toEqual({ ttlSeconds: 3600, maxEntries: 500 });
    expect(config.cache.keyTopics).toEqual({ ttlSeconds: 3600, maxEntries: 200 });
    expect(config.observability.logLevel).toBe('info');
  });

  it('reads provider settings and overrides from the environment', () => {
    const config = buildConfig({
      NODE_ENV: 'production',
      AI_PROVIDER: ' Anthropic ',
      ANTHROPIC_API_KEY: ' test-key ',
      AI_TEMPERATURE: '0.2',
      OPENAI_MAX_TOKENS: '512',
      CACHE_INSIGHTS_TTL_SECONDS: '60',
      CONFLUENCE_EMAIL: 'bot@example.com',
      CONFLUENCE_API_TOKEN: '',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.environment).toBe('production');
    expect(config.ai.provider).toBe('anthropic');
    expect(config.ai.anthropic.apiKey).toBe('test-key');
    expect(config.ai.temperature).toBe(0.2);
    expect(config.ai.maxTokens).toBe(512);
    expect(config.cache.insights.ttlSeconds).toBe(60);
    expect(config.confluence.defaultEmail).toBe('bot@example.com');
    expect(config.confluence.defaultToken).toBeUndefined();
    expect(config.observability.logLevel).toBe('debug');
  });

  it('falls back to info for an unknown log level', () => {
    expect(buildConfig({ LOG_LEVEL: 'verbose' }).observability.logLevel).toBe('info');
  });

  it('fails on values outside the schema', () => {
    expect(() => buildConfig({ AI_TEMPERATURE: '5' })).toThrow();
    expect(() => buildConfig({ PORT: '70000' })).toThrow();
  });
});
