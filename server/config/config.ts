import path from 'node:path';
import os from 'node:os';
import { ConfigSchema, type AppConfig } from '../../shared/config';

type Env = Record<string, string | undefined>;

export const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const csvFromEnv = (value: string | undefined): string[] => {
  if (!value) return [];
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
};

const optionalFromEnv = (value: string | undefined): string | undefined => value?.trim() || undefined;

const parseLogLevel = (value: string | undefined): AppConfig['observability']['logLevel'] => {
  const normalized = (value || 'info').trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return normalized;
    default:
      return 'info';
  }
};

export type { AppConfig };

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: Env = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const rawRoot = env.DATA_ROOT || path.join(os.tmpdir(), 'document-insights');
  const rootDir = path.resolve(rawRoot);

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 8080),
      bodyLimit: env.BODY_LIMIT?.trim() || '1mb',
      corsOrigins: csvFromEnv(env.FRONTEND_URL || 'http://localhost:3000'),
    },
    uploads: {
      maxBytes: numberFromEnv(env.UPLOAD_MAX_BYTES, 100 * 1024 * 1024),
    },
    persistence: {
      rootDir,
      documentsDir: path.join(rootDir, 'documents'),
      uploadsDir: path.join(rootDir, 'uploads'),
    },
    confluence: {
      timeoutMs: numberFromEnv(env.CONFLUENCE_TIMEOUT_MS, 30_000),
      defaultEmail: optionalFromEnv(env.CONFLUENCE_EMAIL),
      defaultToken: optionalFromEnv(env.CONFLUENCE_API_TOKEN),
    },
    ai: {
      provider: env.AI_PROVIDER?.trim().toLowerCase() || 'demo',
      requestTimeoutMs: numberFromEnv(env.AI_REQUEST_TIMEOUT_MS, 60_000),
      temperature: numberFromEnv(env.AI_TEMPERATURE ?? env.OPENAI_TEMPERATURE, 0.7),
      maxTokens: numberFromEnv(env.AI_MAX_TOKENS ?? env.OPENAI_MAX_TOKENS, 2000),
      openai: {
        apiKey: optionalFromEnv(env.OPENAI_API_KEY),
        model: env.OPENAI_MODEL?.trim() || 'gpt-4o-mini',
      },
      azure: {
        endpoint: optionalFromEnv(env.AZURE_OPENAI_ENDPOINT),
        apiKey: optionalFromEnv(env.AZURE_OPENAI_API_KEY),
        deployment: optionalFromEnv(env.AZURE_OPENAI_DEPLOYMENT) ?? 'gpt-35-turbo',
        apiVersion: env.AZURE_OPENAI_API_VERSION?.trim() || '2024-02-15-preview',
      },
      google: {
        apiKey: optionalFromEnv(env.GOOGLE_GEMINI_API_KEY),
        model: env.GOOGLE_GEMINI_MODEL?.trim() || 'gemini-2.5-flash',
      },
      anthropic: {
        apiKey: optionalFromEnv(env.ANTHROPIC_API_KEY),
        model: env.ANTHROPIC_MODEL?.trim() || 'claude-3-5-sonnet-latest',
      },
      ollama: {
        baseUrl: optionalFromEnv(env.OLLAMA_BASE_URL) ?? 'http://localhost:11434',
        model: env.OLLAMA_MODEL?.trim() || 'llama3',
      },
    },
    cache: {
      insights: {
        ttlSeconds: numberFromEnv(env.CACHE_INSIGHTS_TTL_SECONDS, 1800),
        maxEntries: numberFromEnv(env.CACHE_INSIGHTS_MAX_ENTRIES, 1000),
      },
      documentSummaries: {
        ttlSeconds: numberFromEnv(env.CACHE_SUMMARIES_TTL_SECONDS, 3600),
        maxEntries: numberFromEnv(env.CACHE_SUMMARIES_MAX_ENTRIES, 500),
      },
      keyTopics: {
        ttlSeconds: numberFromEnv(env.CACHE_TOPICS_TTL_SECONDS, 3600),
        maxEntries: numberFromEnv(env.CACHE_TOPICS_MAX_ENTRIES, 200),
      },
    },
    observability: {
      logLevel: parseLogLevel(env.LOG_LEVEL),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};
