import { z } from 'zod';

export const PROVIDER_NAMES = ['openai', 'azure', 'google', 'anthropic', 'ollama', 'demo'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

const CacheSettingsSchema = z.object({
  ttlSeconds: z.number().int().positive(),
  maxEntries: z.number().int().positive(),
});

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    bodyLimit: z.string().min(1),
    corsOrigins: z.array(z.string().min(1)),
  }),
  uploads: z.object({
    maxBytes: z.number().int().positive(),
  }),
  persistence: z.object({
    rootDir: z.string().min(1),
    documentsDir: z.string().min(1),
    uploadsDir: z.string().min(1),
  }),
  confluence: z.object({
    timeoutMs: z.number().int().positive(),
    defaultEmail: z.string().optional(),
    defaultToken: z.string().optional(),
  }),
  ai: z.object({
    // Kept as a plain string: an unknown name is a request-time UnsupportedProvider, not a boot failure.
    provider: z.string().min(1),
    requestTimeoutMs: z.number().int().positive(),
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().positive(),
    openai: z.object({
      apiKey: z.string().optional(),
      model: z.string().min(1),
    }),
    azure: z.object({
      endpoint: z.string().optional(),
      apiKey: z.string().optional(),
      deployment: z.string().optional(),
      apiVersion: z.string().min(1),
    }),
    google: z.object({
      apiKey: z.string().optional(),
      model: z.string().min(1),
    }),
    anthropic: z.object({
      apiKey: z.string().optional(),
      model: z.string().min(1),
    }),
    ollama: z.object({
      baseUrl: z.string().optional(),
      model: z.string().min(1),
    }),
  }),
  cache: z.object({
    insights: CacheSettingsSchema,
    documentSummaries: CacheSettingsSchema,
    keyTopics: CacheSettingsSchema,
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type CacheSettings = z.infer<typeof CacheSettingsSchema>;

export interface PublicConfig {
  provider: string;
  uploads: {
    maxBytes: number;
    extensions: string[];
  };
  providers: Record<ProviderName, { configured: boolean }>;
}

export const SUPPORTED_EXTENSIONS = ['.pdf', '.doc', '.docx', '.txt'];

const present = (value: string | undefined): boolean => Boolean(value && value.trim());

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  provider: config.ai.provider,
  uploads: {
    maxBytes: config.uploads.maxBytes,
    extensions: [...SUPPORTED_EXTENSIONS],
  },
  providers: {
    openai: { configured: present(config.ai.openai.apiKey) },
    azure: {
      configured:
        present(config.ai.azure.endpoint) && present(config.ai.azure.apiKey) && present(config.ai.azure.deployment),
    },
    google: { configured: present(config.ai.google.apiKey) },
    anthropic: { configured: present(config.ai.anthropic.apiKey) },
    ollama: { configured: present(config.ai.ollama.baseUrl) },
    demo: { configured: true },
  },
});
