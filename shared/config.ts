import { z } from 'zod';

export const MAX_LISTING_PAGES = 10;

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    heartbeatIntervalMs: z.number().int().positive(),
  }),
  source: z.object({
    baseUrl: z.string().url(),
    pages: z.number().int().min(1).max(MAX_LISTING_PAGES),
    skipUrlPatterns: z.array(z.string().min(1)),
  }),
  scraping: z.object({
    fetchTimeoutMs: z.number().int().positive(),
    userAgent: z.string().min(1),
    concurrency: z.number().int().positive(),
    minImageBytes: z.number().int().nonnegative(),
  }),
  translation: z.object({
    provider: z.enum(['gemini', 'none']),
    targetLanguage: z.string().min(2),
    targetLanguageName: z.string().min(1),
  }),
  llm: z.object({
    apiKey: z.string(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    maxOutputTokens: z.number().int().positive(),
    requestsPerMinute: z.number().int().positive(),
  }),
  ledger: z.object({
    mode: z.enum(['redis', 'memory']),
    redisUrl: z.string().optional(),
    keyPrefix: z.string(),
  }),
  docs: z.object({
    enabled: z.boolean(),
    credentialsJson: z.string().optional(),
    concurrency: z.number().int().positive(),
    apiTimeoutMs: z.number().int().positive(),
  }),
  delivery: z.object({
    botToken: z.string().optional(),
    channelId: z.string().optional(),
    joinHandle: z.string().optional(),
    captionLimit: z.number().int().min(16),
    maxAttempts: z.number().int().positive(),
    backoffMs: z.number().int().nonnegative(),
    backoffSchedule: z.enum(['fixed', 'linear']),
    timeoutMs: z.number().int().positive(),
  }),
  persistence: z.object({
    mode: z.enum(['fs', 'none']),
    rootDir: z.string().min(1),
    articlesDir: z.string().min(1),
    outputsDir: z.string().min(1),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  source: {
    baseUrl: string;
    pages: number;
  };
  translation: {
    provider: AppConfig['translation']['provider'];
    targetLanguage: string;
  };
  ledgerMode: AppConfig['ledger']['mode'];
  docsEnabled: boolean;
  deliveryConfigured: boolean;
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  source: {
    baseUrl: config.source.baseUrl,
    pages: config.source.pages,
  },
  translation: {
    provider: config.translation.provider,
    targetLanguage: config.translation.targetLanguage,
  },
  ledgerMode: config.ledger.mode,
  docsEnabled: config.docs.enabled,
  deliveryConfigured: Boolean(config.delivery.botToken && config.delivery.channelId),
});

/**
 * Parses a listing page-count override from a query string value.
 * Returns undefined when the value is unusable or equals the configured default.
 */
export const parsePageCountParam = (value: string | null | undefined, fallback: number): number | undefined => {
  if (value == null || value.trim() === '') {
    return undefined;
  }
  const n = Number(value);
  if (!Number.isFinite(n)) {
    return undefined;
  }
  const clamped = Math.max(1, Math.min(MAX_LISTING_PAGES, Math.round(n)));
  return clamped === fallback ? undefined : clamped;
};
