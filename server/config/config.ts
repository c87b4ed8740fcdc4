import path from 'node:path';
import { ConfigSchema, type AppConfig, type PublicConfig, getPublicConfig as getPublicConfigShared } from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

const csvFromEnv = (value: string | undefined, fallback: string[] = []): string[] => {
  if (!value) return fallback;
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
};

const optionalFromEnv = (value: string | undefined): string | undefined => value?.trim() || undefined;

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const rawRoot = env.RAW_DATA_ROOT || path.join(process.cwd(), 'raw_data');
  const rootDir = path.resolve(rawRoot);
  const geminiApiKey = env.GEMINI_API_KEY?.trim() || '';

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3001),
      heartbeatIntervalMs: numberFromEnv(env.HEARTBEAT_INTERVAL_MS, 15_000),
    },
    source: {
      baseUrl: env.SOURCE_BASE_URL?.trim() || 'https://www.gktoday.in/current-affairs/',
      pages: numberFromEnv(env.SOURCE_PAGES, 3),
      skipUrlPatterns: csvFromEnv(env.SOURCE_SKIP_URL_PATTERNS, ['daily-current-affairs-quiz']),
    },
    scraping: {
      fetchTimeoutMs: numberFromEnv(env.SCRAPE_FETCH_TIMEOUT_MS, 10_000),
      userAgent:
        env.SCRAPE_USER_AGENT?.trim() ||
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36',
      concurrency: numberFromEnv(env.SCRAPE_CONCURRENCY, 4),
      minImageBytes: numberFromEnv(env.MIN_IMAGE_BYTES, 100),
    },
    translation: {
      provider: (env.TRANSLATION_PROVIDER?.trim().toLowerCase() || (geminiApiKey ? 'gemini' : 'none')) === 'gemini'
        ? 'gemini'
        : 'none',
      targetLanguage: env.TRANSLATION_TARGET_LANGUAGE?.trim() || 'gu',
      targetLanguageName: env.TRANSLATION_TARGET_LANGUAGE_NAME?.trim() || 'Gujarati',
    },
    llm: {
      apiKey: geminiApiKey,
      model: env.GEMINI_MODEL?.trim() || 'gemini-2.5-flash',
      temperature: numberFromEnv(env.GEMINI_TEMPERATURE, 0),
      maxOutputTokens: numberFromEnv(env.GEMINI_MAX_OUTPUT_TOKENS, 2048),
      requestsPerMinute: Math.max(1, numberFromEnv(env.GEMINI_REQUESTS_PER_MINUTE, 60)),
    },
    ledger: {
      mode: (env.LEDGER_MODE?.trim().toLowerCase() || (env.REDIS_URL ? 'redis' : 'memory')) === 'redis'
        ? 'redis'
        : 'memory',
      redisUrl: optionalFromEnv(env.REDIS_URL),
      keyPrefix: env.LEDGER_KEY_PREFIX ?? 'digest:url:',
    },
    docs: {
      enabled: booleanFromEnv(env.GOOGLE_DOCS_ENABLED, Boolean(env.GOOGLE_CREDENTIALS_JSON)),
      credentialsJson: optionalFromEnv(env.GOOGLE_CREDENTIALS_JSON),
      concurrency: numberFromEnv(env.GOOGLE_DOCS_CONCURRENCY, 2),
      apiTimeoutMs: numberFromEnv(env.GOOGLE_DOCS_TIMEOUT_MS, 15_000),
    },
    delivery: {
      botToken: optionalFromEnv(env.TELEGRAM_BOT_TOKEN),
      channelId: optionalFromEnv(env.TELEGRAM_CHANNEL_ID),
      joinHandle: optionalFromEnv(env.TELEGRAM_JOIN_HANDLE),
      captionLimit: numberFromEnv(env.TELEGRAM_CAPTION_LIMIT, 1024),
      maxAttempts: numberFromEnv(env.DELIVERY_MAX_ATTEMPTS, 5),
      backoffMs: numberFromEnv(env.DELIVERY_BACKOFF_MS, 10_000),
      backoffSchedule: env.DELIVERY_BACKOFF_SCHEDULE?.trim().toLowerCase() === 'linear' ? 'linear' : 'fixed',
      timeoutMs: numberFromEnv(env.DELIVERY_TIMEOUT_MS, 60_000),
    },
    persistence: {
      mode: env.PERSISTENCE_MODE?.trim().toLowerCase() === 'none' ? 'none' : 'fs',
      rootDir,
      articlesDir: path.join(rootDir, 'articles'),
      outputsDir: path.join(rootDir, 'outputs'),
    },
    observability: {
      logLevel: env.LOG_LEVEL?.trim().toLowerCase() || 'info',
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

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);
