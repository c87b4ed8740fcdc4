import Redis from 'ioredis';
import type { AppConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';

/**
 * Record of every article URL already published. `claim` is the only write the pipeline
 * uses; it checks and records in one step so two overlapping runs never both win a URL.
 */
export interface DedupLedger {
  exists: (url: string) => Promise<boolean>;
  insert: (url: string, at: Date) => Promise<void>;
  /** @returns true when `url` was not recorded before this call */
  claim: (url: string, at: Date) => Promise<boolean>;
  close: () => Promise<void>;
}

export const createMemoryLedger = (seed: Iterable<string> = []): DedupLedger => {
  const seen = new Map<string, string>();
  for (const url of seed) seen.set(url, new Date(0).toISOString());
  return {
    exists: async (url) => seen.has(url),
    insert: async (url, at) => {
      seen.set(url, at.toISOString());
    },
    claim: async (url, at) => {
      if (seen.has(url)) return false;
      seen.set(url, at.toISOString());
      return true;
    },
    close: async () => {},
  };
};

export interface RedisLedgerOptions {
  redisUrl: string;
  keyPrefix: string;
  logger: Logger;
}

export const createRedisLedger = ({ redisUrl, keyPrefix, logger }: RedisLedgerOptions): DedupLedger => {
  const redis = new Redis(redisUrl, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    // Give up after a few attempts so pending commands reject instead of queueing forever.
    retryStrategy: (times) => (times > 3 ? null : Math.min(times * 200, 1000)),
  });
  redis.on('error', (error: Error) => {
    logger.warn('Ledger connection error', { error: error.message });
  });

  const keyFor = (url: string) => `${keyPrefix}${url}`;

  return {
    exists: async (url) => (await redis.exists(keyFor(url))) > 0,
    insert: async (url, at) => {
      await redis.set(keyFor(url), at.toISOString());
    },
    claim: async (url, at) => (await redis.set(keyFor(url), at.toISOString(), 'NX')) === 'OK',
    close: async () => {
      if (redis.status === 'end' || redis.status === 'wait') {
        redis.disconnect();
        return;
      }
      await redis.quit();
    },
  };
};

export const createLedgerFromConfig = (config: Pick<AppConfig, 'ledger'>, logger: Logger): DedupLedger => {
  if (config.ledger.mode === 'redis' && config.ledger.redisUrl) {
    return createRedisLedger({ redisUrl: config.ledger.redisUrl, keyPrefix: config.ledger.keyPrefix, logger });
  }
  if (config.ledger.mode === 'redis') {
    logger.warn('LEDGER_MODE=redis without REDIS_URL; using in-memory ledger');
  }
  return createMemoryLedger();
};

/**
 * Claims each URL in order and returns the ones recorded by this call. An unreachable
 * ledger makes every URL count as new.
 */
export const filterNewUrls = async (
  urls: readonly string[],
  ledger: DedupLedger,
  logger: Logger,
  now: Date = new Date(),
): Promise<string[]> => {
  const fresh: string[] = [];
  try {
    for (const url of urls) {
      if (await ledger.claim(url, now)) {
        fresh.push(url);
      } else {
        logger.debug('URL already published', { url });
      }
    }
  } catch (error) {
    logger.warn('Ledger unavailable; treating all URLs as new', {
      error: error instanceof Error ? error.message : String(error),
    });
    return [...urls];
  }
  return fresh;
};
