import os from 'node:os';
import type { ArtifactStore } from '../../shared/artifacts';
import { createNoopArtifactStore } from '../../shared/artifacts';
import type { AppConfig } from '../../shared/config';
import { RetryPolicy } from '../delivery/retryPolicy';
import { createTelegramChannel } from '../delivery/telegram';
import type { DeliveryChannel } from '../delivery/telegram';
import { createDocsClientFromConfig } from '../docs/client';
import type { DocsClient } from '../docs/client';
import { RemoteApiError } from '../errors';
import { createLedgerFromConfig } from '../ledger/ledger';
import type { DedupLedger } from '../ledger/ledger';
import { createLogger } from '../obs/logger';
import type { Logger } from '../obs/logger';
import { createFsArtifactStore } from '../persistence/fsStore';
import { createImageLoader } from '../render/images';
import type { ImageLoader } from '../render/images';
import { createTranslator } from '../translation/translator';
import type { Translator } from '../translation/translator';

/**
 * Every collaborator a run talks to, built once per process and handed to `runDigest`.
 * Tests build one from fakes instead.
 */
export interface RunContext {
  config: AppConfig;
  logger: Logger;
  ledger: DedupLedger;
  translator: Translator;
  loadImage: ImageLoader;
  /** Null when remote documents are disabled or have no credentials. */
  docsClient: DocsClient | null;
  /** Null when the bot token or channel id is missing. */
  channel: DeliveryChannel | null;
  retryPolicy: RetryPolicy;
  store: ArtifactStore;
  /** Directory under which the rendered file gets its private temp directory. */
  tempRoot: string;
  now: () => Date;
}

const createChannelFromConfig = (config: Pick<AppConfig, 'delivery'>): DeliveryChannel | null => {
  const { botToken, channelId, timeoutMs } = config.delivery;
  if (!botToken || !channelId) return null;
  return createTelegramChannel({ botToken, channelId, timeoutMs });
};

const createDocsClientOrNull = (config: AppConfig, logger: Logger): DocsClient | null => {
  try {
    return createDocsClientFromConfig(config);
  } catch (error) {
    if (!(error instanceof RemoteApiError)) throw error;
    logger.error('Google Docs disabled: credentials rejected', { error: error.message });
    return null;
  }
};

export const createRunContext = (config: AppConfig, overrides: Partial<RunContext> = {}): RunContext => {
  const logger = overrides.logger ?? createLogger(config);
  return {
    config,
    logger,
    ledger: overrides.ledger ?? createLedgerFromConfig(config, logger),
    translator: overrides.translator ?? createTranslator(config, logger),
    loadImage: overrides.loadImage ?? createImageLoader({ config, logger }),
    docsClient: overrides.docsClient !== undefined ? overrides.docsClient : createDocsClientOrNull(config, logger),
    channel: overrides.channel !== undefined ? overrides.channel : createChannelFromConfig(config),
    retryPolicy:
      overrides.retryPolicy ??
      new RetryPolicy({
        maxAttempts: config.delivery.maxAttempts,
        backoffMs: config.delivery.backoffMs,
        schedule: config.delivery.backoffSchedule,
      }),
    store:
      overrides.store ??
      (config.persistence.mode === 'fs' ? createFsArtifactStore(config) : createNoopArtifactStore()),
    tempRoot: overrides.tempRoot ?? os.tmpdir(),
    now: overrides.now ?? (() => new Date()),
  };
};

export const closeRunContext = async (ctx: RunContext): Promise<void> => {
  await ctx.ledger.close();
};
