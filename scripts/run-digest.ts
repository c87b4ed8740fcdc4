import 'dotenv/config';
import { parsePageCountParam } from '../shared/config';
import { loadConfig } from '../server/config/config';
import { DeliveryError, RunAbortedError } from '../server/errors';
import { createLogger } from '../server/obs/logger';
import { closeRunContext, createRunContext } from '../server/pipeline/context';
import { runDigest } from '../server/pipeline/runDigest';

// Usage: tsx scripts/run-digest.ts [--pages N]
const readPagesFlag = (argv: readonly string[]): string | undefined => {
  const index = argv.indexOf('--pages');
  return index >= 0 ? argv[index + 1] : undefined;
};

const main = async (): Promise<number> => {
  const config = loadConfig();
  const logger = createLogger(config);
  const ctx = createRunContext(config, { logger });
  try {
    const pages = parsePageCountParam(readPagesFlag(process.argv.slice(2)), config.source.pages);
    const summary = await runDigest(ctx, { pages });
    logger.info('Digest run finished', {
      status: summary.status,
      newUrls: summary.newUrls,
      articles: summary.articles.length,
      documents: summary.documents.map(({ category, status }) => ({ category, status })),
    });
    return 0;
  } catch (error) {
    if (error instanceof RunAbortedError && error.reason !== 'missing_credentials') {
      logger.warn('Digest run ended early', { reason: error.reason, error: error.message });
      return 0;
    }
    if (error instanceof RunAbortedError || error instanceof DeliveryError) {
      logger.error('Digest run aborted', { error: error.message });
      return 1;
    }
    throw error;
  } finally {
    await closeRunContext(ctx);
  }
};

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
