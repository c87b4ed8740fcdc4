import { randomId } from '../../shared/crypto';
import type { Article, CategoryDocumentResult, RunSummary } from '../../shared/types';
import { buildCaption } from '../delivery/caption';
import { deliverDigest } from '../delivery/deliver';
import { buildCategoryDocuments } from '../docs/builder';
import { RunAbortedError } from '../errors';
import { buildArticle, normalizeArticles } from '../content/normalizer';
import { filterNewUrls } from '../ledger/ledger';
import { writeTempArtifact } from '../persistence/tempArtifact';
import { artifactFilenameFor, renderLocalDocument } from '../render/localDocument';
import { extractArticle } from '../scraping/extractor';
import { discoverArticleUrls } from '../scraping/listing';
import { mapWithConcurrency } from '../utils/concurrency';
import type { RunContext } from './context';
import { makeStageEmitter, noopStageSender } from './stageEmitter';
import type { StageEmitter, StageEventSender } from './stageEmitter';

export interface RunDigestOptions {
  runId?: string;
  /** Listing pages to scan; defaults to `config.source.pages`. */
  pages?: number;
  onEvent?: StageEventSender;
}

/**
 * One daily run: discover, claim, extract, normalize, render, deliver, then build the
 * per-category remote documents.
 *
 * Throws `RunAbortedError` when there is nothing to publish for a structural reason and
 * `DeliveryError` when the digest could not be delivered. Image, translation and remote
 * document failures are logged and the run carries on.
 */
export const runDigest = async (ctx: RunContext, options: RunDigestOptions = {}): Promise<RunSummary> => {
  const { config, store } = ctx;
  const runId = options.runId ?? randomId();
  const logger = ctx.logger.child({ runId });
  const send = options.onEvent ?? noopStageSender;
  const startedAt = ctx.now();

  const stages = {
    discovery: makeStageEmitter(runId, 'discovery', send),
    dedup: makeStageEmitter(runId, 'dedup', send),
    extraction: makeStageEmitter(runId, 'extraction', send),
    normalization: makeStageEmitter(runId, 'normalization', send),
    localRender: makeStageEmitter(runId, 'localRender', send),
    delivery: makeStageEmitter(runId, 'delivery', send),
    remoteDocs: makeStageEmitter(runId, 'remoteDocs', send),
  };
  let currentStage: StageEmitter = stages.discovery;

  const summarize = (partial: Partial<RunSummary> & Pick<RunSummary, 'status'>): RunSummary => ({
    runId,
    startedAt: startedAt.toISOString(),
    finishedAt: ctx.now().toISOString(),
    discoveredUrls: 0,
    newUrls: 0,
    articles: [],
    skippedUrls: [],
    categories: [],
    documents: [],
    ...partial,
  });

  try {
    const channel = ctx.channel;
    if (!channel) {
      throw new RunAbortedError('missing_credentials', 'Delivery bot token or channel id is not configured');
    }
    await store.ensureLayout();

    stages.discovery.start({ message: `Scanning ${options.pages ?? config.source.pages} listing page(s)` });
    const discovered = await discoverArticleUrls({ config, logger, pages: options.pages });
    if (discovered.length === 0) {
      throw new RunAbortedError('no_urls', 'No article URLs scraped; check the site structure or connectivity');
    }
    stages.discovery.success({ message: `Found ${discovered.length} URL(s)`, data: { urls: discovered } });

    currentStage = stages.dedup;
    stages.dedup.start();
    const fresh = await filterNewUrls(discovered, ctx.ledger, logger, startedAt);
    logger.info('Found new URLs', { count: fresh.length, urls: fresh });
    if (fresh.length === 0) {
      stages.dedup.success({ message: 'No new URLs to process' });
      const summary = summarize({ status: 'nothing_new', discoveredUrls: discovered.length });
      await store.saveRunArtifact(runId, 'summary', summary);
      return summary;
    }
    stages.dedup.success({ message: `${fresh.length} new URL(s)`, data: { urls: fresh } });

    currentStage = stages.extraction;
    stages.extraction.start({ message: `Extracting ${fresh.length} article(s)` });
    const results = await mapWithConcurrency(fresh, config.scraping.concurrency, async (url) => {
      const result = await extractArticle(url, { config, translator: ctx.translator, logger });
      stages.extraction.progress({ message: url, data: { blocks: result.blocks.length, error: result.error } });
      return { url, ...result };
    });

    const articles: Article[] = [];
    const skippedUrls: RunSummary['skippedUrls'] = [];
    for (const result of results) {
      const article = buildArticle(result.url, result.blocks, result.category);
      if (article) {
        articles.push(article);
      } else {
        skippedUrls.push({ url: result.url, reason: result.error ?? 'No content blocks' });
      }
    }
    if (articles.length === 0) {
      throw new RunAbortedError('no_content', 'No content scraped from new URLs');
    }
    stages.extraction.success({ message: `${articles.length} article(s) extracted`, data: { skippedUrls } });

    currentStage = stages.normalization;
    stages.normalization.start();
    const normalized = normalizeArticles(articles);
    const categories = normalized.categories.map((section) => section.category);
    logger.info('Categories detected', { categories });
    await Promise.all(articles.map((article) => store.saveArticle(article.id, article)));
    await store.saveRunArtifact(runId, 'combined_blocks', normalized.combined);
    await store.saveRunArtifact(runId, 'categories', normalized.categories);
    stages.normalization.success({
      message: `${normalized.combined.length} block(s) in ${categories.length} categor${categories.length === 1 ? 'y' : 'ies'}`,
      data: { categories },
    });

    currentStage = stages.localRender;
    stages.localRender.start();
    const bytes = await renderLocalDocument(normalized.combined, startedAt, ctx.loadImage);
    const filename = artifactFilenameFor(startedAt);
    const artifact = await writeTempArtifact(filename, bytes, ctx.tempRoot);
    logger.info('Document saved', { path: artifact.path, bytes: bytes.length });
    stages.localRender.success({ message: filename, data: { bytes: bytes.length } });

    currentStage = stages.delivery;
    stages.delivery.start();
    const caption = buildCaption(startedAt, normalized.titles, config.delivery.joinHandle);
    let truncated: boolean;
    try {
      ({ truncated } = await deliverDigest(
        channel,
        ctx.retryPolicy,
        { bytes, filename, caption, captionLimit: config.delivery.captionLimit },
        logger,
      ));
    } finally {
      await artifact.remove();
      logger.info('Temporary file deleted', { path: artifact.path });
    }
    stages.delivery.success({ message: `Delivered ${filename}`, data: { truncated } });

    currentStage = stages.remoteDocs;
    let documents: CategoryDocumentResult[] = [];
    if (ctx.docsClient) {
      stages.remoteDocs.start({ message: `Building ${categories.length} category document(s)` });
      documents = await buildCategoryDocuments({
        sections: normalized.categories,
        client: ctx.docsClient,
        logger,
        generatedAt: startedAt,
        concurrency: config.docs.concurrency,
      });
      stages.remoteDocs.success({ data: { documents } });
    } else {
      logger.info('Remote documents disabled; skipping');
    }

    const summary = summarize({
      status: 'completed',
      discoveredUrls: discovered.length,
      newUrls: fresh.length,
      articles: articles.map(({ id, url, category, blocks }) => ({ id, url, category, blockCount: blocks.length })),
      skippedUrls,
      categories,
      artifactFilename: filename,
      documents,
    });
    await store.saveRunArtifact(runId, 'summary', summary);
    await store.saveRunArtifact(runId, 'documents', documents);
    logger.info('Run completed', { articles: articles.length, documents: documents.length });
    return summary;
  } catch (error) {
    currentStage.failure(error);
    logger.error('Run failed', { error: error instanceof Error ? error.message : String(error) });
    throw error;
  }
};
