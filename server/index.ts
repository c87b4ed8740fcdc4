import 'dotenv/config';
import cors from 'cors';
import express from 'express';
import type { Request, Response } from 'express';
import { parsePageCountParam } from '../shared/config';
import { getPublicConfig, loadConfig } from './config/config';
import { createSseStream } from './http/sse';
import { createLogger } from './obs/logger';
import { closeRunContext, createRunContext } from './pipeline/context';
import { handleRunDigestStream } from './pipeline/runDigestStream';

const config = loadConfig();
const logger = createLogger(config);
const ctx = createRunContext(config, { logger });
logger.info('Config loaded', {
  environment: config.environment,
  source: config.source.baseUrl,
  pages: config.source.pages,
  translation: config.translation.provider,
  ledger: config.ledger.mode,
  docs: { enabled: config.docs.enabled, hasClient: Boolean(ctx.docsClient) },
  delivery: { configured: Boolean(ctx.channel) },
  persistence: config.persistence.mode,
});

const app = express();

app.use(cors());
app.use(express.json({ limit: '1mb' }));

if (config.observability.logLevel === 'debug') {
  app.use((req, res, next) => {
    const startedAt = Date.now();
    logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
    res.on('finish', () => {
      logger.debug('HTTP response', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        elapsedMs: Date.now() - startedAt,
      });
    });
    next();
  });
}

const sendStoredJson = (res: Response, content: string | null) => {
  if (content === null) {
    res.status(404).json({ error: 'Not found' });
    return;
  }
  res.type('application/json').send(content);
};

let runInProgress = false;

app.get('/api/healthz', (_req: Request, res: Response) => {
  res.json({ ok: true, ts: new Date().toISOString() });
});

app.get('/api/config', (_req: Request, res: Response) => {
  res.json(getPublicConfig(config));
});

app.get('/api/run-digest-stream', async (req: Request, res: Response) => {
  if (runInProgress) {
    res.status(409).json({ error: 'A digest run is already in progress' });
    return;
  }
  const pagesRaw = typeof req.query.pages === 'string' ? req.query.pages : undefined;
  const pages = parsePageCountParam(pagesRaw, config.source.pages);

  runInProgress = true;
  const stream = createSseStream(res, { heartbeatMs: config.server.heartbeatIntervalMs, label: 'run-digest' }, logger);
  try {
    await handleRunDigestStream({ ctx, stream, pages });
  } finally {
    runInProgress = false;
  }
});

app.get('/api/runs/:runId/artifacts/:kind', async (req: Request, res: Response) => {
  const runId = String(req.params.runId || '').trim();
  const kind = String(req.params.kind || '').trim();
  if (!runId || !kind) {
    res.status(400).json({ error: 'Missing runId or kind' });
    return;
  }
  try {
    sendStoredJson(res, await ctx.store.readRunArtifact(runId, kind));
  } catch (error) {
    logger.error('Failed to read run artifact', {
      runId,
      kind,
      error: error instanceof Error ? error.message : String(error),
    });
    res.status(500).json({ error: 'Failed to read artifact' });
  }
});

app.get('/api/articles/:articleId', async (req: Request, res: Response) => {
  const articleId = String(req.params.articleId || '').trim();
  if (!articleId) {
    res.status(400).json({ error: 'Missing articleId' });
    return;
  }
  try {
    sendStoredJson(res, await ctx.store.readArticle(articleId));
  } catch (error) {
    logger.error('Failed to read article', {
      articleId,
      error: error instanceof Error ? error.message : String(error),
    });
    res.status(500).json({ error: 'Failed to read article' });
  }
});

const port = config.server.port;

const server = app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});

const shutdown = (signal: string) => {
  logger.info('Shutting down', { signal });
  server.close();
  closeRunContext(ctx).then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error('Failed to close run context', { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    },
  );
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
