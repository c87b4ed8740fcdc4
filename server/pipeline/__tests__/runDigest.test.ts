import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import { createNoopArtifactStore } from '../../../shared/artifacts';
import type { StageEvent } from '../../../shared/types';
import { RetryPolicy } from '../../delivery/retryPolicy';
import { DeliveryError, RunAbortedError } from '../../errors';
import { createMemoryLedger } from '../../ledger/ledger';
import { createSilentLogger } from '../../obs/logger';
import { createPassthroughTranslator } from '../../translation/translator';
import { createRunContext } from '../context';
import type { RunContext } from '../context';
import { runDigest } from '../runDigest';
import { createFakeChannel, createFakeDocsClient, makeTestConfig, stubFetchPages } from '../../__tests__/helpers';
import type { FakeChannel, FakeDocsClient } from '../../__tests__/helpers';

const BASE = 'https://news.example.com/current-affairs/';
const generatedAt = new Date(2026, 9, 19, 8, 0, 0);

const listing = (...paths: string[]) =>
  paths.map((path) => `<h1 id="list"><a href="${path}">Story</a></h1>`).join('');

const articlePage = (heading: string, category?: string) => `
  <div class="featured_image"><img src="/img/${heading.length}.png"></div>
  <div class="inside_post column content_width">
    <h1 id="list">${heading}</h1>
    <p>${heading} explained.</p>
    <ul><li>One</li><li>Two</li></ul>
    ${category ? `<p class="small-font"><b>Category:</b> <a rel="category tag" href="/c/">${category}</a></p>` : ''}
  </div>`;

const numberedPage = (heading: string, items: readonly string[]) => `
  <div class="inside_post column content_width">
    <h1 id="list">${heading}</h1>
    <ol>${items.map((item) => `<li>${item}</li>`).join('')}</ol>
    <p class="small-font"><b>Category:</b> <a rel="category tag" href="/c/">Economy</a></p>
  </div>`;

interface Harness {
  ctx: RunContext;
  channel: FakeChannel;
  docs: FakeDocsClient;
  events: StageEvent[];
  loadImage: Mock<(url: string) => Promise<Buffer | null>>;
}

const createHarness = (overrides: Partial<RunContext> = {}): Harness => {
  const channel = createFakeChannel();
  const docs = createFakeDocsClient();
  const loadImage = vi.fn(async (_url: string): Promise<Buffer | null> => null);
  const ctx = createRunContext(makeTestConfig({ SOURCE_BASE_URL: BASE, SOURCE_PAGES: '1', TELEGRAM_JOIN_HANDLE: '@digest' }), {
    logger: createSilentLogger(),
    ledger: createMemoryLedger(),
    translator: createPassthroughTranslator(),
    loadImage,
    docsClient: docs,
    channel,
    retryPolicy: new RetryPolicy({ maxAttempts: 2, backoffMs: 0, sleep: async () => {} }),
    store: createNoopArtifactStore(),
    now: () => generatedAt,
    ...overrides,
  });
  return { ctx, channel, docs, events: [], loadImage };
};

const run = (harness: Harness) =>
  runDigest(harness.ctx, {
    runId: 'run-1',
    onEvent: (event) => {
      harness.events.push(event);
    },
  });

describe('runDigest', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('delivers one digest and builds a remote document for the detected category', async () => {
    stubFetchPages({
      [BASE]: listing('/bill/', '/daily-current-affairs-quiz-19-october/'),
      'https://news.example.com/bill/': articlePage('Data bill passed', 'Polity'),
    });
    const harness = createHarness();

    const summary = await run(harness);

    expect(summary).toMatchObject({
      runId: 'run-1',
      status: 'completed',
      discoveredUrls: 1,
      newUrls: 1,
      categories: ['Polity'],
      artifactFilename: '19-10-2026_Current_Affairs.docx',
      documents: [{ category: 'Polity', status: 'created', documentId: 'doc-1', requestCount: 24 }],
    });
    expect(harness.loadImage).toHaveBeenCalledWith('https://news.example.com/img/16.png');
    expect(harness.channel.documents).toHaveLength(1);
    expect(harness.channel.documents[0].filename).toBe('19-10-2026_Current_Affairs.docx');
    expect(harness.channel.documents[0].caption).toBe(
      '🎗️ 19 October 2026 Current Affairs 🎗️\n\n👉 Data bill passed\n\n🎉 Join us :- @digest 🎉',
    );
    expect(harness.channel.documents[0].bytes.subarray(0, 2).toString('latin1')).toBe('PK');
    expect(harness.docs.created).toEqual(['October 2026 - Polity']);
    expect(
      harness.events.filter((event) => event.status === 'success').map((event) => event.stage),
    ).toEqual(['discovery', 'dedup', 'extraction', 'normalization', 'localRender', 'delivery', 'remoteDocs']);
  });

  it('completes with untranslated pairs and per-article numbering when translation always fails', async () => {
    stubFetchPages({
      [BASE]: listing('/rates/', '/trade/'),
      'https://news.example.com/rates/': numberedPage('Rates held', ['Alpha', 'Beta']),
      'https://news.example.com/trade/': numberedPage('Trade deal', ['Gamma']),
    });
    const harness = createHarness({
      translator: {
        name: 'failing',
        translate: async () => {
          throw new Error('quota exceeded');
        },
      },
    });

    const summary = await run(harness);

    expect(summary.status).toBe('completed');
    expect(summary.documents).toMatchObject([{ category: 'Economy', status: 'created' }]);
    const inserted = harness.docs.batches[0].requests.flatMap((request) =>
      'insertText' in request ? [request.insertText.text] : [],
    );
    // drop the page title, header separator and trailing separator
    expect(inserted.slice(2, -1)).toEqual([
      'Rates held\n',
      'Rates held\n',
      '1. Alpha\n',
      '1. Alpha\n',
      '2. Beta\n',
      '2. Beta\n',
      'Trade deal\n',
      'Trade deal\n',
      '1. Gamma\n',
      '1. Gamma\n',
    ]);
  });

  it('creates no remote documents when no article has a category', async () => {
    stubFetchPages({
      [BASE]: listing('/a/', '/b/'),
      'https://news.example.com/a/': articlePage('First story'),
      'https://news.example.com/b/': articlePage('Second story'),
    });
    const harness = createHarness();

    const summary = await run(harness);

    expect(summary.articles.map((article) => [article.url, article.blockCount])).toEqual([
      ['https://news.example.com/a/', 8],
      ['https://news.example.com/b/', 8],
    ]);
    expect(summary.documents).toEqual([]);
    expect(harness.docs.created).toEqual([]);
    expect(harness.channel.documents).toHaveLength(1);
  });

  it('ends quietly when every URL was already published', async () => {
    stubFetchPages({
      [BASE]: listing('/bill/'),
      'https://news.example.com/bill/': articlePage('Data bill passed', 'Polity'),
    });
    const harness = createHarness({ ledger: createMemoryLedger(['https://news.example.com/bill/']) });

    const summary = await run(harness);

    expect(summary).toMatchObject({ status: 'nothing_new', discoveredUrls: 1, newUrls: 0, documents: [] });
    expect(harness.channel.documents).toEqual([]);
  });

  it('keeps going past an article that fails to load', async () => {
    stubFetchPages({
      [BASE]: listing('/gone/', '/bill/'),
      'https://news.example.com/bill/': articlePage('Data bill passed', 'Polity'),
    });
    const harness = createHarness();

    const summary = await run(harness);

    expect(summary.skippedUrls).toEqual([{ url: 'https://news.example.com/gone/', reason: 'HTTP 404' }]);
    expect(summary.articles).toHaveLength(1);
  });

  it('aborts before claiming anything when delivery is not configured', async () => {
    const fetchMock = stubFetchPages({ [BASE]: listing('/bill/') });
    const ledger = createMemoryLedger();
    const harness = createHarness({ channel: null, ledger });

    await expect(run(harness)).rejects.toMatchObject({ reason: 'missing_credentials' });
    expect(fetchMock).not.toHaveBeenCalled();
    await expect(ledger.exists('https://news.example.com/bill/')).resolves.toBe(false);
  });

  it('aborts when the listing yields no URLs', async () => {
    stubFetchPages({ [BASE]: '<html><body>Redesigned</body></html>' });
    const harness = createHarness();

    await expect(run(harness)).rejects.toBeInstanceOf(RunAbortedError);
    expect(harness.events.at(-1)).toMatchObject({ stage: 'discovery', status: 'failure' });
  });

  it('aborts when no new URL yields content', async () => {
    stubFetchPages({ [BASE]: listing('/gone/') });
    const harness = createHarness();

    await expect(run(harness)).rejects.toMatchObject({ reason: 'no_content' });
    expect(harness.channel.documents).toEqual([]);
  });

  it('removes the rendered file when delivery fails', async () => {
    stubFetchPages({
      [BASE]: listing('/bill/'),
      'https://news.example.com/bill/': articlePage('Data bill passed', 'Polity'),
    });
    const tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'digest-run-test-'));
    const harness = createHarness({
      tempRoot,
      channel: createFakeChannel(async () => {
        throw new DeliveryError('Telegram sendDocument failed (400): Bad Request', { transient: false });
      }),
    });

    try {
      await expect(run(harness)).rejects.toBeInstanceOf(DeliveryError);
      await expect(fs.readdir(tempRoot)).resolves.toEqual([]);
      expect(harness.docs.created).toEqual([]);
      expect(harness.events.at(-1)).toMatchObject({ stage: 'delivery', status: 'failure' });
    } finally {
      await fs.rm(tempRoot, { recursive: true, force: true });
    }
  });

  it('skips remote documents when no client is configured', async () => {
    stubFetchPages({
      [BASE]: listing('/bill/'),
      'https://news.example.com/bill/': articlePage('Data bill passed', 'Polity'),
    });
    const harness = createHarness({ docsClient: null });

    const summary = await run(harness);

    expect(summary.status).toBe('completed');
    expect(summary.documents).toEqual([]);
    expect(harness.channel.documents).toHaveLength(1);
  });
});
