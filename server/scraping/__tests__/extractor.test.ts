import { afterEach, describe, expect, it, vi } from 'vitest';
import { StructuralMismatchError } from '../../errors';
import { createSilentLogger } from '../../obs/logger';
import type { Translator } from '../../translation/translator';
import { extractArticle, parseArticleHtml } from '../extractor';
import { makeTestConfig, stubFetchPages } from '../../__tests__/helpers';

const ARTICLE_URL = 'https://example.com/parliament-data-bill/';

const postColumnPage = `
  <html><body>
    <div class="featured_image"><img src="/images/polity.jpg"></div>
    <div class="inside_post column content_width">
      <h1 id="list">Parliament passes   data bill</h1>
      <p>The bill was passed on Monday.</p>
      <ul><li>First point</li><li>Second point</li></ul>
      <p class="small-font"><b>Category:</b> <a href="/category/polity/" rel="category tag">Polity</a></p>
      <div class="sharethis-inline-share-buttons"><p>Share this</p></div>
    </div>
  </body></html>`;

const entryContentPage = `
  <html><body>
    <article>
      <h1 class="entry-title">Old layout heading</h1>
      <img class="wp-post-image" src="https://cdn.example.com/old.png">
      <div class="entry-content">
        <h2>Background</h2>
        <p>Text one.</p>
        <ol><li>Alpha</li><li>Beta</li></ol>
        <h4>Note</h4>
        <ol><li>Gamma</li></ol>
        <p>Category: Economy</p>
        <nav><p>Next article</p></nav>
      </div>
    </article>
  </body></html>`;

const prefixTranslator: Translator = {
  name: 'prefix',
  translate: async (text, targetLanguage) => `[${targetLanguage}] ${text}`,
};

const failingTranslator: Translator = {
  name: 'failing',
  translate: async () => {
    throw new Error('quota exceeded');
  },
};

describe('parseArticleHtml', () => {
  it('extracts heading, image, paragraph, bullets and labelled category from the post-column layout', () => {
    const parsed = parseArticleHtml(postColumnPage, ARTICLE_URL);

    expect(parsed.layout).toBe('postColumn');
    expect(parsed.category).toEqual({ value: 'Polity', source: 'label' });
    expect(parsed.blocks).toEqual([
      { kind: 'heading', text: 'Parliament passes data bill', imageRef: 'https://example.com/images/polity.jpg' },
      { kind: 'paragraph', text: 'The bill was passed on Monday.' },
      { kind: 'bulletItem', text: 'First point' },
      { kind: 'bulletItem', text: 'Second point' },
    ]);
  });

  it('falls back to the entry-content layout with article-wide ordinals and a text category', () => {
    const parsed = parseArticleHtml(entryContentPage, ARTICLE_URL);

    expect(parsed.layout).toBe('entryContent');
    expect(parsed.category).toEqual({ value: 'Economy', source: 'text' });
    expect(parsed.blocks).toEqual([
      { kind: 'heading', text: 'Old layout heading', imageRef: 'https://cdn.example.com/old.png' },
      { kind: 'subHeading', text: 'Background' },
      { kind: 'paragraph', text: 'Text one.' },
      { kind: 'numberedItem', text: 'Alpha', ordinal: 1 },
      { kind: 'numberedItem', text: 'Beta', ordinal: 2 },
      { kind: 'subSubHeading', text: 'Note' },
      { kind: 'numberedItem', text: 'Gamma', ordinal: 3 },
    ]);
  });

  it('omits imageRef when the page has no featured image', () => {
    const html = `<div class="inside_post column content_width"><h1 id="list">No picture</h1><p>Body.</p></div>`;
    const parsed = parseArticleHtml(html, ARTICLE_URL);

    expect(parsed.blocks[0]).toEqual({ kind: 'heading', text: 'No picture' });
    expect(parsed.category).toBeNull();
  });

  it('rejects a page with no known content container', () => {
    expect(() => parseArticleHtml('<html><body><div class="other"></div></body></html>', ARTICLE_URL)).toThrow(
      new StructuralMismatchError(ARTICLE_URL, 'Main content container not found'),
    );
  });

  it('rejects a matched container without a heading', () => {
    const html = `<div class="inside_post column content_width"><p>Orphan paragraph</p></div>`;
    expect(() => parseArticleHtml(html, ARTICLE_URL)).toThrow('Heading not found');
  });
});

describe('extractArticle', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns translated/original pairs with the category', async () => {
    stubFetchPages({ [ARTICLE_URL]: postColumnPage });

    const result = await extractArticle(ARTICLE_URL, {
      config: makeTestConfig(),
      translator: prefixTranslator,
      logger: createSilentLogger(),
    });

    expect(result.category).toBe('Polity');
    expect(result.error).toBeUndefined();
    expect(result.blocks.map((block) => `${block.kind}:${block.language}:${block.text}`)).toEqual([
      'heading:translated:[gu] Parliament passes data bill',
      'heading:original:Parliament passes data bill',
      'paragraph:translated:[gu] The bill was passed on Monday.',
      'paragraph:original:The bill was passed on Monday.',
      'bulletItem:translated:[gu] First point',
      'bulletItem:original:First point',
      'bulletItem:translated:[gu] Second point',
      'bulletItem:original:Second point',
    ]);
    expect(result.blocks[0]).toMatchObject({ imageRef: 'https://example.com/images/polity.jpg' });
    expect(result.blocks[1]).not.toHaveProperty('imageRef');
  });

  it('pairs each block with an identical copy when translation always fails', async () => {
    stubFetchPages({ [ARTICLE_URL]: postColumnPage });

    const result = await extractArticle(ARTICLE_URL, {
      config: makeTestConfig(),
      translator: failingTranslator,
      logger: createSilentLogger(),
    });

    expect(result.error).toBeUndefined();
    expect(result.blocks).toHaveLength(8);
    for (let i = 0; i < result.blocks.length; i += 2) {
      expect(result.blocks[i].language).toBe('translated');
      expect(result.blocks[i + 1].language).toBe('original');
      expect(result.blocks[i].text).toBe(result.blocks[i + 1].text);
    }
    expect(result.blocks[0].text).toBe('Parliament passes data bill');
  });

  it('yields no blocks when the page cannot be fetched', async () => {
    stubFetchPages({});

    const result = await extractArticle(ARTICLE_URL, {
      config: makeTestConfig(),
      translator: prefixTranslator,
      logger: createSilentLogger(),
    });

    expect(result).toEqual({ blocks: [], category: null, error: 'HTTP 404' });
  });

  it('yields no blocks for an unrecognised layout', async () => {
    stubFetchPages({ [ARTICLE_URL]: '<html><body><main><p>Redesigned</p></main></body></html>' });

    const result = await extractArticle(ARTICLE_URL, {
      config: makeTestConfig(),
      translator: prefixTranslator,
      logger: createSilentLogger(),
    });

    expect(result.blocks).toEqual([]);
    expect(result.error).toBe('Main content container not found');
  });
});
