import { afterEach, describe, expect, it, vi } from 'vitest';
import { createSilentLogger } from '../../obs/logger';
import { discoverArticleUrls, listingPageUrl, parseListingLinks } from '../listing';
import { makeTestConfig, stubFetchPages } from '../../__tests__/helpers';

const BASE = 'https://news.example.com/current-affairs/';

const listingHtml = (...hrefs: string[]) =>
  `<html><body>${hrefs.map((href) => `<h1 id="list"><a href="${href}">Story</a></h1>`).join('')}</body></html>`;

describe('listingPageUrl', () => {
  it('keeps the base URL for page one and appends /page/n/ after that', () => {
    expect(listingPageUrl(BASE, 1)).toBe(BASE);
    expect(listingPageUrl(BASE, 3)).toBe('https://news.example.com/current-affairs/page/3/');
    expect(listingPageUrl('https://news.example.com/ca', 2)).toBe('https://news.example.com/ca/page/2/');
  });
});

describe('parseListingLinks', () => {
  it('takes the first link of each listing heading, resolved against the page', () => {
    const html = `
      <h1 id="list"><a href="/story-one/">One</a><a href="/ignored/">x</a></h1>
      <h1 id="list"><a href="https://other.example.com/story-two/">Two</a></h1>
      <h1 id="list">No link here</h1>
      <h2><a href="/not-a-listing/">Nope</a></h2>`;

    expect(parseListingLinks(html, BASE)).toEqual([
      'https://news.example.com/story-one/',
      'https://other.example.com/story-two/',
    ]);
  });
});

describe('discoverArticleUrls', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('walks listing pages in order, dropping duplicates and quiz pages', async () => {
    stubFetchPages({
      [BASE]: listingHtml('/a/', '/daily-current-affairs-quiz-19-october/', '/b/'),
      [`${BASE}page/2/`]: listingHtml('/b/', '/c/'),
    });
    const config = makeTestConfig({ SOURCE_BASE_URL: BASE, SOURCE_PAGES: '2' });

    const urls = await discoverArticleUrls({ config, logger: createSilentLogger() });

    expect(urls).toEqual(['https://news.example.com/a/', 'https://news.example.com/b/', 'https://news.example.com/c/']);
  });

  it('skips a listing page that fails and honours the page override', async () => {
    const fetchMock = stubFetchPages({
      [`${BASE}page/2/`]: listingHtml('/late/'),
    });
    const config = makeTestConfig({ SOURCE_BASE_URL: BASE, SOURCE_PAGES: '5' });

    const urls = await discoverArticleUrls({ config, logger: createSilentLogger(), pages: 2 });

    expect(urls).toEqual(['https://news.example.com/late/']);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
