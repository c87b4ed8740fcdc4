import * as cheerio from 'cheerio';
import type { AppConfig } from '../../shared/config';
import { FetchError } from '../errors';
import { fetchText } from '../http/fetcher';
import type { Logger } from '../obs/logger';

export const listingPageUrl = (baseUrl: string, page: number): string => {
  if (page <= 1) return baseUrl;
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return `${base}page/${page}/`;
};

const resolveLink = (href: string, pageUrl: string): string | null => {
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return null;
  }
};

export const parseListingLinks = (html: string, pageUrl: string): string[] => {
  const $ = cheerio.load(html);
  const links: string[] = [];
  $('h1#list').each((_i, el) => {
    const href = $(el).find('a[href]').first().attr('href')?.trim();
    const resolved = href ? resolveLink(href, pageUrl) : null;
    if (resolved) links.push(resolved);
  });
  return links;
};

export interface DiscoveryOptions {
  config: Pick<AppConfig, 'source' | 'scraping'>;
  logger: Logger;
  /** Overrides `config.source.pages` for one run. */
  pages?: number;
}

/**
 * Collects article URLs from the first `pages` listing pages, in page order,
 * without duplicates or skip-listed URLs. A page that fails to load is skipped.
 */
export const discoverArticleUrls = async ({ config, logger, pages }: DiscoveryOptions): Promise<string[]> => {
  const pageCount = pages ?? config.source.pages;
  const seen = new Set<string>();
  const urls: string[] = [];

  for (let page = 1; page <= pageCount; page += 1) {
    const pageUrl = listingPageUrl(config.source.baseUrl, page);
    try {
      const html = await fetchText(pageUrl, {
        timeoutMs: config.scraping.fetchTimeoutMs,
        userAgent: config.scraping.userAgent,
      });
      for (const link of parseListingLinks(html, pageUrl)) {
        if (seen.has(link)) continue;
        seen.add(link);
        if (config.source.skipUrlPatterns.some((pattern) => link.includes(pattern))) {
          logger.debug('Skipping listed URL', { url: link });
          continue;
        }
        urls.push(link);
      }
    } catch (error) {
      if (!(error instanceof FetchError)) throw error;
      logger.error('Failed to fetch listing page', { url: pageUrl, error: error.message, status: error.status });
    }
  }

  logger.info('Discovered article URLs', { count: urls.length, pages: pageCount });
  return urls;
};
