import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { AppConfig } from '../../shared/config';
import type { ContentBlock, RawBlock, TextBlock } from '../../shared/types';
import { toBilingualBlocks } from '../content/bilingual';
import { FetchError, StructuralMismatchError } from '../errors';
import { fetchText } from '../http/fetcher';
import type { Logger } from '../obs/logger';
import { translateOrOriginal, type Translator } from '../translation/translator';
import { normalizeWhitespace } from '../utils/text';
import { detectCategory, matchCategoryText, type DetectedCategory } from './category';
import { DEFAULT_LAYOUTS, isExcludedElement, matchLayout, type LayoutStrategy } from './layouts';

export interface ParsedArticle {
  layout: string;
  blocks: RawBlock[];
  category: DetectedCategory | null;
}

const SINGLE_BLOCK_TAGS: Record<string, TextBlock['kind']> = {
  p: 'paragraph',
  h2: 'subHeading',
  h4: 'subSubHeading',
};

const resolveImageUrl = (src: string | null, pageUrl: string): string | undefined => {
  if (!src) return undefined;
  try {
    return new URL(src, pageUrl).toString();
  } catch {
    return undefined;
  }
};

const listItemTexts = ($: CheerioAPI, list: Cheerio<Element>): string[] =>
  list
    .children('li')
    .toArray()
    .map((li) => normalizeWhitespace($(li).text()))
    .filter(Boolean);

/**
 * Parses one article page into language-neutral blocks.
 *
 * @throws StructuralMismatchError when no layout matches or the matched root has no heading
 */
export const parseArticleHtml = (
  html: string,
  url: string,
  strategies: readonly LayoutStrategy[] = DEFAULT_LAYOUTS,
): ParsedArticle => {
  const $ = cheerio.load(html);
  const match = matchLayout($, strategies);
  if (!match) {
    throw new StructuralMismatchError(url, 'Main content container not found');
  }
  const { strategy, root } = match;

  const heading = strategy.findHeading($, root);
  const headingText = heading ? normalizeWhitespace(heading.text()) : '';
  if (!headingText) {
    throw new StructuralMismatchError(url, 'Heading not found', strategy.name);
  }

  const blocks: RawBlock[] = [];
  const imageRef = resolveImageUrl(strategy.findFeaturedImage($, root), url);
  blocks.push(imageRef ? { kind: 'heading', text: headingText, imageRef } : { kind: 'heading', text: headingText });

  let ordinal = 1;
  for (const el of root.children().toArray()) {
    if (isExcludedElement($, el)) continue;
    const node = $(el);
    const rawText = node.text();
    if (!rawText.trim() || matchCategoryText(rawText)) continue;

    const tag = el.tagName.toLowerCase();
    const singleKind = SINGLE_BLOCK_TAGS[tag];
    if (singleKind) {
      blocks.push({ kind: singleKind, text: normalizeWhitespace(rawText) });
    } else if (tag === 'ul') {
      for (const text of listItemTexts($, node)) {
        blocks.push({ kind: 'bulletItem', text });
      }
    } else if (tag === 'ol') {
      for (const text of listItemTexts($, node)) {
        blocks.push({ kind: 'numberedItem', text, ordinal });
        ordinal += 1;
      }
    }
  }

  return {
    layout: strategy.name,
    blocks,
    category: detectCategory($, root),
  };
};

export interface ExtractorDeps {
  config: Pick<AppConfig, 'scraping' | 'translation'>;
  translator: Translator;
  logger: Logger;
  strategies?: readonly LayoutStrategy[];
}

export interface ExtractionResult {
  blocks: ContentBlock[];
  category: string | null;
  /** Set when the URL was skipped. */
  error?: string;
}

/**
 * Fetches, parses and translates one article. Never throws: a fetch or layout failure
 * yields empty blocks, which callers treat as "skip this URL".
 */
export const extractArticle = async (url: string, deps: ExtractorDeps): Promise<ExtractionResult> => {
  const logger = deps.logger.child({ url });
  try {
    logger.info('Scraping article');
    const html = await fetchText(url, {
      timeoutMs: deps.config.scraping.fetchTimeoutMs,
      userAgent: deps.config.scraping.userAgent,
    });
    const parsed = parseArticleHtml(html, url, deps.strategies);

    if (parsed.category) {
      logger.info('Detected category', { category: parsed.category.value, source: parsed.category.source });
    } else {
      logger.warn('No category detected');
    }

    const targetLanguage = deps.config.translation.targetLanguage;
    const blocks = await toBilingualBlocks(parsed.blocks, (text) =>
      translateOrOriginal(deps.translator, text, targetLanguage, logger),
    );
    logger.info('Finished scraping article', { layout: parsed.layout, blocks: blocks.length });
    return { blocks, category: parsed.category?.value ?? null };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof FetchError) {
      logger.error('Article fetch failed', { error: message, status: error.status, timedOut: error.timedOut });
    } else if (error instanceof StructuralMismatchError) {
      logger.error('Article layout not recognised', { error: message, layout: error.layout });
    } else {
      logger.error('Article extraction failed', { error: message });
    }
    return { blocks: [], category: null, error: message };
  }
};
