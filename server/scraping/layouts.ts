import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

/**
 * One known markup version of the article page.
 *
 * `matchRoot` decides whether the strategy applies at all; once it returns a root
 * the strategy owns the whole extraction, even if the heading lookup then fails.
 */
export interface LayoutStrategy {
  readonly name: string;
  matchRoot: ($: CheerioAPI) => Cheerio<Element> | null;
  findHeading: ($: CheerioAPI, root: Cheerio<Element>) => Cheerio<Element> | null;
  /** Raw `src` of the featured image, unresolved. */
  findFeaturedImage: ($: CheerioAPI, root: Cheerio<Element>) => string | null;
}

const firstOrNull = (selection: Cheerio<Element>): Cheerio<Element> | null =>
  selection.length > 0 ? selection.first() : null;

const imageSource = (img: Cheerio<Element> | null): string | null => {
  if (!img) return null;
  const src = img.attr('src')?.trim() || img.attr('data-src')?.trim();
  return src || null;
};

export const postColumnLayout: LayoutStrategy = {
  name: 'postColumn',
  matchRoot: ($) => firstOrNull($('div.inside_post.column.content_width')),
  findHeading: (_$, root) => firstOrNull(root.find('h1#list')),
  findFeaturedImage: ($) => imageSource(firstOrNull($('div.featured_image img'))),
};

export const entryContentLayout: LayoutStrategy = {
  name: 'entryContent',
  matchRoot: ($) => firstOrNull($('article div.entry-content')),
  findHeading: (_$, root) =>
    firstOrNull(root.find('h1.entry-title')) ?? firstOrNull(root.closest('article').find('h1.entry-title')),
  findFeaturedImage: (_$, root) => imageSource(firstOrNull(root.closest('article').find('img.wp-post-image'))),
};

export const DEFAULT_LAYOUTS: readonly LayoutStrategy[] = [postColumnLayout, entryContentLayout];

export interface LayoutMatch {
  strategy: LayoutStrategy;
  root: Cheerio<Element>;
}

export const matchLayout = ($: CheerioAPI, strategies: readonly LayoutStrategy[] = DEFAULT_LAYOUTS): LayoutMatch | null => {
  for (const strategy of strategies) {
    const root = strategy.matchRoot($);
    if (root) {
      return { strategy, root };
    }
  }
  return null;
};

const EXCLUDED_SELECTOR = [
  'nav',
  '.sharethis-inline-share-buttons',
  '.prenext',
  '.breadcrumb',
  '.breadcrumbs',
  '#comments',
  '.comments-area',
  '.comment-respond',
].join(', ');

/** Share widgets, navigation, breadcrumbs and comment threads, or anything inside one. */
export const isExcludedElement = ($: CheerioAPI, el: Element): boolean => {
  const node = $(el);
  return node.is(EXCLUDED_SELECTOR) || node.parents(EXCLUDED_SELECTOR).length > 0;
};
