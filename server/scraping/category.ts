import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { normalizeWhitespace } from '../utils/text';

export const CATEGORY_TEXT_PATTERN = /Category: (.+)/;

export type CategorySource = 'label' | 'text';

export interface DetectedCategory {
  value: string;
  source: CategorySource;
}

const fromLabel = ($: CheerioAPI, root: Cheerio<Element>): string | null => {
  for (const el of root.find('p.small-font').toArray()) {
    const paragraph = $(el);
    const hasLabel = paragraph
      .find('b')
      .toArray()
      .some((b) => $(b).text().trim() === 'Category:');
    if (!hasLabel) continue;
    const link = paragraph.find('a[rel~="tag"]').first();
    const value = normalizeWhitespace(link.text());
    if (link.length > 0 && value) {
      return value;
    }
  }
  return null;
};

/** Matches `Category: <value>` on a single line of raw element text. */
export const matchCategoryText = (rawText: string): string | null => {
  const match = rawText.match(CATEGORY_TEXT_PATTERN);
  if (!match) return null;
  const value = normalizeWhitespace(match[1]);
  return value || null;
};

const fromText = ($: CheerioAPI, root: Cheerio<Element>): string | null => {
  for (const el of root.children().toArray()) {
    const text = $(el).text();
    if (!text.trim()) continue;
    const value = matchCategoryText(text);
    if (value) return value;
  }
  return null;
};

/**
 * Structured `Category:` label first, then a plain-text scan of top-level children.
 */
export const detectCategory = ($: CheerioAPI, root: Cheerio<Element>): DetectedCategory | null => {
  const labelled = fromLabel($, root);
  if (labelled) return { value: labelled, source: 'label' };
  const scanned = fromText($, root);
  if (scanned) return { value: scanned, source: 'text' };
  return null;
};
