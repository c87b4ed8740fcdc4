import { hashString } from '../../shared/crypto';
import type { Article, CategorySection, ContentBlock } from '../../shared/types';

export interface NormalizedRun {
  /** Every article's blocks, in URL-processing order. */
  combined: ContentBlock[];
  /** Per-category sequences, categories in first-seen order. */
  categories: CategorySection[];
  /** Original-language heading of each article, for the delivery caption. */
  titles: string[];
}

/** The second heading block: the original-language copy. */
export const displayTitleOf = (blocks: readonly ContentBlock[]): string | null => {
  const headings = blocks.filter((block) => block.kind === 'heading');
  return headings[1]?.text ?? null;
};

export const buildArticle = (url: string, blocks: ContentBlock[], category: string | null): Article | null => {
  if (blocks.length === 0) return null;
  return {
    id: hashString(url),
    url,
    category,
    title: displayTitleOf(blocks) ?? blocks[0].text,
    blocks,
  };
};

export const normalizeArticles = (articles: readonly Article[]): NormalizedRun => {
  const combined: ContentBlock[] = [];
  const titles: string[] = [];
  const byCategory = new Map<string, ContentBlock[]>();

  for (const article of articles) {
    combined.push(...article.blocks);
    titles.push(article.title);
    if (!article.category) continue;
    const section = byCategory.get(article.category);
    if (section) {
      section.push(...article.blocks);
    } else {
      byCategory.set(article.category, [...article.blocks]);
    }
  }

  return {
    combined,
    titles,
    categories: Array.from(byCategory, ([category, blocks]) => ({ category, blocks })),
  };
};
