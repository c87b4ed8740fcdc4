import type { ContentBlock, HeadingBlock, RawBlock } from '../../shared/types';

export type TranslateText = (text: string) => Promise<string>;

/**
 * Expands raw blocks into translated/original pairs, translated copy first.
 *
 * Translation runs once per block, in document order. Ordinals carry over to both
 * copies unchanged; only the translated heading keeps the featured image.
 */
export const toBilingualBlocks = async (raw: readonly RawBlock[], translate: TranslateText): Promise<ContentBlock[]> => {
  const blocks: ContentBlock[] = [];
  for (const block of raw) {
    const translated = (await translate(block.text)) || block.text;
    switch (block.kind) {
      case 'heading': {
        const heading: HeadingBlock = { kind: 'heading', text: translated, language: 'translated' };
        if (block.imageRef) heading.imageRef = block.imageRef;
        blocks.push(heading, { kind: 'heading', text: block.text, language: 'original' });
        break;
      }
      case 'numberedItem':
        blocks.push(
          { kind: 'numberedItem', text: translated, language: 'translated', ordinal: block.ordinal },
          { kind: 'numberedItem', text: block.text, language: 'original', ordinal: block.ordinal },
        );
        break;
      default:
        blocks.push(
          { kind: block.kind, text: translated, language: 'translated' },
          { kind: block.kind, text: block.text, language: 'original' },
        );
    }
  }
  return blocks;
};
