/**
 * Request planning for one category document.
 *
 * The Docs API addresses text by index: an insert at `i` shifts everything after `i`
 * forward by the inserted length, and styles apply to an explicit `[start, end)` range.
 * Every range below is derived from the exact string handed to `insertText`, measured
 * with `String#length` (UTF-16 code units, the same unit the API indexes in), so the
 * plan is a pure fold over the blocks with a single cursor.
 */
import type { ContentBlock } from '../../shared/types';
import { PipelineError } from '../errors';
import { formatLongDate, formatMonthYear } from '../utils/text';

export interface RgbColor {
  red: number;
  green: number;
  blue: number;
}

export interface TextStyle {
  bold?: boolean;
  italic?: boolean;
  foregroundColor?: { color: { rgbColor: RgbColor } };
  fontSize?: { magnitude: number; unit: 'PT' };
}

export interface DocsRange {
  startIndex: number;
  endIndex: number;
}

export type BulletPreset = 'BULLET_DISC_CIRCLE_SQUARE' | 'NUMBERED_DECIMAL_ALPHA_ROMAN';

export interface InsertTextRequest {
  insertText: { location: { index: number }; text: string };
}

export interface UpdateTextStyleRequest {
  updateTextStyle: { range: DocsRange; textStyle: TextStyle; fields: string };
}

export interface CreateParagraphBulletsRequest {
  createParagraphBullets: { range: DocsRange; bulletPreset: BulletPreset };
}

export type DocsRequest = InsertTextRequest | UpdateTextStyleRequest | CreateParagraphBulletsRequest;

export interface DocumentCursorState {
  /** Index where the next insert lands. */
  readonly cursor: number;
  readonly requests: readonly DocsRequest[];
}

/** Index 0 belongs to the document's own leading structural element. */
export const DOCUMENT_START_INDEX = 1;

export const SEPARATOR_LINE = '-'.repeat(50);
export const HEADER_SEPARATOR = `${SEPARATOR_LINE}\n`;
export const TRAILING_SEPARATOR = `\n${SEPARATOR_LINE}\n\n`;

interface StyleSpec {
  bold?: boolean;
  italic?: boolean;
  color: [number, number, number];
  sizePt: number;
}

// Inserted text inherits the style before it, so weight and italics are always reset.
const TEXT_STYLE_FIELDS = 'bold,italic,foregroundColor,fontSize';

const toTextStyle = ({ bold = false, italic = false, color, sizePt }: StyleSpec): { textStyle: TextStyle; fields: string } => {
  const [red, green, blue] = color;
  return {
    textStyle: {
      bold,
      italic,
      foregroundColor: { color: { rgbColor: { red, green, blue } } },
      fontSize: { magnitude: sizePt, unit: 'PT' },
    },
    fields: TEXT_STYLE_FIELDS,
  };
};

const TITLE_STYLE = toTextStyle({ bold: true, color: [0, 0.4, 0.8], sizePt: 18 });

const BLOCK_STYLES: Record<ContentBlock['kind'], { textStyle: TextStyle; fields: string }> = {
  heading: toTextStyle({ bold: true, color: [0.2, 0.2, 0.2], sizePt: 14 }),
  paragraph: toTextStyle({ color: [0.13, 0.13, 0.13], sizePt: 11 }),
  subHeading: toTextStyle({ bold: true, italic: true, color: [0, 0.6, 0.3], sizePt: 12 }),
  subSubHeading: toTextStyle({ bold: true, color: [0.4, 0.4, 0.4], sizePt: 11 }),
  bulletItem: toTextStyle({ color: [0.26, 0.26, 0.26], sizePt: 11 }),
  numberedItem: toTextStyle({ color: [0.26, 0.26, 0.26], sizePt: 11 }),
};

/** The exact text inserted for a block, terminator included. */
export const blockInsertText = (block: ContentBlock): string => {
  switch (block.kind) {
    case 'heading':
    case 'subHeading':
    case 'subSubHeading':
      return `${block.text}\n`;
    case 'paragraph':
      return `${block.text}\n\n`;
    case 'bulletItem':
      return `• ${block.text}\n`;
    case 'numberedItem':
      return `${block.ordinal}. ${block.text}\n`;
  }
};

const bulletPresetFor = (block: ContentBlock): BulletPreset | null => {
  if (block.kind === 'bulletItem') return 'BULLET_DISC_CIRCLE_SQUARE';
  if (block.kind === 'numberedItem') return 'NUMBERED_DECIMAL_ALPHA_ROMAN';
  return null;
};

const insertText = (
  state: DocumentCursorState,
  text: string,
  style?: { textStyle: TextStyle; fields: string },
  bulletPreset?: BulletPreset | null,
): DocumentCursorState => {
  const range: DocsRange = { startIndex: state.cursor, endIndex: state.cursor + text.length };
  const requests: DocsRequest[] = [{ insertText: { location: { index: state.cursor }, text } }];
  if (style) {
    requests.push({ updateTextStyle: { range, textStyle: style.textStyle, fields: style.fields } });
  }
  if (bulletPreset) {
    requests.push({ createParagraphBullets: { range, bulletPreset } });
  }
  return { cursor: range.endIndex, requests: [...state.requests, ...requests] };
};

export const initialCursorState = (): DocumentCursorState => ({ cursor: DOCUMENT_START_INDEX, requests: [] });

/** One step of the fold: insert `block` at the cursor, style exactly what was inserted. */
export const appendBlock = (state: DocumentCursorState, block: ContentBlock): DocumentCursorState =>
  insertText(state, blockInsertText(block), BLOCK_STYLES[block.kind], bulletPresetFor(block));

export const appendPageHeader = (state: DocumentCursorState, pageTitle: string): DocumentCursorState =>
  insertText(insertText(state, `${pageTitle}\n`, TITLE_STYLE), HEADER_SEPARATOR);

export const appendTrailingSeparator = (state: DocumentCursorState): DocumentCursorState =>
  insertText(state, TRAILING_SEPARATOR);

export const documentTitleFor = (category: string, generatedAt: Date): string =>
  `${formatMonthYear(generatedAt)} - ${category}`;

export const pageTitleFor = (generatedAt: Date): string => `Current Affairs - ${formatLongDate(generatedAt)}`;

export interface CategoryDocumentPlan {
  title: string;
  requests: DocsRequest[];
  /** Cursor after the last insert. */
  endIndex: number;
}

export const planCategoryDocument = ({
  category,
  blocks,
  generatedAt,
}: {
  category: string;
  blocks: readonly ContentBlock[];
  generatedAt: Date;
}): CategoryDocumentPlan => {
  const header = appendPageHeader(initialCursorState(), pageTitleFor(generatedAt));
  const body = blocks.reduce(appendBlock, header);
  const final = appendTrailingSeparator(body);
  return {
    title: documentTitleFor(category, generatedAt),
    requests: [...final.requests],
    endIndex: final.cursor,
  };
};

export class RequestPlanError extends PipelineError {}

/**
 * Replays a plan against a virtual cursor. Each insert must land on the cursor, and each
 * style or bullet request must cover exactly the text inserted just before it.
 *
 * @returns the cursor after the last insert
 */
export const verifyRequestPlan = (requests: readonly DocsRequest[], startIndex = DOCUMENT_START_INDEX): number => {
  let cursor = startIndex;
  let lastInsert: DocsRange | null = null;

  requests.forEach((request, position) => {
    if ('insertText' in request) {
      const { location, text } = request.insertText;
      if (location.index !== cursor) {
        throw new RequestPlanError(`Request ${position} inserts at ${location.index}, expected ${cursor}`);
      }
      if (text.length === 0) {
        throw new RequestPlanError(`Request ${position} inserts empty text`);
      }
      lastInsert = { startIndex: cursor, endIndex: cursor + text.length };
      cursor = lastInsert.endIndex;
      return;
    }
    const range = 'updateTextStyle' in request ? request.updateTextStyle.range : request.createParagraphBullets.range;
    const expected: DocsRange | null = lastInsert;
    if (!expected || range.startIndex !== expected.startIndex || range.endIndex !== expected.endIndex) {
      throw new RequestPlanError(
        `Request ${position} targets [${range.startIndex}, ${range.endIndex}) but the preceding insert covers ` +
          (expected ? `[${expected.startIndex}, ${expected.endIndex})` : 'nothing'),
      );
    }
  });

  return cursor;
};
