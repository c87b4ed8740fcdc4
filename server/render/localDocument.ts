import {
  AlignmentType,
  BorderStyle,
  Document,
  HeadingLevel,
  ImageRun,
  Packer,
  Paragraph,
  UnderlineType,
  convertInchesToTwip,
  convertMillimetersToTwip,
} from 'docx';
import type { IParagraphStyleOptions } from 'docx';
import type { ContentBlock } from '../../shared/types';
import { formatDayStamp, formatLongDate } from '../utils/text';
import type { ImageLoader } from './images';

// docx sizes runs in half-points and places images in pixels at 96 dpi.
const pt = (points: number) => points * 2;
const EMBED_WIDTH = 240;
const EMBED_HEIGHT = 180;

export const STYLE_IDS = {
  title: 'DigestTitle',
  heading: 'DigestHeading',
  paragraph: 'DigestParagraph',
  subHeading: 'DigestSubHeading',
  bulletItem: 'DigestBulletList',
  numberedItem: 'DigestNumberedList',
} as const;

const listParagraph = {
  indent: { left: convertInchesToTwip(0.75), hanging: convertInchesToTwip(0.25) },
  spacing: { after: 60 },
};

const listRun = { font: 'Georgia', size: pt(12), color: '424242' };

const PARAGRAPH_STYLES: IParagraphStyleOptions[] = [
  {
    id: STYLE_IDS.title,
    name: 'Digest Title',
    basedOn: 'Normal',
    next: 'Normal',
    quickFormat: true,
    run: { font: 'Calibri', size: pt(22), bold: true, color: '0066CC', underline: { type: UnderlineType.SINGLE } },
    paragraph: { alignment: AlignmentType.CENTER, spacing: { after: 240 } },
  },
  {
    id: STYLE_IDS.heading,
    name: 'Digest Heading',
    basedOn: 'Normal',
    next: 'Normal',
    quickFormat: true,
    run: { font: 'Arial', size: pt(16), bold: true, color: '333333' },
    paragraph: { indent: { left: convertInchesToTwip(0.25) }, spacing: { before: 240, after: 120 } },
  },
  {
    id: STYLE_IDS.subHeading,
    name: 'Digest SubHeading',
    basedOn: 'Normal',
    next: 'Normal',
    quickFormat: true,
    run: { font: 'Arial', size: pt(14), bold: true, italics: true, color: '00994C' },
    paragraph: { spacing: { before: 180, after: 80 } },
  },
  {
    id: STYLE_IDS.paragraph,
    name: 'Digest Paragraph',
    basedOn: 'Normal',
    next: 'Normal',
    run: { font: 'Georgia', size: pt(12), color: '212121' },
    paragraph: {
      indent: { firstLine: convertInchesToTwip(0.5) },
      spacing: { after: 160 },
      border: { bottom: { style: BorderStyle.SINGLE, size: 4, color: 'C8C8C8', space: 4 } },
    },
  },
  {
    id: STYLE_IDS.bulletItem,
    name: 'Digest Bullet List',
    basedOn: 'Normal',
    run: listRun,
    paragraph: listParagraph,
  },
  {
    id: STYLE_IDS.numberedItem,
    name: 'Digest Numbered List',
    basedOn: 'Normal',
    run: listRun,
    paragraph: listParagraph,
  },
];

const imageParagraph = (data: Buffer) =>
  new Paragraph({
    alignment: AlignmentType.CENTER,
    children: [new ImageRun({ type: 'png', data, transformation: { width: EMBED_WIDTH, height: EMBED_HEIGHT } })],
  });

const blockParagraph = (block: ContentBlock): Paragraph => {
  switch (block.kind) {
    case 'heading':
      return new Paragraph({ text: block.text, style: STYLE_IDS.heading });
    case 'paragraph':
      return new Paragraph({ text: block.text, style: STYLE_IDS.paragraph });
    case 'subHeading':
      return new Paragraph({ text: block.text, style: STYLE_IDS.subHeading });
    case 'subSubHeading':
      return new Paragraph({ text: block.text, heading: HeadingLevel.HEADING_4 });
    case 'bulletItem':
      return new Paragraph({ text: `• ${block.text}`, style: STYLE_IDS.bulletItem });
    case 'numberedItem':
      return new Paragraph({ text: `${block.ordinal}. ${block.text}`, style: STYLE_IDS.numberedItem });
  }
};

/**
 * Builds the paragraph list for the combined digest. Images load one at a time in block
 * order; a heading whose image cannot be loaded is rendered without it.
 */
export const buildDigestParagraphs = async (
  blocks: readonly ContentBlock[],
  generatedAt: Date,
  loadImage: ImageLoader,
): Promise<Paragraph[]> => {
  const paragraphs: Paragraph[] = [
    new Paragraph({ text: `Current Affairs - ${formatLongDate(generatedAt)}`, style: STYLE_IDS.title }),
  ];
  for (const block of blocks) {
    paragraphs.push(blockParagraph(block));
    if (block.kind === 'heading' && block.imageRef) {
      const image = await loadImage(block.imageRef);
      if (image) paragraphs.push(imageParagraph(image));
    }
  }
  return paragraphs;
};

export const renderLocalDocument = async (
  blocks: readonly ContentBlock[],
  generatedAt: Date,
  loadImage: ImageLoader,
): Promise<Buffer> => {
  const children = await buildDigestParagraphs(blocks, generatedAt, loadImage);
  const document = new Document({
    title: `Current Affairs - ${formatLongDate(generatedAt)}`,
    styles: { paragraphStyles: PARAGRAPH_STYLES },
    sections: [
      {
        properties: {
          page: {
            margin: {
              top: convertMillimetersToTwip(15),
              bottom: convertMillimetersToTwip(15),
              left: convertMillimetersToTwip(20),
              right: convertMillimetersToTwip(20),
            },
          },
        },
        children,
      },
    ],
  });
  return await Packer.toBuffer(document);
};

export const artifactFilenameFor = (generatedAt: Date): string =>
  `${formatDayStamp(generatedAt)}_Current_Affairs.docx`;
