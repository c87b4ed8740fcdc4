import { formatLongDate, truncateWithEllipsis } from '../utils/text';

export const buildCaption = (generatedAt: Date, titles: readonly string[], joinHandle?: string): string => {
  const lines = titles.map((title) => `👉 ${title}`).join('\n');
  const header = `🎗️ ${formatLongDate(generatedAt)} Current Affairs 🎗️\n\n${lines}`;
  return joinHandle ? `${header}\n\n🎉 Join us :- ${joinHandle} 🎉` : header;
};

export interface SplitCaption {
  caption: string;
  /** Full caption, sent on its own when the attached one had to be cut. */
  followUp?: string;
}

export const splitCaption = (caption: string, limit: number): SplitCaption => {
  if (caption.length <= limit) return { caption };
  return { caption: truncateWithEllipsis(caption, limit), followUp: caption };
};
