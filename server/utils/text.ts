export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

/** Cuts to `maxLength` UTF-16 units including the ellipsis, never splitting a surrogate pair. */
export const truncateWithEllipsis = (value: string, maxLength: number): string => {
  if (value.length <= maxLength) return value;
  let end = Math.max(0, maxLength - 3);
  if (end > 0 && isHighSurrogate(value.charCodeAt(end - 1))) end -= 1;
  return `${value.slice(0, end)}...`;
};

const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

const pad2 = (value: number) => String(value).padStart(2, '0');

/** `19 October 2026`, in local time. */
export const formatLongDate = (date: Date): string =>
  `${pad2(date.getDate())} ${MONTHS[date.getMonth()]} ${date.getFullYear()}`;

/** `October 2026`, in local time. */
export const formatMonthYear = (date: Date): string => `${MONTHS[date.getMonth()]} ${date.getFullYear()}`;

/** `19-10-2026`, in local time. */
export const formatDayStamp = (date: Date): string =>
  `${pad2(date.getDate())}-${pad2(date.getMonth() + 1)}-${date.getFullYear()}`;
