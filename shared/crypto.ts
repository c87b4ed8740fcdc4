import { randomUUID } from 'node:crypto';

export const randomId = (): string => randomUUID();

/** FNV-1a over the UTF-16 code units of `value`, as 8 hex digits. */
export const hashString = (value: string): string => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash.toString(16).padStart(8, '0');
};
