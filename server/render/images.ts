import sharp from 'sharp';
import type { AppConfig } from '../../shared/config';
import { fetchBytes } from '../http/fetcher';
import type { Logger } from '../obs/logger';

/** Returns PNG bytes ready to embed, or null when the image should be left out. */
export type ImageLoader = (url: string) => Promise<Buffer | null>;

export const EMBED_WIDTH_PX = 300;
export const EMBED_HEIGHT_PX = 225;

/** Flattens any alpha onto white and scales to the fixed embed box. */
export const prepareImage = async (bytes: Buffer): Promise<Buffer> =>
  await sharp(bytes)
    .flatten({ background: '#ffffff' })
    .toColorspace('srgb')
    .resize(EMBED_WIDTH_PX, EMBED_HEIGHT_PX, { fit: 'fill', kernel: 'lanczos3' })
    .png()
    .toBuffer();

export const createImageLoader = ({
  config,
  logger,
  fetchImage = (url) => fetchBytes(url, { timeoutMs: config.scraping.fetchTimeoutMs, userAgent: config.scraping.userAgent }),
}: {
  config: Pick<AppConfig, 'scraping'>;
  logger: Logger;
  fetchImage?: (url: string) => Promise<Buffer>;
}): ImageLoader => {
  return async (url) => {
    try {
      const bytes = await fetchImage(url);
      if (bytes.length < config.scraping.minImageBytes) {
        logger.warn('Image payload too small; skipping', { url, bytes: bytes.length });
        return null;
      }
      return await prepareImage(bytes);
    } catch (error) {
      logger.warn('Image unavailable; rendering without it', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  };
};
