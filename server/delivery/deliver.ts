import { DeliveryError } from '../errors';
import type { Logger } from '../obs/logger';
import { splitCaption } from './caption';
import type { RetryPolicy } from './retryPolicy';
import type { DeliveryChannel } from './telegram';

export interface DigestDelivery {
  bytes: Buffer;
  filename: string;
  caption: string;
  captionLimit: number;
}

const isTransientDeliveryError = (error: unknown): boolean => error instanceof DeliveryError && error.transient;

/**
 * Sends the document with a caption that fits the channel limit, then the full caption as
 * a message when it had to be cut. Each call is retried on its own.
 */
export const deliverDigest = async (
  channel: DeliveryChannel,
  policy: RetryPolicy,
  { bytes, filename, caption, captionLimit }: DigestDelivery,
  logger: Logger,
): Promise<{ truncated: boolean }> => {
  const { caption: attached, followUp } = splitCaption(caption, captionLimit);
  const onRetry = ({ attempt, delayMs, error }: { attempt: number; delayMs: number; error: unknown }) => {
    logger.warn('Delivery timed out; retrying', {
      attempt,
      maxAttempts: policy.maxAttempts,
      delayMs,
      error: error instanceof Error ? error.message : String(error),
    });
  };

  await policy.run(() => channel.sendDocument({ bytes, filename, caption: attached }), {
    isRetryable: isTransientDeliveryError,
    onRetry,
  });
  logger.info('Digest document delivered', { filename, bytes: bytes.length });

  if (followUp) {
    await policy.run(() => channel.sendMessage(followUp), { isRetryable: isTransientDeliveryError, onRetry });
    logger.info('Full caption sent as follow-up message', { length: followUp.length });
  }
  return { truncated: Boolean(followUp) };
};
