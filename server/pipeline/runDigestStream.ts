import type { SseStream } from '../../shared/sse';
import { DeliveryError, RunAbortedError } from '../errors';
import type { RunContext } from './context';
import { runDigest } from './runDigest';

export interface RunDigestStreamArgs {
  ctx: RunContext;
  stream: SseStream;
  pages?: number;
}

/**
 * Streams stage events for one run, then a `run-summary` frame on success or a `fatal`
 * frame carrying the abort reason.
 */
export const handleRunDigestStream = async ({ ctx, stream, pages }: RunDigestStreamArgs): Promise<void> => {
  try {
    const summary = await runDigest(ctx, { pages, onEvent: (event) => stream.send(event) });
    stream.sendJson('run-summary', summary);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const reason =
      error instanceof RunAbortedError ? error.reason : error instanceof DeliveryError ? 'delivery_failed' : 'internal';
    if (reason === 'internal') {
      ctx.logger.error('Digest stream failed unexpectedly', { error: message });
    }
    stream.sendJson('fatal', { error: message, reason });
  } finally {
    stream.close();
  }
};
