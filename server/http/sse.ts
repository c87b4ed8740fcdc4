import type { Response } from 'express';
import type { SseStream, SseStreamOptions } from '../../shared/sse';
import type { Logger } from '../obs/logger';

export const createSseStream = (res: Response, options: SseStreamOptions, logger: Logger): SseStream => {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders();

  let closed = false;

  const close = () => {
    if (closed) return;
    closed = true;
    clearInterval(heartbeat);
    if (!res.writableEnded) res.end();
  };

  // The socket can go away between the `closed` check and the write.
  const write = (chunk: string) => {
    if (closed || res.writableEnded) return;
    try {
      res.write(chunk);
    } catch (error) {
      logger.warn('SSE write failed; closing stream', {
        label: options.label,
        error: error instanceof Error ? error.message : String(error),
      });
      close();
    }
  };

  const heartbeat = setInterval(() => {
    write(': heartbeat\n\n');
  }, options.heartbeatMs);

  res.on('close', close);

  const writeFrame = (eventName: string, payload: unknown) => {
    const data = typeof payload === 'string' ? payload : JSON.stringify(payload);
    write(`event: ${eventName}\ndata: ${data}\n\n`);
  };

  return {
    send: (event) => writeFrame('stage-event', event),
    sendJson: (eventName, payload) => writeFrame(eventName, payload),
    close,
  };
};
