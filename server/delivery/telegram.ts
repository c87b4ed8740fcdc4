import { z } from 'zod';
import { DeliveryError } from '../errors';
import { isAbortError } from '../utils/async';

export interface DocumentPayload {
  bytes: Buffer;
  filename: string;
  caption?: string;
}

/** Where the rendered digest is published. */
export interface DeliveryChannel {
  sendDocument: (payload: DocumentPayload) => Promise<void>;
  sendMessage: (text: string) => Promise<void>;
}

export interface TelegramChannelOptions {
  botToken: string;
  channelId: string;
  timeoutMs: number;
  apiBaseUrl?: string;
}

const botApiResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export const createTelegramChannel = ({
  botToken,
  channelId,
  timeoutMs,
  apiBaseUrl = 'https://api.telegram.org',
}: TelegramChannelOptions): DeliveryChannel => {
  const call = async (method: string, body: FormData | string) => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetch(`${apiBaseUrl}/bot${botToken}/${method}`, {
        method: 'POST',
        headers: typeof body === 'string' ? { 'Content-Type': 'application/json' } : undefined,
        body,
        signal: controller.signal,
      });
      const parsed = botApiResponseSchema.safeParse(await response.json());
      if (!response.ok || !parsed.success || !parsed.data.ok) {
        const description = parsed.success ? parsed.data.description : undefined;
        throw new DeliveryError(`Telegram ${method} failed (${response.status})${description ? `: ${description}` : ''}`, {
          transient: false,
        });
      }
    } catch (error) {
      if (error instanceof DeliveryError) throw error;
      if (isAbortError(error)) {
        throw new DeliveryError(`Telegram ${method} timed out after ${timeoutMs}ms`, { transient: true, cause: error });
      }
      throw new DeliveryError(`Telegram ${method} failed: ${error instanceof Error ? error.message : String(error)}`, {
        transient: false,
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }
  };

  return {
    sendDocument: async ({ bytes, filename, caption }) => {
      const form = new FormData();
      form.append('chat_id', channelId);
      form.append('document', new Blob([new Uint8Array(bytes)], { type: DOCX_MIME }), filename);
      if (caption) form.append('caption', caption);
      await call('sendDocument', form);
    },
    sendMessage: async (text) => {
      await call('sendMessage', JSON.stringify({ chat_id: channelId, text }));
    },
  };
};
