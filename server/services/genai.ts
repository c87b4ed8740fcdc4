import { GoogleGenAI, type GenerateContentResponse } from '@google/genai';
import type { AppConfig } from '../../shared/config';
import { sleep } from '../utils/async';
import { Semaphore } from '../utils/concurrency';

type KeyState = {
  client: GoogleGenAI;
  requestTimestamps: number[];
  rateLimitMutex: Semaphore;
  lastUsedAt: number;
};

const stateByApiKey = new Map<string, KeyState>();
const MAX_KEYS = 8;
const WINDOW_MS = 60_000;
const MAX_ATTEMPTS = 4;

const trimStateCache = () => {
  if (stateByApiKey.size <= MAX_KEYS) {
    return;
  }
  let oldestKey: string | null = null;
  let oldestTs = Infinity;
  for (const [key, state] of stateByApiKey.entries()) {
    if (state.lastUsedAt < oldestTs) {
      oldestTs = state.lastUsedAt;
      oldestKey = key;
    }
  }
  if (oldestKey) {
    stateByApiKey.delete(oldestKey);
  }
};

const getStateForApiKey = (apiKey: string): KeyState => {
  const existing = stateByApiKey.get(apiKey);
  if (existing) {
    existing.lastUsedAt = Date.now();
    return existing;
  }

  const created: KeyState = {
    client: new GoogleGenAI({ apiKey }),
    requestTimestamps: [],
    rateLimitMutex: new Semaphore(1),
    lastUsedAt: Date.now(),
  };
  stateByApiKey.set(apiKey, created);
  trimStateCache();
  return created;
};

const errorStatus = (error: unknown): number | null => {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return null;
  }
  return typeof error.status === 'number' ? error.status : null;
};

export const isTransientError = (error: unknown): boolean => {
  const code = errorStatus(error);
  if (code === 429 || code === 500 || code === 503) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : '';
  return /quota|unavailable|overload|temporar/.test(message);
};

/** Waits until the per-key sliding window has room, then reserves a slot. */
const reserveSlot = async (state: KeyState, rpm: number) => {
  while (true) {
    const release = await state.rateLimitMutex.acquire();
    let waitMs = 0;
    try {
      const now = Date.now();
      while (state.requestTimestamps.length > 0 && now - state.requestTimestamps[0] > WINDOW_MS) {
        state.requestTimestamps.shift();
      }
      if (state.requestTimestamps.length < rpm) {
        state.requestTimestamps.push(now);
        return;
      }
      waitMs = Math.max(0, state.requestTimestamps[0] + WINDOW_MS - now);
    } finally {
      release();
    }
    await sleep(waitMs);
  }
};

export interface GenerateTextParams {
  prompt: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

export const rateLimitedGenerateContent = async (
  config: Pick<AppConfig, 'llm'>,
  params: GenerateTextParams,
): Promise<GenerateContentResponse> => {
  const apiKey = config.llm.apiKey;
  if (!apiKey) {
    throw new Error('GEMINI_API_KEY missing');
  }
  const state = getStateForApiKey(apiKey);
  const rpm = Math.max(1, config.llm.requestsPerMinute);

  let attempt = 0;
  while (true) {
    attempt += 1;
    await reserveSlot(state, rpm);
    try {
      return await state.client.models.generateContent({
        model: params.model ?? config.llm.model,
        contents: params.prompt,
        config: {
          temperature: params.temperature ?? config.llm.temperature,
          maxOutputTokens: params.maxOutputTokens ?? config.llm.maxOutputTokens,
        },
      });
    } catch (error) {
      if (!isTransientError(error) || attempt >= MAX_ATTEMPTS) {
        throw error instanceof Error ? error : new Error(String(error));
      }
      const backoff = Math.min(30_000, 1_000 * 2 ** attempt) + Math.floor(Math.random() * 500);
      await sleep(backoff);
    }
  }
};
