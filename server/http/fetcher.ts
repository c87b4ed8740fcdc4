import { FetchError } from '../errors';
import { isAbortError } from '../utils/async';

export interface FetchOptions {
  timeoutMs: number;
  userAgent: string;
  accept?: string;
}

const fetchWithTimeout = async (url: string, options: FetchOptions): Promise<Response> => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: {
        'User-Agent': options.userAgent,
        Accept: options.accept ?? 'text/html,application/xhtml+xml',
        'Accept-Language': 'en-US,en;q=0.9',
      },
      redirect: 'follow',
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new FetchError(url, `HTTP ${response.status}`, { status: response.status });
    }
    return response;
  } catch (error) {
    if (error instanceof FetchError) {
      throw error;
    }
    if (isAbortError(error)) {
      throw new FetchError(url, `Timed out after ${options.timeoutMs}ms`, { timedOut: true, cause: error });
    }
    throw new FetchError(url, error instanceof Error ? error.message : String(error), { cause: error });
  } finally {
    clearTimeout(timer);
  }
};

export const fetchText = async (url: string, options: FetchOptions): Promise<string> => {
  const response = await fetchWithTimeout(url, options);
  return await response.text();
};

export const fetchBytes = async (url: string, options: FetchOptions): Promise<Buffer> => {
  const response = await fetchWithTimeout(url, { accept: 'image/*,*/*;q=0.8', ...options });
  return Buffer.from(await response.arrayBuffer());
};
