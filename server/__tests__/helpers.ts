import { vi } from 'vitest';
import type { AppConfig } from '../../shared/config';
import { buildConfig } from '../config/config';
import type { DocumentPayload, DeliveryChannel } from '../delivery/telegram';
import type { DocsClient } from '../docs/client';
import type { DocsRequest } from '../docs/plan';

export const makeTestConfig = (env: NodeJS.ProcessEnv = {}): AppConfig =>
  buildConfig({
    NODE_ENV: 'test',
    PERSISTENCE_MODE: 'none',
    RAW_DATA_ROOT: '/tmp/digest-test',
    SCRAPE_USER_AGENT: 'test-agent',
    ...env,
  });

type FetchInput = string | URL | Request;

export const urlOf = (input: FetchInput): string =>
  typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;

/** Stubs global fetch with a URL-to-HTML table; unknown URLs answer 404. */
export const stubFetchPages = (pages: Record<string, string>) => {
  const fetchMock = vi.fn(async (input: FetchInput) => {
    const body = pages[urlOf(input)];
    return body === undefined
      ? new Response('not found', { status: 404 })
      : new Response(body, { status: 200, headers: { 'content-type': 'text/html' } });
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
};

export interface FakeDocsClient extends DocsClient {
  created: string[];
  batches: Array<{ documentId: string; requests: readonly DocsRequest[] }>;
}

export const createFakeDocsClient = (
  options: { failBatchFor?: (documentId: string) => Error | null } = {},
): FakeDocsClient => {
  const created: string[] = [];
  const batches: FakeDocsClient['batches'] = [];
  return {
    created,
    batches,
    createDocument: async (title) => {
      created.push(title);
      return `doc-${created.length}`;
    },
    batchUpdate: async (documentId, requests) => {
      const failure = options.failBatchFor?.(documentId) ?? null;
      if (failure) throw failure;
      batches.push({ documentId, requests });
    },
  };
};

export interface FakeChannel extends DeliveryChannel {
  documents: DocumentPayload[];
  messages: string[];
}

export const createFakeChannel = (sendDocument?: (payload: DocumentPayload) => Promise<void>): FakeChannel => {
  const documents: DocumentPayload[] = [];
  const messages: string[] = [];
  return {
    documents,
    messages,
    sendDocument: async (payload) => {
      if (sendDocument) await sendDocument(payload);
      documents.push(payload);
    },
    sendMessage: async (text) => {
      messages.push(text);
    },
  };
};
