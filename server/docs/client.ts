import { GoogleAuth } from 'google-auth-library';
import { z } from 'zod';
import type { AppConfig } from '../../shared/config';
import { RemoteApiError } from '../errors';
import { isAbortError } from '../utils/async';
import type { DocsRequest } from './plan';

/** The two remote document operations the builder needs. */
export interface DocsClient {
  createDocument: (title: string) => Promise<string>;
  batchUpdate: (documentId: string, requests: readonly DocsRequest[]) => Promise<void>;
}

const GOOGLE_DOCS_API_ENDPOINT = 'https://docs.googleapis.com/v1/documents';

export const GOOGLE_DOCS_SCOPE = 'https://www.googleapis.com/auth/documents';

const createDocumentResponseSchema = z.object({
  documentId: z.string().min(1),
});

const errorBodySchema = z.object({
  error: z.object({ message: z.string().optional(), status: z.string().optional() }).optional(),
});

/**
 * Service account or authorized-user JSON, as written by the Google Cloud console or
 * `gcloud auth application-default login`.
 */
const credentialsSchema = z.object({
  type: z.string().optional(),
  client_email: z.string().optional(),
  private_key: z.string().optional(),
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
  refresh_token: z.string().optional(),
  project_id: z.string().optional(),
  quota_project_id: z.string().optional(),
});

export type GoogleCredentials = z.infer<typeof credentialsSchema>;

/** Accepts raw JSON or base64-encoded JSON. */
export const parseGoogleCredentials = (raw: string): GoogleCredentials => {
  const trimmed = raw.trim();
  const json = trimmed.startsWith('{') ? trimmed : Buffer.from(trimmed, 'base64').toString('utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new RemoteApiError('Google credentials are not valid JSON', { cause: error });
  }
  const result = credentialsSchema.safeParse(parsed);
  if (!result.success) {
    throw new RemoteApiError(`Google credentials are malformed: ${result.error.message}`);
  }
  return result.data;
};

export type AccessTokenProvider = () => Promise<string>;

export const createGoogleAccessTokenProvider = (credentials: GoogleCredentials): AccessTokenProvider => {
  const auth = new GoogleAuth({ credentials, scopes: [GOOGLE_DOCS_SCOPE] });
  return async () => {
    try {
      const client = await auth.getClient();
      const tokenResponse = await client.getAccessToken();
      if (!tokenResponse.token) {
        throw new RemoteApiError('Google auth returned no access token');
      }
      return tokenResponse.token;
    } catch (error) {
      if (error instanceof RemoteApiError) throw error;
      throw new RemoteApiError(
        `Failed to get Google access token: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  };
};

const readErrorDetails = async (response: Response): Promise<string | undefined> => {
  try {
    const parsed = errorBodySchema.safeParse(await response.json());
    return parsed.success ? parsed.data.error?.message : undefined;
  } catch {
    return undefined;
  }
};

export interface GoogleDocsClientOptions {
  getAccessToken: AccessTokenProvider;
  timeoutMs: number;
}

export const createGoogleDocsClient = ({ getAccessToken, timeoutMs }: GoogleDocsClientOptions): DocsClient => {
  const post = async (url: string, body: unknown, documentId?: string): Promise<unknown> => {
    const accessToken = await getAccessToken();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          Authorization: `Bearer ${accessToken}`,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      if (!response.ok) {
        const details = await readErrorDetails(response);
        throw new RemoteApiError(
          `Google Docs API responded ${response.status}${details ? `: ${details}` : ''}`,
          { status: response.status, documentId },
        );
      }
      return await response.json();
    } catch (error) {
      if (error instanceof RemoteApiError) throw error;
      const message = isAbortError(error)
        ? `Google Docs API timed out after ${timeoutMs}ms`
        : `Google Docs API request failed: ${error instanceof Error ? error.message : String(error)}`;
      throw new RemoteApiError(message, { documentId, cause: error });
    } finally {
      clearTimeout(timeout);
    }
  };

  return {
    createDocument: async (title) => {
      const json = await post(GOOGLE_DOCS_API_ENDPOINT, { title });
      const parsed = createDocumentResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new RemoteApiError(`Unexpected documents.create response: ${parsed.error.message}`);
      }
      return parsed.data.documentId;
    },
    batchUpdate: async (documentId, requests) => {
      await post(
        `${GOOGLE_DOCS_API_ENDPOINT}/${encodeURIComponent(documentId)}:batchUpdate`,
        { requests },
        documentId,
      );
    },
  };
};

export const createDocsClientFromConfig = (config: Pick<AppConfig, 'docs'>): DocsClient | null => {
  if (!config.docs.enabled || !config.docs.credentialsJson) {
    return null;
  }
  const credentials = parseGoogleCredentials(config.docs.credentialsJson);
  return createGoogleDocsClient({
    getAccessToken: createGoogleAccessTokenProvider(credentials),
    timeoutMs: config.docs.apiTimeoutMs,
  });
};
