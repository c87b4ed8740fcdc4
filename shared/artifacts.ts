export type RunArtifactKind = 'summary' | 'combined_blocks' | 'categories' | 'documents';

export interface ArtifactStore {
  ensureLayout: () => Promise<void>;
  saveArticle: (articleId: string, data: unknown) => Promise<string>;
  saveRunArtifact: (runId: string, kind: RunArtifactKind, data: unknown) => Promise<string>;
  /** Raw JSON text, or null when nothing was stored under that id. */
  readArticle: (articleId: string) => Promise<string | null>;
  readRunArtifact: (runId: string, kind: string) => Promise<string | null>;
}

export const createNoopArtifactStore = (): ArtifactStore => ({
  ensureLayout: async () => {},
  saveArticle: async () => '',
  saveRunArtifact: async () => '',
  readArticle: async () => null,
  readRunArtifact: async () => null,
});
