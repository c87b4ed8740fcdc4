import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import type { ArtifactStore } from '../../shared/artifacts';

const sanitizeSegment = (value: string): string =>
  value.replace(/[^a-z0-9_\-]/gi, '_').slice(0, 80) || 'artifact';

const ensureDir = async (dir: string) => {
  await fs.mkdir(dir, { recursive: true });
};

const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Attempted to access a path outside of persistence root: ${target}`);
  }
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export const createFsArtifactStore = (config: Pick<AppConfig, 'persistence'>): ArtifactStore => {
  const { rootDir, articlesDir, outputsDir } = config.persistence;

  const writeJson = async (target: string, data: unknown) => {
    guardPath(rootDir, target);
    await ensureDir(path.dirname(target));
    await fs.writeFile(target, JSON.stringify(data, null, 2), 'utf-8');
    return target;
  };

  const readJson = async (target: string): Promise<string | null> => {
    guardPath(rootDir, target);
    try {
      return await fs.readFile(target, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  };

  const articlePath = (articleId: string) => path.join(articlesDir, `${sanitizeSegment(articleId)}.json`);
  const runArtifactPath = (runId: string, kind: string) =>
    path.join(outputsDir, sanitizeSegment(runId), `${sanitizeSegment(kind)}.json`);

  return {
    ensureLayout: async () => {
      await ensureDir(rootDir);
      await ensureDir(articlesDir);
      await ensureDir(outputsDir);
    },
    saveArticle: async (articleId, data) => await writeJson(articlePath(articleId), data),
    saveRunArtifact: async (runId, kind, data) => await writeJson(runArtifactPath(runId, kind), data),
    readArticle: async (articleId) => await readJson(articlePath(articleId)),
    readRunArtifact: async (runId, kind) => await readJson(runArtifactPath(runId, kind)),
  };
};
