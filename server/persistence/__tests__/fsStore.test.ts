import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createFsArtifactStore } from '../fsStore';
import { writeTempArtifact } from '../tempArtifact';

describe('createFsArtifactStore', () => {
  let rootDir = '';

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'digest-store-'));
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  const storeFor = (root: string) =>
    createFsArtifactStore({
      persistence: {
        mode: 'fs',
        rootDir: root,
        articlesDir: path.join(root, 'articles'),
        outputsDir: path.join(root, 'outputs'),
      },
    });

  it('writes articles and run artifacts as JSON and reads them back', async () => {
    const store = storeFor(rootDir);
    await store.ensureLayout();

    const articlePath = await store.saveArticle('1a2b3c4d', { title: 'Budget' });
    await store.saveRunArtifact('run-1', 'summary', { status: 'completed' });

    expect(articlePath).toBe(path.join(rootDir, 'articles', '1a2b3c4d.json'));
    expect(JSON.parse((await store.readArticle('1a2b3c4d')) ?? 'null')).toEqual({ title: 'Budget' });
    expect(JSON.parse((await store.readRunArtifact('run-1', 'summary')) ?? 'null')).toEqual({ status: 'completed' });
  });

  it('returns null for unknown ids', async () => {
    const store = storeFor(rootDir);

    await expect(store.readArticle('missing')).resolves.toBeNull();
    await expect(store.readRunArtifact('run-1', 'documents')).resolves.toBeNull();
  });

  it('keeps path segments inside the root', async () => {
    const store = storeFor(rootDir);

    const written = await store.saveArticle('../../escape', { x: 1 });

    expect(written).toBe(path.join(rootDir, 'articles', '______escape.json'));
  });
});

describe('writeTempArtifact', () => {
  it('writes the file under its own name and removes it', async () => {
    const artifact = await writeTempArtifact('19-10-2026_Current_Affairs.docx', Buffer.from('PK'));

    expect(path.basename(artifact.path)).toBe('19-10-2026_Current_Affairs.docx');
    await expect(fs.readFile(artifact.path, 'latin1')).resolves.toBe('PK');

    await artifact.remove();
    await expect(fs.stat(path.dirname(artifact.path))).rejects.toThrow();
  });
});
