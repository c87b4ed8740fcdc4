import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export interface TempArtifact {
  path: string;
  /** Removes the file and its private directory. */
  remove: () => Promise<void>;
}

/** Writes `bytes` as `filename` inside a fresh directory under `root`. */
export const writeTempArtifact = async (
  filename: string,
  bytes: Buffer,
  root: string = os.tmpdir(),
): Promise<TempArtifact> => {
  const dir = await fs.mkdtemp(path.join(root, 'digest-'));
  const target = path.join(dir, path.basename(filename));
  await fs.writeFile(target, bytes);
  return {
    path: target,
    remove: async () => {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
};
