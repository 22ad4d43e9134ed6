import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

/**
 * Run `fn` with a fresh scratch directory that is removed afterwards,
 * whether `fn` resolves or throws.
 */
export async function withScratchDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'mdsync-'));
  try {
    return await fn(dir);
  } finally {
    await fs.promises.rm(dir, { recursive: true, force: true });
  }
}
