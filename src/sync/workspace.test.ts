import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { withScratchDir } from './workspace.js';

describe('withScratchDir', () => {
  it('should provide a fresh directory and remove it afterwards', async () => {
    let seen = '';
    const result = await withScratchDir(async dir => {
      seen = dir;
      fs.writeFileSync(path.join(dir, 'a.docx'), 'content');
      return 'ok';
    });

    expect(result).toBe('ok');
    expect(path.dirname(seen)).toBe(os.tmpdir());
    expect(path.basename(seen).startsWith('mdsync-')).toBe(true);
    expect(fs.existsSync(seen)).toBe(false);
  });

  it('should remove the directory when the callback throws', async () => {
    let seen = '';
    await expect(withScratchDir(async dir => {
      seen = dir;
      throw new Error('conversion crashed');
    })).rejects.toThrow('conversion crashed');

    expect(fs.existsSync(seen)).toBe(false);
  });
});
