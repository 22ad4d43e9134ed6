/**
 * Optional version control for the tracked directory.
 */
import fs from 'node:fs';
import path from 'node:path';
import { execFile } from 'node:child_process';

export type GitInitResult =
  | { status: 'initialized' }
  | { status: 'exists' }
  | { status: 'failed'; error: string };

/**
 * Run `git init` in `localPath` unless it already is a repository.
 * Never rejects: failures are reported in the result.
 */
export function initGitRepo(localPath: string, gitCommand = 'git'): Promise<GitInitResult> {
  if (fs.existsSync(path.join(localPath, '.git'))) {
    return Promise.resolve({ status: 'exists' });
  }
  return new Promise(resolve => {
    execFile(gitCommand, ['init'], { cwd: localPath, windowsHide: true }, (err, _stdout, stderr) => {
      if (err) {
        const detail = String(stderr).trim();
        resolve({ status: 'failed', error: detail || err.message });
        return;
      }
      resolve({ status: 'initialized' });
    });
  });
}
