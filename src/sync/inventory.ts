/**
 * Inventories of the two sides, read fresh on every run.
 */
import fs from 'node:fs';
import path from 'node:path';
import type { LocalFileState, RemoteFileState } from './types.js';
import { LOCAL_EXTENSION, REMOTE_EXTENSION } from './types.js';
import type { RemoteStore } from './remote-store.js';
import { shouldIgnore } from './ignore.js';
import { localNameFor, stemOf } from './state.js';

/**
 * Scan the top level of the local directory for Markdown documents, sorted by name.
 */
export function scanLocalDocuments(localPath: string, ignorePatterns: string[]): LocalFileState[] {
  const docs: LocalFileState[] = [];
  for (const entry of fs.readdirSync(localPath, { withFileTypes: true })) {
    if (!entry.isFile() || stemOf(entry.name, LOCAL_EXTENSION) === null) continue;
    if (shouldIgnore(entry.name, ignorePatterns)) continue;
    const absPath = path.join(localPath, entry.name);
    docs.push({
      name: entry.name,
      path: absPath,
      modifiedAt: fs.statSync(absPath).mtime,
    });
  }
  return docs.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * List the remote collection, dropping documents whose remote or local name is ignored.
 */
export async function listRemoteDocuments(
  store: RemoteStore,
  ignorePatterns: string[],
  signal?: AbortSignal,
): Promise<RemoteFileState[]> {
  const docs = await store.listDocuments(signal);
  return docs.filter(doc =>
    stemOf(doc.name, REMOTE_EXTENSION) !== null
    && !shouldIgnore(doc.name, ignorePatterns)
    && !shouldIgnore(localNameFor(doc.name), ignorePatterns),
  );
}
