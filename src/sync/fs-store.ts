/**
 * Remote store backed by a mounted directory, e.g. a Google Drive folder
 * synchronised by the desktop client. Locations are paths relative to the root.
 */
import fs from 'node:fs';
import path from 'node:path';
import type { RemoteStore, StoredDocument } from './remote-store.js';
import type { RemoteFileState } from './types.js';
import { REMOTE_EXTENSION } from './types.js';
import { RemoteAccessError, errorMessage } from './errors.js';
import { atomicCopyFile } from '../utils/fs.js';

export class FilesystemRemoteStore implements RemoteStore {
  readonly description: string;

  constructor(private readonly rootPath: string) {
    this.description = rootPath;
  }

  async listDocuments(signal?: AbortSignal): Promise<RemoteFileState[]> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(this.rootPath, { withFileTypes: true });
    } catch (err) {
      throw new RemoteAccessError(`Cannot read remote folder ${this.rootPath}: ${errorMessage(err)}`);
    }

    const docs: RemoteFileState[] = [];
    for (const entry of entries) {
      signal?.throwIfAborted();
      if (!entry.isFile() || !entry.name.endsWith(REMOTE_EXTENSION)) continue;
      // temp files from our own atomic writes
      if (entry.name.startsWith('.')) continue;
      const stat = await fs.promises.stat(path.join(this.rootPath, entry.name));
      docs.push({ name: entry.name, location: entry.name, modifiedAt: stat.mtime });
    }
    return docs.sort((a, b) => a.name.localeCompare(b.name));
  }

  async fetch(location: string, destPath: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    await fs.promises.copyFile(this.resolve(location), destPath);
  }

  async store(name: string, sourcePath: string, signal?: AbortSignal): Promise<StoredDocument> {
    signal?.throwIfAborted();
    const target = this.resolve(name);
    await atomicCopyFile(sourcePath, target);
    const stat = await fs.promises.stat(target);
    return { location: name, modifiedAt: stat.mtime };
  }

  private resolve(location: string): string {
    const resolved = path.resolve(this.rootPath, location);
    const relative = path.relative(this.rootPath, resolved);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new Error(`Location ${location} is outside ${this.rootPath}`);
    }
    return resolved;
  }
}
