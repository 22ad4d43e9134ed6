/**
 * Remote store adapter interface. Implementations: FilesystemRemoteStore for a
 * mounted folder and DriveRemoteStore for the Google Drive API.
 */
import type { RemoteFileState } from './types.js';

export interface StoredDocument {
  location: string;
  /** Modification time the remote assigned to the written document, if known */
  modifiedAt?: Date;
}

export interface RemoteStore {
  /** Human-readable description of the collection, for output */
  readonly description: string;
  /**
   * List the .docx documents of the collection.
   * Throws RemoteAccessError when the collection cannot be reached.
   */
  listDocuments(signal?: AbortSignal): Promise<RemoteFileState[]>;
  /** Download the document at `location` to `destPath`. */
  fetch(location: string, destPath: string, signal?: AbortSignal): Promise<void>;
  /**
   * Create or overwrite the document called `name` with the content of
   * `sourcePath`.
   */
  store(name: string, sourcePath: string, signal?: AbortSignal): Promise<StoredDocument>;
}
