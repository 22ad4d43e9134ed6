/**
 * Type definitions for the sync engine.
 */

/** Extension of the documents kept in the local directory. */
export const LOCAL_EXTENSION = '.md';
/** Extension of the documents kept in the remote collection. */
export const REMOTE_EXTENSION = '.docx';

export type RemoteDescriptor =
  | { type: 'filesystem'; path: string }
  | { type: 'drive'; folderId: string; folderName: string };

export type RemoteBackend = RemoteDescriptor['type'];

/**
 * Persisted tracking entry for one logical document, keyed by its local name.
 */
export interface SyncRecord {
  /** Remote identity: Drive file id, or path relative to the mounted folder */
  remoteLocation: string;
  /** ISO 8601 UTC timestamp of the last completed push or pull */
  lastUploadAt?: string;
  /** Local mtime (ISO 8601 UTC) right after that push or pull */
  localModTimeAtLastUpload?: string;
}

/**
 * Persisted configuration for one local directory / remote collection pair.
 * Stored as .mdsync.json inside the tracked directory.
 */
export interface SyncConfig {
  version: 1;
  /** Absolute local filesystem path */
  localPath: string;
  /** Where the converted documents live */
  remote: RemoteDescriptor;
  /** ISO 8601 timestamp of the last completed run, null before the first one */
  lastSyncAt: string | null;
  /** Glob patterns to ignore (relative to localPath) */
  ignore: string[];
  /** Map of local document name -> sync record */
  files: Record<string, SyncRecord>;
}

export interface LocalFileState {
  /** File name, e.g. report.md */
  name: string;
  /** Absolute path */
  path: string;
  modifiedAt: Date;
}

export interface RemoteFileState {
  /** File name in the remote collection, e.g. report.docx */
  name: string;
  /** Drive file id or relative path, depending on the backend */
  location: string;
  modifiedAt: Date;
}

export type SyncDirection = 'push' | 'pull';

/**
 * Options for creating a new sync configuration.
 */
export interface CreateSyncOptions {
  localPath: string;
  remote: RemoteDescriptor;
  ignore?: string[];
}
