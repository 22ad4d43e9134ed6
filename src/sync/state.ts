/**
 * Staleness checks and record construction.
 * A record without lastUploadAt counts as never synced.
 */
import type { SyncConfig, SyncRecord, LocalFileState, RemoteFileState } from './types.js';
import { LOCAL_EXTENSION, REMOTE_EXTENSION } from './types.js';
import { formatTimestamp, isNewer } from './timestamps.js';

/**
 * Strip `extension` from `name`, or return null if the name does not end in it.
 */
export function stemOf(name: string, extension: string): string | null {
  if (!name.endsWith(extension)) return null;
  const stem = name.slice(0, -extension.length);
  return stem.length > 0 ? stem : null;
}

export function remoteNameFor(localName: string): string {
  const stem = stemOf(localName, LOCAL_EXTENSION) ?? localName;
  return stem + REMOTE_EXTENSION;
}

export function localNameFor(remoteName: string): string {
  const stem = stemOf(remoteName, REMOTE_EXTENSION) ?? remoteName;
  return stem + LOCAL_EXTENSION;
}

export function getRecord(config: SyncConfig, localName: string): SyncRecord | undefined {
  return Object.prototype.hasOwnProperty.call(config.files, localName)
    ? config.files[localName]
    : undefined;
}

/**
 * A local document needs a push when it was never synced or was modified
 * after the last recorded push/pull.
 */
export function needsPush(local: LocalFileState, record: SyncRecord | undefined): boolean {
  return isNewer(local.modifiedAt, record?.lastUploadAt);
}

/**
 * A remote document needs a pull when it was never synced or is strictly
 * newer than the last recorded push/pull. Equal timestamps never pull.
 */
export function needsPull(remote: RemoteFileState, record: SyncRecord | undefined): boolean {
  return isNewer(remote.modifiedAt, record?.lastUploadAt);
}

export function buildRecord(remoteLocation: string, completedAt: Date, localModifiedAt: Date): SyncRecord {
  return {
    remoteLocation,
    lastUploadAt: formatTimestamp(completedAt),
    localModTimeAtLastUpload: formatTimestamp(localModifiedAt),
  };
}
