/**
 * Error types raised by the sync engine and its collaborators.
 * Fatal errors abort the run; ConversionError and TransferError only fail
 * the document they were raised for.
 */
import type { SyncDirection } from './types.js';

export class SetupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SetupError';
  }
}

export class NotInitializedError extends Error {
  constructor(public configPath: string) {
    super(`${configPath} not found. Run \`mdsync init\` first.`);
    this.name = 'NotInitializedError';
  }
}

export class InvalidConfigError extends Error {
  constructor(
    public configPath: string,
    detail: string,
  ) {
    super(`Invalid sync config at ${configPath}: ${detail}`);
    this.name = 'InvalidConfigError';
  }
}

export class SyncInProgressError extends Error {
  constructor(
    public lockPath: string,
    public pid: number | null,
  ) {
    super(
      pid !== null
        ? `Sync already in progress (pid ${pid}). Remove ${lockPath} if that process is gone.`
        : `Sync already in progress. Remove ${lockPath} if no other sync is running.`,
    );
    this.name = 'SyncInProgressError';
  }
}

export class RemoteAccessError extends Error {
  constructor(
    message: string,
    public status?: number,
  ) {
    super(message);
    this.name = 'RemoteAccessError';
  }
}

export class ConversionError extends Error {
  constructor(
    public inputPath: string,
    detail: string,
  ) {
    super(`Conversion of ${inputPath} failed: ${detail}`);
    this.name = 'ConversionError';
  }
}

export class TransferError extends Error {
  constructor(
    public direction: SyncDirection,
    public documentName: string,
    detail: string,
    public status?: number,
  ) {
    super(`${direction === 'push' ? 'Upload' : 'Download'} of ${documentName} failed: ${detail}`);
    this.name = 'TransferError';
  }
}

export class PersistenceError extends Error {
  constructor(
    public configPath: string,
    detail: string,
  ) {
    super(`Could not save sync config to ${configPath}: ${detail}`);
    this.name = 'PersistenceError';
  }
}

export class TimeoutError extends Error {
  constructor(
    public label: string,
    public timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Errors that end the whole run instead of a single document.
 */
export function isFatalSyncError(err: unknown): boolean {
  return err instanceof RemoteAccessError
    || err instanceof PersistenceError
    || err instanceof SyncInProgressError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
