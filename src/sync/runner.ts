/**
 * Run orchestration: load the config, take the lock, provide a scratch
 * directory, reconcile, and persist the updated config.
 */
import path from 'node:path';
import type { RemoteDescriptor, SyncConfig } from './types.js';
import type { RemoteStore } from './remote-store.js';
import type { Converter } from './converter.js';
import { loadSyncConfig, saveSyncConfig } from './config.js';
import { resolveIgnorePatterns } from './ignore.js';
import { listRemoteDocuments, scanLocalDocuments } from './inventory.js';
import { computeSyncPlan, type SyncPlan } from './plan.js';
import { reconcile, type SyncEventListener, type SyncResult } from './engine.js';
import { acquireSyncLock } from './lock.js';
import { withScratchDir } from './workspace.js';
import { withTimeout } from './timeout.js';
import { formatTimestamp } from './timestamps.js';
import { SetupError } from './errors.js';
import { isDirectory } from '../utils/fs.js';

/**
 * Everything a run needs from the outside, built once by the CLI and passed
 * down explicitly.
 */
export interface SyncContext {
  converter: Converter;
  createStore(remote: RemoteDescriptor): RemoteStore;
  /** Bound for every converter run and remote call */
  timeoutMs: number;
  clock: () => Date;
}

export interface RunSyncOptions {
  /** Tracked directory; the config is read from here */
  localPath: string;
  onEvent?: SyncEventListener;
  signal?: AbortSignal;
}

export interface RunSyncReport {
  config: SyncConfig;
  result: SyncResult;
  remoteDescription: string;
}

export interface PlanReport {
  config: SyncConfig;
  plan: SyncPlan;
  remoteDescription: string;
}

/**
 * Check that both sides of a pair are usable directories. Drive folders are
 * checked when they are listed.
 */
export function validatePaths(localPath: string, remote: RemoteDescriptor): void {
  if (!isDirectory(localPath)) {
    throw new SetupError(`${localPath} is not a valid directory`);
  }
  if (remote.type === 'filesystem' && !isDirectory(remote.path)) {
    throw new SetupError(
      `${remote.path} is not a valid directory. Make sure the remote folder is mounted and the path exists.`,
    );
  }
}

function prepare(context: SyncContext, localPathInput: string) {
  const localPath = path.resolve(localPathInput);
  const config = loadSyncConfig(localPath);
  validatePaths(localPath, config.remote);
  return {
    localPath,
    config,
    store: context.createStore(config.remote),
    ignorePatterns: resolveIgnorePatterns(config.ignore, localPath),
  };
}

/**
 * Perform one sync run: push pass, then pull pass, then save.
 * The lock is held before the config is read. When the run stops early the
 * records of completed documents are still saved, without `lastSyncAt`.
 */
export async function runSync(context: SyncContext, options: RunSyncOptions): Promise<RunSyncReport> {
  const resolved = path.resolve(options.localPath);
  if (!isDirectory(resolved)) {
    throw new SetupError(`${resolved} is not a valid directory`);
  }

  const lock = acquireSyncLock(resolved);
  try {
    const { localPath, config, store, ignorePatterns } = prepare(context, resolved);
    config.localPath = localPath;

    let result: SyncResult;
    try {
      result = await withScratchDir(scratchDir => reconcile(config, {
        localPath,
        store,
        converter: context.converter,
        scratchDir,
        ignorePatterns,
        timeoutMs: context.timeoutMs,
        clock: context.clock,
        onEvent: options.onEvent,
        signal: options.signal,
      }));
    } catch (err) {
      // Completed documents keep their records even when the run fails.
      saveSyncConfig(config, localPath);
      throw err;
    }

    config.lastSyncAt = formatTimestamp(context.clock());
    saveSyncConfig(config, localPath);
    return { config, result, remoteDescription: store.description };
  } finally {
    lock.release();
  }
}

/**
 * Compute what a run would do without changing anything.
 */
export async function planSync(context: SyncContext, localPathInput: string): Promise<PlanReport> {
  const { localPath, config, store, ignorePatterns } = prepare(context, localPathInput);
  const remoteFiles = await withTimeout(`Listing ${store.description}`, context.timeoutMs, signal =>
    listRemoteDocuments(store, ignorePatterns, signal),
  );
  const localFiles = scanLocalDocuments(localPath, ignorePatterns);
  return {
    config,
    plan: computeSyncPlan(localFiles, remoteFiles, config),
    remoteDescription: store.description,
  };
}
