/**
 * Core sync engine. Reconciles the local directory with the remote
 * collection: a push pass (Markdown -> .docx) followed by a pull pass
 * (.docx -> Markdown), last write wins.
 */
import fs from 'node:fs';
import path from 'node:path';
import type { SyncConfig, SyncDirection } from './types.js';
import type { RemoteStore } from './remote-store.js';
import type { Converter } from './converter.js';
import { buildRecord } from './state.js';
import { scanLocalDocuments, listRemoteDocuments } from './inventory.js';
import { computePullPlan, computePushPlan, type PullEntry, type PushEntry } from './plan.js';
import { RemoteAccessError, TimeoutError, errorMessage, isFatalSyncError } from './errors.js';
import { withTimeout } from './timeout.js';

export type FailureStage = 'convert' | 'transfer';

export type SyncEvent =
  | { type: 'phase'; direction: SyncDirection; total: number }
  | { type: 'start'; direction: SyncDirection; name: string; current: number; total: number; reason: string }
  | { type: 'done'; direction: SyncDirection; name: string; remoteLocation: string }
  | { type: 'failed'; direction: SyncDirection; name: string; stage: FailureStage; error: string };

export type SyncEventListener = (event: SyncEvent) => void;

export interface SyncFailure {
  name: string;
  direction: SyncDirection;
  stage: FailureStage;
  error: string;
}

export interface SyncResult {
  pushed: string[];
  pulled: string[];
  failures: SyncFailure[];
}

export interface ReconcileOptions {
  localPath: string;
  store: RemoteStore;
  converter: Converter;
  /** Directory for conversion intermediates, owned by the caller */
  scratchDir: string;
  ignorePatterns: string[];
  /** Bound for every converter run and remote call */
  timeoutMs: number;
  clock: () => Date;
  onEvent?: SyncEventListener;
  /** Checked between documents; an aborted run stops before the next one */
  signal?: AbortSignal;
}

/**
 * Run both passes against `config`, updating `config.files` in place as each
 * document completes. Per-document failures are collected in the result;
 * fatal errors (credentials, unreachable remote) propagate.
 */
export async function reconcile(config: SyncConfig, opts: ReconcileOptions): Promise<SyncResult> {
  const result: SyncResult = { pushed: [], pulled: [], failures: [] };

  // Listing first surfaces connectivity problems before anything is written.
  const initialRemote = await listRemote(opts);
  const localFiles = scanLocalDocuments(opts.localPath, opts.ignorePatterns);

  const pushes = computePushPlan(localFiles, config);
  await executePushes(config, pushes, opts, result);

  const remoteFiles = result.pushed.length > 0 ? await listRemote(opts) : initialRemote;
  // A failed push keeps local edits that the pull pass must not overwrite.
  const pulls = computePullPlan(remoteFiles, config, new Set(pushes.map(p => p.name)));
  await executePulls(config, pulls, opts, result);

  return result;
}

async function listRemote(opts: ReconcileOptions) {
  try {
    return await withTimeout(`Listing ${opts.store.description}`, opts.timeoutMs, signal =>
      listRemoteDocuments(opts.store, opts.ignorePatterns, signal),
    );
  } catch (err) {
    if (err instanceof TimeoutError) {
      throw new RemoteAccessError(err.message);
    }
    throw err;
  }
}

export async function executePushes(
  config: SyncConfig,
  entries: PushEntry[],
  opts: ReconcileOptions,
  result: SyncResult,
): Promise<void> {
  opts.onEvent?.({ type: 'phase', direction: 'push', total: entries.length });

  for (const [index, entry] of entries.entries()) {
    opts.signal?.throwIfAborted();
    opts.onEvent?.({
      type: 'start',
      direction: 'push',
      name: entry.name,
      current: index + 1,
      total: entries.length,
      reason: entry.reason,
    });

    const scratchFile = path.join(opts.scratchDir, entry.remoteName);
    let stage: FailureStage = 'convert';
    try {
      await withTimeout(`Converting ${entry.name}`, opts.timeoutMs, signal =>
        opts.converter.convert(entry.local.path, scratchFile, 'to-remote', signal),
      );

      stage = 'transfer';
      const stored = await withTimeout(`Uploading ${entry.remoteName}`, opts.timeoutMs, signal =>
        opts.store.store(entry.remoteName, scratchFile, signal),
      );

      // Never stamp earlier than the remote's own mtime, or clock skew would
      // make the next run pull the document straight back.
      const now = opts.clock();
      const completedAt = stored.modifiedAt && stored.modifiedAt > now ? stored.modifiedAt : now;
      config.files[entry.name] = buildRecord(stored.location, completedAt, entry.local.modifiedAt);
      result.pushed.push(entry.name);
      opts.onEvent?.({ type: 'done', direction: 'push', name: entry.name, remoteLocation: stored.location });
    } catch (err) {
      if (isFatalSyncError(err)) throw err;
      recordFailure(result, opts, { name: entry.name, direction: 'push', stage, error: errorMessage(err) });
    } finally {
      await fs.promises.rm(scratchFile, { force: true });
    }
  }
}

export async function executePulls(
  config: SyncConfig,
  entries: PullEntry[],
  opts: ReconcileOptions,
  result: SyncResult,
): Promise<void> {
  opts.onEvent?.({ type: 'phase', direction: 'pull', total: entries.length });

  for (const [index, entry] of entries.entries()) {
    opts.signal?.throwIfAborted();
    opts.onEvent?.({
      type: 'start',
      direction: 'pull',
      name: entry.name,
      current: index + 1,
      total: entries.length,
      reason: entry.reason,
    });

    const scratchFile = path.join(opts.scratchDir, entry.remote.name);
    const target = path.join(opts.localPath, entry.name);
    let stage: FailureStage = 'transfer';
    try {
      await withTimeout(`Downloading ${entry.remote.name}`, opts.timeoutMs, signal =>
        opts.store.fetch(entry.remote.location, scratchFile, signal),
      );

      stage = 'convert';
      await withTimeout(`Converting ${entry.remote.name}`, opts.timeoutMs, signal =>
        opts.converter.convert(scratchFile, target, 'to-local', signal),
      );

      const written = await fs.promises.stat(target);
      config.files[entry.name] = buildRecord(entry.remote.location, opts.clock(), written.mtime);
      result.pulled.push(entry.name);
      opts.onEvent?.({ type: 'done', direction: 'pull', name: entry.name, remoteLocation: entry.remote.location });
    } catch (err) {
      if (isFatalSyncError(err)) throw err;
      recordFailure(result, opts, { name: entry.name, direction: 'pull', stage, error: errorMessage(err) });
    } finally {
      await fs.promises.rm(scratchFile, { force: true });
    }
  }
}

function recordFailure(result: SyncResult, opts: ReconcileOptions, failure: SyncFailure): void {
  result.failures.push(failure);
  opts.onEvent?.({ type: 'failed', ...failure });
}
