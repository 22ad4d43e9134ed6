/**
 * Action planning for sync runs.
 * Compares local and remote inventories against the persisted records to
 * determine which documents must be pushed or pulled.
 */
import type { LocalFileState, RemoteFileState, SyncConfig, SyncDirection } from './types.js';
import { getRecord, localNameFor, needsPull, needsPush, remoteNameFor } from './state.js';

export interface PushEntry {
  direction: 'push';
  /** Local document name */
  name: string;
  /** Name it will have in the remote collection */
  remoteName: string;
  local: LocalFileState;
  /** Human-readable reason for this change */
  reason: string;
}

export interface PullEntry {
  direction: 'pull';
  /** Local document name that will be written */
  name: string;
  remote: RemoteFileState;
  reason: string;
}

export interface SyncPlan {
  pushes: PushEntry[];
  pulls: PullEntry[];
  /** Documents known on either side that need nothing */
  upToDate: string[];
}

function staleReason(direction: SyncDirection, hasRecord: boolean, hasTimestamp: boolean): string {
  if (!hasRecord) return direction === 'push' ? 'New local file' : 'New remote file';
  if (!hasTimestamp) return 'Never synced';
  return direction === 'push' ? 'Local file updated' : 'Remote file updated';
}

export function computePushPlan(localFiles: LocalFileState[], config: SyncConfig): PushEntry[] {
  const pushes: PushEntry[] = [];
  for (const local of localFiles) {
    const record = getRecord(config, local.name);
    if (!needsPush(local, record)) continue;
    pushes.push({
      direction: 'push',
      name: local.name,
      remoteName: remoteNameFor(local.name),
      local,
      reason: staleReason('push', record !== undefined, record?.lastUploadAt !== undefined),
    });
  }
  return pushes;
}

/**
 * Pull candidates. Names in `pushedNames` are excluded: a document pushed in
 * the same run gets a fresh record before the pull pass looks at it.
 */
export function computePullPlan(
  remoteFiles: RemoteFileState[],
  config: SyncConfig,
  pushedNames: ReadonlySet<string> = new Set(),
): PullEntry[] {
  const pulls: PullEntry[] = [];
  for (const remote of remoteFiles) {
    const name = localNameFor(remote.name);
    if (pushedNames.has(name)) continue;
    const record = getRecord(config, name);
    if (!needsPull(remote, record)) continue;
    pulls.push({
      direction: 'pull',
      name,
      remote,
      reason: staleReason('pull', record !== undefined, record?.lastUploadAt !== undefined),
    });
  }
  return pulls;
}

/**
 * Full plan for a run as it would execute: pushes first, then pulls for
 * everything not being pushed.
 */
export function computeSyncPlan(
  localFiles: LocalFileState[],
  remoteFiles: RemoteFileState[],
  config: SyncConfig,
): SyncPlan {
  const pushes = computePushPlan(localFiles, config);
  const pulls = computePullPlan(remoteFiles, config, new Set(pushes.map(p => p.name)));

  const pending = new Set<string>([...pushes, ...pulls].map(e => e.name));
  const known = new Set<string>([
    ...localFiles.map(l => l.name),
    ...remoteFiles.map(r => localNameFor(r.name)),
  ]);
  const upToDate = [...known].filter(name => !pending.has(name)).sort();

  return { pushes, pulls, upToDate };
}

/**
 * Format a plan for human-readable display.
 */
export function formatPlan(plan: SyncPlan): string {
  const total = plan.pushes.length + plan.pulls.length;
  if (total === 0) {
    return 'Everything is up to date.';
  }

  const lines: string[] = [];
  for (const entry of plan.pushes) {
    lines.push(`  ↑ ${entry.name} -> ${entry.remoteName} (${entry.reason})`);
  }
  for (const entry of plan.pulls) {
    lines.push(`  ↓ ${entry.remote.name} -> ${entry.name} (${entry.reason})`);
  }
  lines.push('');
  lines.push(`${plan.pushes.length} to push, ${plan.pulls.length} to pull`);
  return lines.join('\n');
}
