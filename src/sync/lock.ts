/**
 * Advisory run lock.
 * A .mdsync.lock file next to the config holds the pid of the running sync so
 * that a second run against the same directory fails fast.
 */
import fs from 'node:fs';
import path from 'node:path';
import { SyncInProgressError } from './errors.js';

export const LOCK_FILENAME = '.mdsync.lock';

export interface SyncLock {
  path: string;
  release(): void;
}

export function lockFilePath(localPath: string): string {
  return path.join(localPath, LOCK_FILENAME);
}

/**
 * Read the pid recorded in a lock file, or null if it is missing or unreadable.
 */
export function readLockPid(lockPath: string): number | null {
  let content: string;
  try {
    content = fs.readFileSync(lockPath, 'utf-8');
  } catch {
    return null;
  }
  const pid = parseInt(content.split('\n')[0] ?? '', 10);
  return isNaN(pid) ? null : pid;
}

/**
 * Check if a process with the given PID is running.
 */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0); // Signal 0 doesn't kill, just checks
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
}

function tryCreate(lockPath: string): boolean {
  try {
    fs.writeFileSync(lockPath, `${process.pid}\n${new Date().toISOString()}\n`, { flag: 'wx' });
    return true;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EEXIST') return false;
    throw err;
  }
}

/**
 * Acquire the lock for a tracked directory. A lock left behind by a process
 * that no longer runs is replaced.
 */
export function acquireSyncLock(localPath: string): SyncLock {
  const lockPath = lockFilePath(localPath);

  if (!tryCreate(lockPath)) {
    const pid = readLockPid(lockPath);
    if (pid === null || isProcessRunning(pid)) {
      throw new SyncInProgressError(lockPath, pid);
    }
    fs.rmSync(lockPath, { force: true });
    if (!tryCreate(lockPath)) {
      throw new SyncInProgressError(lockPath, readLockPid(lockPath));
    }
  }

  let released = false;
  return {
    path: lockPath,
    release() {
      if (released) return;
      released = true;
      fs.rmSync(lockPath, { force: true });
    },
  };
}
