import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import { acquireSyncLock, isProcessRunning, lockFilePath, readLockPid } from './lock.js';
import { SyncInProgressError } from './errors.js';
import { createTempDir } from '../__tests__/setup.js';

describe('sync lock', () => {
  let tmp: ReturnType<typeof createTempDir>;

  beforeEach(() => {
    tmp = createTempDir();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    tmp.cleanup();
  });

  it('should record the current pid and remove the file on release', () => {
    const lock = acquireSyncLock(tmp.dir);
    expect(readLockPid(lock.path)).toBe(process.pid);

    lock.release();
    expect(fs.existsSync(lockFilePath(tmp.dir))).toBe(false);
    lock.release();
  });

  it('should refuse a second lock while the holder is running', () => {
    const lock = acquireSyncLock(tmp.dir);
    expect(() => acquireSyncLock(tmp.dir)).toThrow(SyncInProgressError);
    expect(() => acquireSyncLock(tmp.dir)).toThrow(`Sync already in progress (pid ${process.pid})`);
    lock.release();
  });

  it('should replace a lock left by a dead process', () => {
    fs.writeFileSync(lockFilePath(tmp.dir), '999999\n2025-01-01T00:00:00.000Z\n');
    vi.spyOn(process, 'kill').mockImplementation(() => {
      throw Object.assign(new Error('kill ESRCH'), { code: 'ESRCH' });
    });

    const lock = acquireSyncLock(tmp.dir);
    expect(readLockPid(lock.path)).toBe(process.pid);
    lock.release();
  });

  it('should refuse an unreadable lock', () => {
    fs.writeFileSync(lockFilePath(tmp.dir), 'garbage');
    expect(() => acquireSyncLock(tmp.dir)).toThrow('Sync already in progress. Remove');
  });

  describe('isProcessRunning', () => {
    it('should detect the current process', () => {
      expect(isProcessRunning(process.pid)).toBe(true);
    });

    it('should treat EPERM as running', () => {
      vi.spyOn(process, 'kill').mockImplementation(() => {
        throw Object.assign(new Error('kill EPERM'), { code: 'EPERM' });
      });
      expect(isProcessRunning(1)).toBe(true);
    });
  });
});
