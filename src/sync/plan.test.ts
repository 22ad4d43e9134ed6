import { describe, it, expect } from 'vitest';
import { computePullPlan, computePushPlan, computeSyncPlan, formatPlan } from './plan.js';
import type { LocalFileState, RemoteFileState, SyncConfig } from './types.js';

const LAST_SYNC = '2025-03-01T10:00:00.000Z';
const BEFORE = new Date('2025-02-01T00:00:00Z');
const AFTER = new Date('2025-04-01T00:00:00Z');

function localDoc(name: string, modifiedAt: Date): LocalFileState {
  return { name, path: `/notes/${name}`, modifiedAt };
}

function remoteDoc(name: string, modifiedAt: Date): RemoteFileState {
  return { name, location: `id-${name}`, modifiedAt };
}

function makeConfig(files: SyncConfig['files'] = {}): SyncConfig {
  return {
    version: 1,
    localPath: '/notes',
    remote: { type: 'filesystem', path: '/mnt/share' },
    lastSyncAt: LAST_SYNC,
    ignore: [],
    files,
  };
}

describe('sync plan', () => {
  const synced = (name: string) => ({ [name]: { remoteLocation: `id-${name}`, lastUploadAt: LAST_SYNC } });

  describe('computePushPlan', () => {
    it('should give a reason for each push', () => {
      const config = makeConfig({
        ...synced('edited.md'),
        'pending.md': { remoteLocation: 'id-pending' },
      });
      const pushes = computePushPlan([
        localDoc('edited.md', AFTER),
        localDoc('new.md', BEFORE),
        localDoc('pending.md', BEFORE),
      ], config);

      expect(pushes.map(p => [p.name, p.remoteName, p.reason])).toEqual([
        ['edited.md', 'edited.docx', 'Local file updated'],
        ['new.md', 'new.docx', 'New local file'],
        ['pending.md', 'pending.docx', 'Never synced'],
      ]);
    });

    it('should skip documents unchanged since the last sync', () => {
      expect(computePushPlan([localDoc('a.md', BEFORE)], makeConfig(synced('a.md')))).toEqual([]);
    });
  });

  describe('computePullPlan', () => {
    it('should pull new and updated remote documents', () => {
      const pulls = computePullPlan([
        remoteDoc('a.docx', AFTER),
        remoteDoc('b.docx', BEFORE),
        remoteDoc('c.docx', BEFORE),
      ], makeConfig({ ...synced('a.md'), ...synced('c.md') }));

      expect(pulls.map(p => [p.name, p.reason])).toEqual([
        ['a.md', 'Remote file updated'],
        ['b.md', 'New remote file'],
      ]);
    });

    it('should exclude names pushed in the same run', () => {
      const pulls = computePullPlan([remoteDoc('a.docx', AFTER)], makeConfig(synced('a.md')), new Set(['a.md']));
      expect(pulls).toEqual([]);
    });
  });

  describe('computeSyncPlan', () => {
    it('should prefer the push when both sides changed', () => {
      const plan = computeSyncPlan(
        [localDoc('a.md', AFTER), localDoc('b.md', BEFORE)],
        [remoteDoc('a.docx', AFTER), remoteDoc('b.docx', BEFORE), remoteDoc('c.docx', AFTER)],
        makeConfig({ ...synced('a.md'), ...synced('b.md') }),
      );

      expect(plan.pushes.map(p => p.name)).toEqual(['a.md']);
      expect(plan.pulls.map(p => p.name)).toEqual(['c.md']);
      expect(plan.upToDate).toEqual(['b.md']);
    });
  });

  describe('formatPlan', () => {
    it('should report an up to date pair', () => {
      expect(formatPlan({ pushes: [], pulls: [], upToDate: ['a.md'] })).toBe('Everything is up to date.');
    });

    it('should list pushes then pulls with a summary line', () => {
      const plan = computeSyncPlan(
        [localDoc('a.md', AFTER)],
        [remoteDoc('c.docx', AFTER)],
        makeConfig(),
      );
      expect(formatPlan(plan)).toBe([
        '  ↑ a.md -> a.docx (New local file)',
        '  ↓ c.docx -> c.md (New remote file)',
        '',
        '1 to push, 1 to pull',
      ].join('\n'));
    });
  });
});
