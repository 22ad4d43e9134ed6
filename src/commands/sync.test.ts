import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { Command } from 'commander';
import { spyOutput, createTempDir, writeFileAt } from '../__tests__/setup.js';
import { FakeConverter, MemoryRemoteStore } from '../__tests__/mocks/remote.js';
import type { SyncContext } from '../sync/runner.js';

// Mock ora
vi.mock('ora', () => ({
  default: vi.fn(() => ({
    start: vi.fn().mockReturnThis(),
    stop: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    text: '',
  })),
}));

const mocks = vi.hoisted(() => {
  const state: { context?: SyncContext } = {};
  return { state, findOrCreateFolder: vi.fn() };
});

vi.mock('../context.js', () => ({
  createSyncContext: vi.fn(() => {
    if (!mocks.state.context) throw new Error('no sync context');
    return mocks.state.context;
  }),
  createDriveClient: vi.fn(() => ({ findOrCreateFolder: mocks.findOrCreateFolder })),
}));

vi.mock('../config.js', () => ({
  loadConfig: vi.fn(() => ({ pandocPath: 'pandoc', timeoutMs: 0, driveApiUrl: 'http://drive.test' })),
}));

vi.mock('../sync/git.js', () => ({
  initGitRepo: vi.fn(async () => ({ status: 'initialized' })),
}));

import { registerSyncCommands } from './sync.js';
import { initGitRepo } from '../sync/git.js';
import { loadSyncConfig, createSyncConfig } from '../sync/config.js';

const NOW = new Date('2030-01-01T00:00:00.000Z');
const EARLIER = new Date('2029-01-01T00:00:00.000Z');

function createProgram(): Command {
  const program = new Command();
  program.exitOverride();
  registerSyncCommands(program);
  return program;
}

async function run(...args: string[]): Promise<void> {
  await createProgram().parseAsync(['node', 'mdsync', ...args, '--no-color']);
}

describe('sync commands', () => {
  let outputSpy: ReturnType<typeof spyOutput>;
  let local: ReturnType<typeof createTempDir>;
  let remote: ReturnType<typeof createTempDir>;
  let store: MemoryRemoteStore;
  let converter: FakeConverter;

  beforeEach(() => {
    vi.clearAllMocks();
    process.exitCode = undefined;
    outputSpy = spyOutput();
    local = createTempDir();
    remote = createTempDir();
    store = new MemoryRemoteStore(() => NOW);
    converter = new FakeConverter();
    mocks.state.context = {
      converter,
      createStore: () => store,
      timeoutMs: 0,
      clock: () => NOW,
    };
  });

  afterEach(() => {
    outputSpy.restore();
    local.cleanup();
    remote.cleanup();
    process.exitCode = undefined;
  });

  function stderr(): string {
    return outputSpy.stderr.join('');
  }

  describe('init', () => {
    it('should create the sync config for a mounted folder', async () => {
      await run('init', local.dir, remote.dir);

      expect(loadSyncConfig(local.dir)).toEqual({
        version: 1,
        localPath: local.dir,
        remote: { type: 'filesystem', path: remote.dir },
        lastSyncAt: null,
        ignore: [],
        files: {},
      });
      expect(outputSpy.stdout).toContain(`Remote:    ${remote.dir}\n`);
      expect(process.exitCode).toBeUndefined();
    });

    it('should store ignore patterns', async () => {
      await run('init', local.dir, remote.dir, '--ignore', 'draft-*.md', 'private.md');
      expect(loadSyncConfig(local.dir).ignore).toEqual(['draft-*.md', 'private.md']);
    });

    it('should refuse to overwrite an existing config without --force', async () => {
      await run('init', local.dir, remote.dir);
      await run('init', local.dir, remote.dir);

      expect(stderr()).toContain('already exists. Use --force to overwrite.');
      expect(process.exitCode).toBe(1);
    });

    it('should overwrite with --force', async () => {
      await run('init', local.dir, remote.dir);
      await run('init', local.dir, remote.dir, '--force', '--ignore', 'x.md');

      expect(loadSyncConfig(local.dir).ignore).toEqual(['x.md']);
      expect(process.exitCode).toBeUndefined();
    });

    it('should reject a remote folder that is not mounted', async () => {
      const missing = path.join(remote.dir, 'missing');
      await run('init', local.dir, missing);

      expect(stderr()).toContain(`${missing} is not a valid directory. Make sure the remote folder is mounted`);
      expect(process.exitCode).toBe(1);
      expect(fs.existsSync(path.join(local.dir, '.mdsync.json'))).toBe(false);
    });

    it('should resolve a Drive folder by name', async () => {
      mocks.findOrCreateFolder.mockResolvedValue({ id: 'folder-9', name: 'Team Notes', created: true });

      await run('init', local.dir, 'Team Notes', '--backend', 'drive');

      expect(mocks.findOrCreateFolder).toHaveBeenCalledWith('Team Notes');
      expect(loadSyncConfig(local.dir).remote).toEqual({ type: 'drive', folderId: 'folder-9', folderName: 'Team Notes' });
      expect(stderr()).toContain('Created Drive folder: Team Notes\n');
    });

    it('should only preview with --dry-run', async () => {
      await run('init', local.dir, remote.dir, '--init-git', '--dry-run');

      expect(fs.existsSync(path.join(local.dir, '.mdsync.json'))).toBe(false);
      expect(initGitRepo).not.toHaveBeenCalled();
      expect(stderr()).toContain('Dry run, nothing will be written:\n');
      expect(outputSpy.stdout).toEqual([
        `LocalPath: ${local.dir}\n`,
        `Remote:    ${remote.dir}\n`,
        `Config:    ${path.join(local.dir, '.mdsync.json')}\n`,
        'Ignore:    none\n',
        'InitGit:   true\n',
      ]);
      expect(process.exitCode).toBeUndefined();
    });

    it('should not look up the Drive folder in a dry run', async () => {
      await run('init', local.dir, 'Team Notes', '--backend', 'drive', '--dry-run');

      expect(mocks.findOrCreateFolder).not.toHaveBeenCalled();
      expect(outputSpy.stdout).toContain('Remote:    Google Drive folder "Team Notes"\n');
      expect(fs.existsSync(path.join(local.dir, '.mdsync.json'))).toBe(false);
    });

    it('should still validate the remote folder in a dry run', async () => {
      const missing = path.join(remote.dir, 'missing');
      await run('init', local.dir, missing, '--dry-run');

      expect(stderr()).toContain(`${missing} is not a valid directory`);
      expect(process.exitCode).toBe(1);
    });

    it('should initialize Git when asked', async () => {
      await run('init', local.dir, remote.dir, '--init-git');
      expect(initGitRepo).toHaveBeenCalledWith(local.dir);
      expect(stderr()).toContain(`Initialized Git repository in ${local.dir}\n`);
    });
  });

  describe('update', () => {
    beforeEach(() => {
      createSyncConfig({ localPath: local.dir, remote: { type: 'filesystem', path: remote.dir } });
    });

    it('should push and pull and print a summary', async () => {
      writeFileAt(path.join(local.dir, 'a.md'), '# A', EARLIER);
      store.put('b.docx', 'docx:# B', EARLIER);

      await run('update', '--path', local.dir);

      expect(store.documents.get('a.docx')?.content).toBe('docx:# A');
      expect(fs.readFileSync(path.join(local.dir, 'b.md'), 'utf-8')).toBe('# B');
      expect(outputSpy.stdout).toEqual([
        'Pushed:   1\n',
        'Pulled:   1\n',
        'Failed:   0\n',
        'SyncedAt: 2030-01-01T00:00:00.000Z\n',
      ]);
      expect(loadSyncConfig(local.dir).lastSyncAt).toBe('2030-01-01T00:00:00.000Z');
      expect(process.exitCode).toBeUndefined();
    });

    it('should finish with warnings when a document fails', async () => {
      writeFileAt(path.join(local.dir, 'a.md'), '# A', EARLIER);
      converter.failOn.add('a.md');

      await run('update', '--path', local.dir);

      expect(stderr()).toContain('Completed with 1 warning(s):\n');
      expect(stderr()).toContain(`  a.md (push, convert): Conversion of ${path.join(local.dir, 'a.md')} failed: boom\n`);
      expect(process.exitCode).toBeUndefined();
    });

    it('should only preview changes with --dry-run', async () => {
      writeFileAt(path.join(local.dir, 'a.md'), '# A', EARLIER);

      await run('update', '--path', local.dir, '--dry-run');

      expect(outputSpy.stderr).toContain('  ↑ a.md -> a.docx (New local file)\n\n1 to push, 0 to pull\n');
      expect(store.documents.size).toBe(0);
      expect(converter.calls).toEqual([]);
    });

    it('should print the pending names as JSON in a dry run', async () => {
      writeFileAt(path.join(local.dir, 'a.md'), '# A', EARLIER);
      store.put('b.docx', 'docx:# B', EARLIER);

      await run('update', '--path', local.dir, '--dry-run', '-o', 'json');

      expect(JSON.parse(outputSpy.stdout.join(''))).toEqual({
        dryRun: true,
        pendingPush: ['a.md'],
        pendingPull: ['b.md'],
      });
      expect(fs.existsSync(path.join(local.dir, 'b.md'))).toBe(false);
    });

    it('should fail on an uninitialized directory', async () => {
      const other = createTempDir();
      try {
        await run('update', '--path', other.dir);
        expect(stderr()).toContain('not found. Run `mdsync init` first.');
        expect(process.exitCode).toBe(1);
      } finally {
        other.cleanup();
      }
    });
  });

  describe('status', () => {
    beforeEach(() => {
      createSyncConfig({ localPath: local.dir, remote: { type: 'filesystem', path: remote.dir } });
      writeFileAt(path.join(local.dir, 'a.md'), '# A', EARLIER);
    });

    it('should show the pair and pending changes', async () => {
      await run('status', '--path', local.dir);

      expect(outputSpy.stdout).toEqual([
        `LocalPath: ${local.dir}\n`,
        'Remote:    memory remote\n',
        'LastSync:  never\n',
        'Tracked:   0\n',
      ]);
      expect(outputSpy.stderr).toContain('No documents synced yet.\n');
      expect(outputSpy.stderr).toContain('  ↑ a.md -> a.docx (New local file)\n\n1 to push, 0 to pull\n');
    });

    it('should not accept --dry-run', async () => {
      await expect(run('status', '--path', local.dir, '--dry-run')).rejects.toThrow("unknown option '--dry-run'");
    });

    it('should print JSON with -o json', async () => {
      await run('status', '--path', local.dir, '-o', 'json');

      expect(JSON.parse(outputSpy.stdout.join(''))).toEqual({
        localPath: local.dir,
        remote: 'memory remote',
        lastSyncAt: null,
        tracked: 0,
        pendingPush: ['a.md'],
        pendingPull: [],
      });
    });
  });
});
