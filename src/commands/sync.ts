import path from 'node:path';
import { Option, type Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { createDriveClient, createSyncContext } from '../context.js';
import { addGlobalFlags, resolveFlags } from '../utils/flags.js';
import { createOutput, handleError } from '../utils/output.js';
import { isDirectory } from '../utils/fs.js';
import { createSyncConfig, hasSyncConfig, configFilePath } from '../sync/config.js';
import { planSync, runSync, validatePaths } from '../sync/runner.js';
import { initGitRepo } from '../sync/git.js';
import { SetupError } from '../sync/errors.js';
import type { RemoteBackend, RemoteDescriptor } from '../sync/types.js';

export function describeRemote(remote: RemoteDescriptor): string {
  return remote.type === 'filesystem'
    ? remote.path
    : `Google Drive folder "${remote.folderName}" (${remote.folderId})`;
}

export function registerSyncCommands(program: Command): void {
  // init <localPath> <remote>
  addGlobalFlags(program.command('init')
    .description('Start tracking a local directory against a remote collection')
    .argument('<localPath>', 'Local directory holding the Markdown documents')
    .argument('<remote>', 'Mounted folder path, or Drive folder name with --backend drive')
    .addOption(new Option('--backend <type>', 'Remote backend').choices(['filesystem', 'drive']).default('filesystem'))
    .option('--force', 'Overwrite an existing sync config')
    .option('--init-git', 'Initialize a Git repository in the local directory')
    .option('--ignore <patterns...>', 'Glob patterns to ignore'))
    .action(async (localPath: string, remote: string, _opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      out.startSpinner('Initializing...');
      try {
        const absPath = path.resolve(localPath);
        const force = _opts.force === true;
        const backend: RemoteBackend = _opts.backend === 'drive' ? 'drive' : 'filesystem';
        const ignore = Array.isArray(_opts.ignore) ? _opts.ignore.map(String) : undefined;

        if (!isDirectory(absPath)) {
          throw new SetupError(`${absPath} is not a valid directory`);
        }
        if (hasSyncConfig(absPath) && !force) {
          throw new SetupError(`${configFilePath(absPath)} already exists. Use --force to overwrite.`);
        }

        // The Drive folder is not looked up in a dry run: finding it may create it.
        if (flags.dryRun) {
          const remotePreview = backend === 'drive' ? `Google Drive folder "${remote}"` : path.resolve(remote);
          if (backend === 'filesystem') {
            validatePaths(absPath, { type: 'filesystem', path: remotePreview });
          }
          out.stopSpinner();
          out.status(chalk.yellow('Dry run, nothing will be written:'));
          out.record({
            localPath: absPath,
            remote: remotePreview,
            config: configFilePath(absPath),
            ignore: ignore ?? [],
            initGit: _opts.initGit === true,
          });
          return;
        }

        let descriptor: RemoteDescriptor;
        if (backend === 'drive') {
          const folder = await createDriveClient(loadConfig()).findOrCreateFolder(remote);
          if (folder.created) {
            out.status(`Created Drive folder: ${folder.name}`);
          }
          descriptor = { type: 'drive', folderId: folder.id, folderName: folder.name };
        } else {
          descriptor = { type: 'filesystem', path: path.resolve(remote) };
          validatePaths(absPath, descriptor);
        }

        const config = createSyncConfig({ localPath: absPath, remote: descriptor, ignore }, force);
        out.success(`Initialized mdsync in ${config.localPath}`, {
          localPath: config.localPath,
          remote: describeRemote(config.remote),
          ignore: config.ignore,
        });

        if (_opts.initGit === true) {
          const git = await initGitRepo(absPath);
          if (git.status === 'initialized') {
            out.status(`Initialized Git repository in ${absPath}`);
          } else if (git.status === 'failed') {
            out.warn(`Could not initialize Git repository: ${git.error}`);
          } else {
            out.debug('Git repository already present');
          }
        }

        if (flags.output === 'text' && !flags.quiet) {
          out.status('');
          out.status(`Run ${chalk.cyan(`mdsync update --path ${absPath}`)} to perform the first sync.`);
        }
      } catch (err) {
        handleError(out, err, 'Failed to initialize');
      }
    });

  // update [--path <dir>]
  addGlobalFlags(program.command('update')
    .description('Push local changes, then pull remote changes')
    .option('--path <dir>', 'Tracked directory (default: current directory)'))
    .action(async (_opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      const localPath = typeof _opts.path === 'string' ? _opts.path : process.cwd();
      try {
        const context = createSyncContext();

        if (flags.dryRun) {
          out.startSpinner('Computing changes...');
          const { plan } = await planSync(context, localPath);
          out.stopSpinner();
          out.status(chalk.yellow('Dry run, nothing will be converted or transferred:'));
          out.syncPlan(plan, { dryRun: true });
          return;
        }

        const controller = new AbortController();
        const onInterrupt = () => {
          out.warn('Interrupted, stopping after the current document...');
          controller.abort();
        };
        process.once('SIGINT', onInterrupt);

        try {
          const report = await runSync(context, {
            localPath,
            onEvent: event => out.syncEvent(event),
            signal: controller.signal,
          });
          out.debug(`Remote: ${report.remoteDescription}`);
          out.syncSummary(report.result, report.config.lastSyncAt);
        } finally {
          process.removeListener('SIGINT', onInterrupt);
        }
      } catch (err) {
        handleError(out, err, 'Sync failed');
      }
    });

  // status [--path <dir>]
  addGlobalFlags(program.command('status')
    .description('Show tracked documents and pending changes')
    .option('--path <dir>', 'Tracked directory (default: current directory)'), { dryRun: false })
    .action(async (_opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      const localPath = typeof _opts.path === 'string' ? _opts.path : process.cwd();
      out.startSpinner('Checking status...');
      try {
        const { config, plan, remoteDescription } = await planSync(createSyncContext(), localPath);
        out.stopSpinner();

        if (flags.output === 'json') {
          out.syncPlan(plan, {
            localPath: config.localPath,
            remote: remoteDescription,
            lastSyncAt: config.lastSyncAt,
            tracked: Object.keys(config.files).length,
          });
          return;
        }

        out.record({
          localPath: config.localPath,
          remote: remoteDescription,
          lastSync: config.lastSyncAt ?? 'never',
          tracked: Object.keys(config.files).length,
        });
        out.status('');
        out.list(
          Object.entries(config.files).map(([name, record]) => ({
            name,
            remoteLocation: record.remoteLocation,
            lastUploadAt: record.lastUploadAt ?? null,
          })),
          {
            emptyMessage: 'No documents synced yet.',
            columns: [
              { key: 'name', header: 'Document' },
              { key: 'remoteLocation', header: 'Remote' },
              { key: 'lastUploadAt', header: 'Last Sync' },
            ],
            textFn: (r) => `  ${chalk.cyan(String(r.name))}  ${chalk.dim(r.lastUploadAt ? String(r.lastUploadAt) : 'never')}`,
          },
        );
        out.status('');
        out.syncPlan(plan);
      } catch (err) {
        handleError(out, err, 'Failed to get status');
      }
    });
}
