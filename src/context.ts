import type { CliConfig } from './config.js';
import { loadConfig } from './config.js';
import type { RemoteDescriptor } from './sync/types.js';
import type { RemoteStore } from './sync/remote-store.js';
import type { SyncContext } from './sync/runner.js';
import { PandocConverter } from './sync/converter.js';
import { FilesystemRemoteStore } from './sync/fs-store.js';
import { DriveClient, DriveRemoteStore } from './sync/drive-store.js';
import { RemoteAccessError } from './sync/errors.js';

/**
 * Return the Drive access token or fail with instructions to configure one.
 */
export function requireDriveToken(config: CliConfig): string {
  if (!config.driveToken) {
    throw new RemoteAccessError(
      'No Google Drive access token configured. Set MDSYNC_DRIVE_TOKEN or run `mdsync config set driveToken <token>`.',
    );
  }
  return config.driveToken;
}

export function createDriveClient(config: CliConfig): DriveClient {
  return new DriveClient(requireDriveToken(config), { apiUrl: config.driveApiUrl });
}

/**
 * Build the remote store for a descriptor from the sync config.
 */
export function createRemoteStore(remote: RemoteDescriptor, config: CliConfig): RemoteStore {
  switch (remote.type) {
    case 'filesystem':
      return new FilesystemRemoteStore(remote.path);
    case 'drive':
      return new DriveRemoteStore({
        accessToken: requireDriveToken(config),
        folderId: remote.folderId,
        folderName: remote.folderName,
        apiUrl: config.driveApiUrl,
      });
  }
}

/**
 * Create the run context from CLI configuration.
 */
export function createSyncContext(config: CliConfig = loadConfig()): SyncContext {
  return {
    converter: new PandocConverter({ command: config.pandocPath }),
    createStore: remote => createRemoteStore(remote, config),
    timeoutMs: config.timeoutMs,
    clock: () => new Date(),
  };
}
