/**
 * Sync configuration persistence.
 * Manages <localPath>/.mdsync.json, the config and per-document records of one
 * tracked directory pair.
 */
import fs from 'node:fs';
import path from 'node:path';
import type { SyncConfig, CreateSyncOptions } from './types.js';
import { syncConfigSchema, formatIssues } from './schema.js';
import { InvalidConfigError, NotInitializedError, PersistenceError, SetupError, errorMessage } from './errors.js';
import { atomicWriteFileSync } from '../utils/fs.js';

export const CONFIG_FILENAME = '.mdsync.json';

export function configFilePath(localPath: string): string {
  return path.join(localPath, CONFIG_FILENAME);
}

export function hasSyncConfig(localPath: string): boolean {
  return fs.existsSync(configFilePath(localPath));
}

/**
 * Read and validate the sync config of a tracked directory.
 */
export function loadSyncConfig(localPath: string): SyncConfig {
  const filePath = configFilePath(localPath);
  if (!fs.existsSync(filePath)) {
    throw new NotInitializedError(filePath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new InvalidConfigError(filePath, errorMessage(err));
  }

  const parsed = syncConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigError(filePath, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Write the sync config atomically (temp file + rename).
 * The previous file stays intact if the write fails.
 */
export function saveSyncConfig(config: SyncConfig, localPath: string = config.localPath): void {
  const filePath = configFilePath(localPath);
  try {
    atomicWriteFileSync(filePath, JSON.stringify(config, null, 2) + '\n');
  } catch (err) {
    throw new PersistenceError(filePath, errorMessage(err));
  }
}

/**
 * Create the initial config for a directory pair with an empty mapping.
 * Refuses to replace an existing config unless `force` is set.
 */
export function createSyncConfig(opts: CreateSyncOptions, force = false): SyncConfig {
  const filePath = configFilePath(opts.localPath);
  if (fs.existsSync(filePath) && !force) {
    throw new SetupError(`${filePath} already exists. Use --force to overwrite.`);
  }

  const config: SyncConfig = {
    version: 1,
    localPath: opts.localPath,
    remote: opts.remote,
    lastSyncAt: null,
    ignore: opts.ignore ?? [],
    files: {},
  };

  saveSyncConfig(config);
  return config;
}
