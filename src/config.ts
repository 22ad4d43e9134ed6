import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { z } from 'zod';
import { atomicWriteFileSync } from './utils/fs.js';
import { DEFAULT_DRIVE_API_URL } from './sync/drive-store.js';
import { formatIssues } from './sync/schema.js';

const CONFIG_DIR = path.join(os.homedir(), '.mdsync');
const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');

export const DEFAULT_TIMEOUT_MS = 120_000;

/**
 * Tool-wide settings, shared by every tracked directory.
 */
export interface CliConfig {
  /** pandoc executable */
  pandocPath: string;
  /** Bound for each conversion and each remote call */
  timeoutMs: number;
  /** OAuth access token for the Drive API */
  driveToken?: string;
  driveApiUrl: string;
}

export const CONFIG_KEYS = ['pandocPath', 'timeoutMs', 'driveToken', 'driveApiUrl'] as const;
export type ConfigKey = typeof CONFIG_KEYS[number];

const timeoutSchema = z.coerce.number().int().positive();

const fileConfigSchema = z.object({
  pandocPath: z.string().min(1).optional(),
  timeoutMs: timeoutSchema.optional(),
  driveToken: z.string().min(1).optional(),
  driveApiUrl: z.string().url().optional(),
}).passthrough();

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

type FileConfig = z.infer<typeof fileConfigSchema>;

function readConfigFile(): FileConfig {
  if (!fs.existsSync(CONFIG_FILE)) return {};
  const raw: unknown = JSON.parse(fs.readFileSync(CONFIG_FILE, 'utf-8'));
  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid config at ${CONFIG_FILE}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Loads config from env vars over ~/.mdsync/config.json over defaults.
 */
export function loadConfig(): CliConfig {
  const file = readConfigFile();

  const config: CliConfig = {
    pandocPath: process.env.MDSYNC_PANDOC || file.pandocPath || 'pandoc',
    timeoutMs: file.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    driveApiUrl: process.env.MDSYNC_DRIVE_API_URL || file.driveApiUrl || DEFAULT_DRIVE_API_URL,
  };

  if (process.env.MDSYNC_TIMEOUT_MS) {
    const parsed = timeoutSchema.safeParse(process.env.MDSYNC_TIMEOUT_MS);
    if (!parsed.success) {
      throw new Error(`MDSYNC_TIMEOUT_MS must be a positive integer, got "${process.env.MDSYNC_TIMEOUT_MS}"`);
    }
    config.timeoutMs = parsed.data;
  }

  const driveToken = process.env.MDSYNC_DRIVE_TOKEN || file.driveToken;
  if (driveToken) config.driveToken = driveToken;

  return config;
}

export function getConfigValue(key: ConfigKey): string | undefined {
  const value = readConfigFile()[key];
  return value === undefined ? undefined : String(value);
}

export function listConfigValues(): FileConfig {
  return readConfigFile();
}

/**
 * Validate and store a single key in ~/.mdsync/config.json.
 */
export function setConfigValue(key: ConfigKey, value: string): void {
  const parsed = fileConfigSchema.safeParse({ ...readConfigFile(), [key]: value });
  if (!parsed.success) {
    throw new Error(`Invalid value for ${key}: ${formatIssues(parsed.error)}`);
  }
  writeConfigFile(parsed.data);
}

/**
 * Remove a key from ~/.mdsync/config.json. Returns false if it was not set.
 */
export function unsetConfigValue(key: ConfigKey): boolean {
  const current = readConfigFile();
  if (current[key] === undefined) return false;
  const next = { ...current };
  delete next[key];
  writeConfigFile(next);
  return true;
}

function writeConfigFile(config: Record<string, unknown>): void {
  if (!fs.existsSync(CONFIG_DIR)) {
    fs.mkdirSync(CONFIG_DIR, { recursive: true });
  }
  atomicWriteFileSync(CONFIG_FILE, JSON.stringify(config, null, 2) + '\n');
}

export function configFile(): string {
  return CONFIG_FILE;
}
