import type { Command } from 'commander';
import chalk from 'chalk';
import {
  CONFIG_KEYS,
  isConfigKey,
  getConfigValue,
  listConfigValues,
  setConfigValue,
  unsetConfigValue,
  configFile,
} from '../config.js';

function maskSecret(key: string, value: string): string {
  return key.toLowerCase().includes('token') ? value.slice(0, 6) + '...' : value;
}

function requireKey(key: string): boolean {
  if (isConfigKey(key)) return true;
  console.error(chalk.red(`Unknown key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`));
  process.exitCode = 1;
  return false;
}

export function registerConfigCommands(program: Command): void {
  const config = program
    .command('config')
    .description('Manage tool settings (~/.mdsync/config.json)')
    .addHelpText('after', `
KEYS
  pandocPath    pandoc executable (env: MDSYNC_PANDOC)
  timeoutMs     bound for each conversion and remote call (env: MDSYNC_TIMEOUT_MS)
  driveToken    Google Drive OAuth access token (env: MDSYNC_DRIVE_TOKEN)
  driveApiUrl   Drive API base URL (env: MDSYNC_DRIVE_API_URL)

EXAMPLES
  mdsync config set pandocPath /usr/local/bin/pandoc
  mdsync config set timeoutMs 60000
  mdsync config get pandocPath
  mdsync config list`);

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', `Configuration key (${CONFIG_KEYS.join(', ')})`)
    .argument('<value>', 'Configuration value')
    .action((key: string, value: string) => {
      if (!isConfigKey(key)) {
        requireKey(key);
        return;
      }
      try {
        setConfigValue(key, value);
        console.log(chalk.green(`Set ${chalk.bold(key)}`));
      } catch (err) {
        console.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exitCode = 1;
      }
    });

  config
    .command('get')
    .description('Get a configuration value')
    .argument('<key>', 'Configuration key to read')
    .action((key: string) => {
      if (!isConfigKey(key)) {
        requireKey(key);
        return;
      }
      const value = getConfigValue(key);
      if (value !== undefined) {
        console.log(value);
      } else {
        console.log(chalk.yellow(`Key "${key}" is not set`));
      }
    });

  config
    .command('unset')
    .description('Remove a configuration value')
    .argument('<key>', 'Configuration key to remove')
    .action((key: string) => {
      if (!isConfigKey(key)) {
        requireKey(key);
        return;
      }
      if (unsetConfigValue(key)) {
        console.log(chalk.green(`Removed ${chalk.bold(key)}`));
      } else {
        console.log(chalk.yellow(`Key "${key}" is not set`));
      }
    });

  config
    .command('list')
    .description('List all configuration values')
    .action(() => {
      const values = listConfigValues();
      const keys = Object.keys(values);

      if (keys.length === 0) {
        console.log(chalk.yellow(`No settings in ${configFile()}.`));
        return;
      }

      console.log(chalk.bold(`${configFile()}\n`));
      for (const key of keys) {
        console.log(`  ${chalk.cyan(key)}: ${maskSecret(key, String(values[key]))}`);
      }
    });
}
