#!/usr/bin/env node
import { Command } from 'commander';
import { registerConfigCommands } from './commands/config.js';
import { registerSyncCommands } from './commands/sync.js';

const program = new Command();
program
  .name('mdsync')
  .description('Keep a folder of Markdown documents in sync with a remote collection of Word documents')
  .version('0.1.0')
  .addHelpText('after', `
GETTING STARTED
  mdsync init ./notes /mnt/share/notes              Track a directory against a mounted folder
  mdsync init ./notes "Team Notes" --backend drive  Track a directory against a Drive folder

COMMON WORKFLOWS
  mdsync update --path ./notes                      Push local changes, then pull remote ones
  mdsync update --path ./notes --dry-run            Show what would be transferred
  mdsync status --path ./notes                      Show tracked documents and pending changes

CONFIGURATION
  mdsync config set <key> <value>                   Set a tool setting
  mdsync config list                                List tool settings

LEARN MORE
  mdsync <command> --help                           Show help for a command`);

registerSyncCommands(program);
registerConfigCommands(program);

await program.parseAsync();
