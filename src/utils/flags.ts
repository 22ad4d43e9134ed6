import { Option, type Command } from 'commander';
import chalk from 'chalk';

export const OUTPUT_FORMATS = ['text', 'json', 'table'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export interface GlobalFlags {
  output: OutputFormat;
  verbose: boolean;
  quiet: boolean;
  noColor: boolean;
  dryRun: boolean;
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/**
 * Add universal flags to a command.
 * Call this on each leaf command (action command) to register the flags.
 * Read-only commands pass `dryRun: false` and do not get `--dry-run`.
 */
export function addGlobalFlags(cmd: Command, options: { dryRun?: boolean } = {}): Command {
  cmd
    .addOption(new Option('-o, --output <format>', 'Output format (default: text on a terminal, json otherwise)').choices(OUTPUT_FORMATS))
    .option('-v, --verbose', 'Verbose output (debug info)')
    .option('-q, --quiet', 'Minimal output (errors only)')
    .option('--no-color', 'Disable colored output');
  if (options.dryRun !== false) {
    cmd.option('--dry-run', 'Preview changes without writing, converting or transferring anything');
  }
  return cmd;
}

/**
 * Resolve global flags from parsed options, applying TTY detection defaults.
 */
export function resolveFlags(opts: Record<string, unknown>): GlobalFlags {
  const isTTY = process.stdout.isTTY ?? false;
  const noColor = opts.noColor === true || opts.color === false;

  if (noColor) {
    chalk.level = 0;
  }

  return {
    output: isOutputFormat(opts.output) ? opts.output : (isTTY ? 'text' : 'json'),
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
    noColor,
    dryRun: opts.dryRun === true,
  };
}
