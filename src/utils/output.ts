import chalk from 'chalk';
import ora from 'ora';
import type { GlobalFlags } from './flags.js';
import type { SyncEvent, SyncResult } from '../sync/engine.js';
import { formatPlan, type SyncPlan } from '../sync/plan.js';

export interface TableColumn {
  key: string;
  header: string;
}

/**
 * Output helper for the mdsync commands. Progress, warnings and the plan go to
 * stderr; records and summaries go to stdout as text, json or a table so they
 * can be piped.
 */
export class Output {
  private flags: GlobalFlags;
  private spinner: ReturnType<typeof ora> | null = null;

  constructor(flags: GlobalFlags) {
    this.flags = flags;
  }

  /**
   * Start a spinner (only shown in text mode, non-quiet, TTY).
   */
  startSpinner(message: string): void {
    if (this.flags.output === 'text' && !this.flags.quiet && process.stderr.isTTY) {
      this.spinner = ora({ text: message, stream: process.stderr }).start();
    }
  }

  stopSpinner(): void {
    this.spinner?.stop();
    this.spinner = null;
  }

  succeedSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.succeed(message);
      this.spinner = null;
    } else if (this.flags.output === 'text' && !this.flags.quiet) {
      process.stderr.write(chalk.green('✓') + ' ' + message + '\n');
    }
  }

  failSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    } else {
      process.stderr.write(chalk.red('✖') + ' ' + message + '\n');
    }
  }

  status(message: string): void {
    if (!this.flags.quiet) {
      process.stderr.write(message + '\n');
    }
  }

  debug(message: string): void {
    if (this.flags.verbose) {
      process.stderr.write(chalk.dim('[debug] ' + message) + '\n');
    }
  }

  error(message: string): void {
    process.stderr.write(chalk.red(message) + '\n');
  }

  warn(message: string): void {
    if (!this.flags.quiet) {
      process.stderr.write(chalk.yellow(message) + '\n');
    }
  }

  /**
   * Progress of a running sync, one line per document.
   */
  syncEvent(event: SyncEvent): void {
    switch (event.type) {
      case 'phase':
        if (event.total > 0) {
          this.status(event.direction === 'push'
            ? `Pushing ${event.total} local document(s)...`
            : `Pulling ${event.total} remote document(s)...`);
        } else {
          this.debug(`Nothing to ${event.direction}`);
        }
        break;
      case 'start':
        this.startSpinner(`[${event.current}/${event.total}] ${event.name}`);
        this.debug(`${event.name}: ${event.reason}`);
        break;
      case 'done':
        this.succeedSpinner(event.direction === 'push' ? `Pushed ${event.name}` : `Pulled ${event.name}`);
        break;
      case 'failed':
        this.failSpinner(`Skipped ${event.name} (${event.direction}, ${event.stage}): ${event.error}`);
        break;
    }
  }

  /**
   * End-of-run summary. Every skipped document is listed with its reason
   * before the counts.
   */
  syncSummary(result: SyncResult, syncedAt: string | null): void {
    if (result.failures.length > 0) {
      this.warn(`Completed with ${result.failures.length} warning(s):`);
      for (const failure of result.failures) {
        this.warn(`  ${failure.name} (${failure.direction}, ${failure.stage}): ${failure.error}`);
      }
    }
    this.success(`Sync completed at ${syncedAt ?? 'unknown time'}`, {
      pushed: result.pushed.length,
      pulled: result.pulled.length,
      failed: result.failures.length,
      syncedAt,
    });
  }

  /**
   * Pending actions. In json mode the document names are emitted as one
   * record together with `fields`; otherwise the plan is described on stderr.
   */
  syncPlan(plan: SyncPlan, fields: Record<string, unknown> = {}): void {
    if (this.flags.output === 'json') {
      this.record({
        ...fields,
        pendingPush: plan.pushes.map(p => p.name),
        pendingPull: plan.pulls.map(p => p.name),
      });
      return;
    }
    this.status(formatPlan(plan));
  }

  record(data: Record<string, unknown>): void {
    switch (this.flags.output) {
      case 'json':
        process.stdout.write(JSON.stringify(data) + '\n');
        break;
      case 'table':
        this.table([data], defaultColumns(data));
        break;
      case 'text':
        this.printKeyValue(data);
        break;
    }
  }

  /**
   * Output a list: one line per item in text mode, JSON Lines in json mode,
   * a table otherwise.
   */
  list(
    data: Record<string, unknown>[],
    options: {
      columns: TableColumn[];
      textFn: (item: Record<string, unknown>) => string;
      emptyMessage: string;
    },
  ): void {
    if (data.length === 0) {
      if (this.flags.output !== 'json') this.status(options.emptyMessage);
      return;
    }

    switch (this.flags.output) {
      case 'json':
        for (const item of data) {
          process.stdout.write(JSON.stringify(item) + '\n');
        }
        break;
      case 'table':
        this.table(data, options.columns);
        break;
      case 'text':
        for (const item of data) {
          process.stdout.write(options.textFn(item) + '\n');
        }
        break;
    }
  }

  /**
   * Print a success result. In json mode only the data is printed.
   */
  success(message: string, data: Record<string, unknown>): void {
    if (this.flags.output === 'json') {
      process.stdout.write(JSON.stringify(data) + '\n');
    } else if (!this.flags.quiet) {
      this.succeedSpinner(message);
      this.record(data);
    }
  }

  private printKeyValue(data: Record<string, unknown>): void {
    const keys = Object.keys(data);
    if (keys.length === 0) return;
    const maxKeyLen = Math.max(...keys.map(k => k.length));
    for (const [key, value] of Object.entries(data)) {
      const padding = ' '.repeat(maxKeyLen - key.length + 1);
      process.stdout.write(`${capitalize(key)}:${padding}${formatValue(value)}\n`);
    }
  }

  private table(data: Record<string, unknown>[], cols: TableColumn[]): void {
    const cell = (value: unknown) => (value === null || value === undefined ? '' : formatValue(value));
    const widths = cols.map(col => Math.max(col.header.length, ...data.map(row => cell(row[col.key]).length)));
    const rule = (left: string, mid: string, right: string) =>
      left + widths.map(w => '─'.repeat(w + 2)).join(mid) + right + '\n';
    const row = (values: string[]) =>
      '│' + values.map((v, i) => ' ' + v.padEnd(widths[i]) + ' ').join('│') + '│\n';

    process.stdout.write(rule('┌', '┬', '┐'));
    process.stdout.write(row(cols.map(col => col.header)));
    process.stdout.write(rule('├', '┼', '┤'));
    for (const item of data) {
      process.stdout.write(row(cols.map(col => cell(item[col.key]))));
    }
    process.stdout.write(rule('└', '┴', '┘'));
  }
}

function capitalize(key: string): string {
  return key.charAt(0).toUpperCase() + key.slice(1);
}

function defaultColumns(data: Record<string, unknown>): TableColumn[] {
  return Object.keys(data).map(key => ({ key, header: capitalize(key) }));
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return chalk.dim('none');
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.length > 0 ? value.map(String).join(', ') : chalk.dim('none');
  return String(value);
}

export function createOutput(flags: GlobalFlags): Output {
  return new Output(flags);
}

/**
 * Standard error handler for commands: fail the spinner, print the message,
 * set exit code 1.
 */
export function handleError(out: Output, err: unknown, spinnerMessage?: string): void {
  if (spinnerMessage) {
    out.failSpinner(spinnerMessage);
  }
  out.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}
