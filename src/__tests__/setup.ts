import { vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

/**
 * Spy helpers for console.log/error that capture output and auto-restore.
 */
export function spyConsole() {
  const logs: string[] = [];
  const errors: string[] = [];

  const logSpy = vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    logs.push(args.map(String).join(' '));
  });

  const errorSpy = vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    errors.push(args.map(String).join(' '));
  });

  return {
    logs,
    errors,
    restore() {
      logSpy.mockRestore();
      errorSpy.mockRestore();
    },
  };
}

/**
 * Spy helpers for process.stdout.write/process.stderr.write that capture output.
 * Use this for commands that use the Output utility (write to process streams).
 */
export function spyOutput() {
  const stdout: string[] = [];
  const stderr: string[] = [];

  // Force TTY mode so resolveFlags() defaults to 'text' output (not 'json')
  const prevIsTTY = process.stdout.isTTY;
  Object.defineProperty(process.stdout, 'isTTY', { value: true, configurable: true, writable: true });

  const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk));
    return true;
  });

  const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(String(chunk));
    return true;
  });

  return {
    stdout,
    stderr,
    restore() {
      stdoutSpy.mockRestore();
      stderrSpy.mockRestore();
      Object.defineProperty(process.stdout, 'isTTY', { value: prevIsTTY, configurable: true, writable: true });
    },
  };
}

/**
 * Create a real temp directory; call cleanup() in afterEach.
 */
export function createTempDir(prefix = 'mdsync-test-') {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  return {
    dir,
    cleanup() {
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

/**
 * Write a file and pin its mtime.
 */
export function writeFileAt(filePath: string, content: string, mtime: Date): void {
  fs.writeFileSync(filePath, content);
  fs.utimesSync(filePath, mtime, mtime);
}
