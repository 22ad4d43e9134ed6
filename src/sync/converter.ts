/**
 * Converter gateway: turns Markdown into .docx and back by running pandoc.
 */
import fs from 'node:fs';
import { execFile } from 'node:child_process';
import { ConversionError } from './errors.js';
import { tempSiblingPath } from '../utils/fs.js';

export type ConversionDirection = 'to-remote' | 'to-local';

export interface Converter {
  /**
   * Convert `inputPath` into `outputPath`. Nothing appears at `outputPath`
   * unless the conversion succeeded.
   */
  convert(inputPath: string, outputPath: string, direction: ConversionDirection, signal?: AbortSignal): Promise<void>;
}

export interface PandocConverterOptions {
  /** pandoc executable (default: pandoc on PATH) */
  command?: string;
  /** Extra arguments appended to every invocation */
  extraArgs?: string[];
}

const FORMATS: Record<ConversionDirection, { from: string; to: string }> = {
  'to-remote': { from: 'markdown', to: 'docx' },
  'to-local': { from: 'docx', to: 'markdown' },
};

export class PandocConverter implements Converter {
  private command: string;
  private extraArgs: string[];

  constructor(options: PandocConverterOptions = {}) {
    this.command = options.command ?? 'pandoc';
    this.extraArgs = options.extraArgs ?? [];
  }

  async convert(
    inputPath: string,
    outputPath: string,
    direction: ConversionDirection,
    signal?: AbortSignal,
  ): Promise<void> {
    const { from, to } = FORMATS[direction];
    const tmpOutput = tempSiblingPath(outputPath);
    const args = [inputPath, '-f', from, '-t', to, '-o', tmpOutput, ...this.extraArgs];

    try {
      await runProcess(this.command, args, signal);
      await fs.promises.rename(tmpOutput, outputPath);
    } catch (err) {
      await fs.promises.rm(tmpOutput, { force: true });
      throw new ConversionError(inputPath, describeProcessError(err));
    }
  }
}

function runProcess(command: string, args: string[], signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    execFile(command, args, { signal, windowsHide: true }, (err, _stdout, stderr) => {
      if (err) {
        const detail = String(stderr).trim();
        reject(detail ? new Error(`${err.message}: ${detail}`) : err);
        return;
      }
      resolve();
    });
  });
}

function describeProcessError(err: unknown): string {
  if (err instanceof Error) {
    if (err.name === 'AbortError') return 'aborted';
    if ('code' in err && err.code === 'ENOENT') return 'pandoc not found (install it or set MDSYNC_PANDOC)';
    return err.message;
  }
  return String(err);
}
