import fs from 'node:fs';
import path from 'node:path';
import { randomBytes } from 'node:crypto';

/**
 * Path of a hidden temp file next to `targetPath`, on the same filesystem so
 * that a rename onto the target is atomic.
 */
export function tempSiblingPath(targetPath: string): string {
  const dir = path.dirname(targetPath);
  const base = path.basename(targetPath);
  return path.join(dir, `.${base}.tmp.${randomBytes(4).toString('hex')}`);
}

/**
 * Write a file atomically using a temp file + rename.
 * Prevents partial reads if the process is interrupted mid-write.
 */
export function atomicWriteFileSync(targetPath: string, content: string, encoding: BufferEncoding = 'utf-8'): void {
  const tmpFile = tempSiblingPath(targetPath);
  try {
    fs.writeFileSync(tmpFile, content, encoding);
    fs.renameSync(tmpFile, targetPath);
  } catch (err) {
    fs.rmSync(tmpFile, { force: true });
    throw err;
  }
}

/**
 * Copy a file onto `targetPath` through a temp sibling + rename.
 */
export async function atomicCopyFile(sourcePath: string, targetPath: string): Promise<void> {
  const tmpFile = tempSiblingPath(targetPath);
  try {
    await fs.promises.copyFile(sourcePath, tmpFile);
    await fs.promises.rename(tmpFile, targetPath);
  } catch (err) {
    await fs.promises.rm(tmpFile, { force: true });
    throw err;
  }
}

export function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}
