/**
 * All-or-nothing file replacement
 */

import fs from 'node:fs';
import path from 'node:path';
import { randomBytes } from 'node:crypto';
import { FileIOError } from '../errors/index.js';

/**
 * Write `content` to a temporary file beside `targetPath` and rename it over
 * the target. The temporary file takes the target's mode when the target
 * exists, and is removed if any step fails.
 */
export async function writeFileAtomic(targetPath: string, content: string, modeFrom?: string): Promise<void> {
  const dir = path.dirname(targetPath);
  const tempPath = path.join(dir, `.${path.basename(targetPath)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);

  try {
    const mode = await readMode(modeFrom ?? targetPath);
    await fs.promises.writeFile(tempPath, content, mode !== null ? { encoding: 'utf-8', mode } : 'utf-8');
    if (mode !== null) {
      // writeFile's mode is filtered by the umask
      await fs.promises.chmod(tempPath, mode);
    }
    await fs.promises.rename(tempPath, targetPath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw new FileIOError(targetPath, 'write', error);
  }
}

async function readMode(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.mode & 0o7777;
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
