import fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { errorCode } from '../errors.js';

export async function exists(targetPath: string): Promise<boolean> {
  return fs
    .stat(targetPath)
    .then(() => true)
    .catch(() => false);
}

/**
 * stat() that returns null for a missing path and rethrows anything else
 */
export async function statIfExists(targetPath: string): Promise<Stats | null> {
  try {
    return await fs.stat(targetPath);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

export async function removePath(targetPath: string): Promise<void> {
  await fs.rm(targetPath, { recursive: true, force: true });
}
