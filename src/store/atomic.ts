/**
 * Atomic file writes using write-file-atomic (temp file, then rename).
 */

import writeFileAtomic from 'write-file-atomic';
import { readFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { PersistenceError } from '../core/errors.js';

export async function atomicWrite(filePath: string, data: string): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, data, { encoding: 'utf8' });
  } catch (err) {
    throw new PersistenceError(filePath, 'Atomic write failed', { cause: err });
  }
}

/** Write JSON with 2-space indent and a trailing newline */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  await atomicWrite(filePath, JSON.stringify(data, null, 2) + '\n');
}

/**
 * Read a file and return its contents, or null if it does not exist.
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return null;
    }
    throw new PersistenceError(filePath, 'Failed to read', { cause: err });
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
