/**
 * File locking using proper-lockfile.
 * Serializes writers of the configuration records across processes.
 */

import lockfile from 'proper-lockfile';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { PersistenceError } from '../core/errors.js';

export interface LockOptions {
  stale?: number;
  retries?: number;
}

const DEFAULT_LOCK_OPTIONS = {
  retries: {
    retries: 3,
    minTimeout: 50,
    maxTimeout: 1000,
    factor: 2,
  },
  stale: 10_000,
  realpath: false,
};

/** A release function returned by acquireLock. */
export type ReleaseFn = () => Promise<void>;

/**
 * Acquire an exclusive lock on a file. The file itself need not exist.
 * Returns a release function that must be called when done.
 */
export async function acquireLock(filePath: string, options?: LockOptions): Promise<ReleaseFn> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    return await lockfile.lock(filePath, {
      ...DEFAULT_LOCK_OPTIONS,
      ...(options?.stale !== undefined && { stale: options.stale }),
      ...(options?.retries !== undefined && {
        retries: { ...DEFAULT_LOCK_OPTIONS.retries, retries: options.retries },
      }),
    });
  } catch (err) {
    throw new PersistenceError(filePath, 'Failed to acquire lock', { cause: err });
  }
}

/**
 * Execute a function while holding an exclusive lock on a file.
 * The lock is released when the function completes or throws.
 */
export async function withLock<T>(
  filePath: string,
  fn: () => Promise<T>,
  options?: LockOptions,
): Promise<T> {
  const release = await acquireLock(filePath, options);
  try {
    return await fn();
  } finally {
    await release();
  }
}

/**
 * In-process exclusive locks keyed by name. Callers queue behind the
 * current holder in arrival order.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
