/**
 * Advisory exclusive lock backed by a lock file created with O_EXCL.
 * Only writers take the lock; readers never wait on it.
 */

import { open, stat, unlink, type FileHandle } from 'fs/promises';
import { createChildLogger } from '@/utils/logger';
import { isErrnoException } from '@/utils/errors';

const logger = createChildLogger('file_lock');

const DEFAULT_RETRY_MS = 25;
// Waiting outlasts the stale threshold, so a lock orphaned by a crashed
// writer is always broken before a waiter gives up
const DEFAULT_TIMEOUT_MS = 15_000;
const STALE_LOCK_MS = 10_000;

export interface FileLockOptions {
  retryMs?: number;
  timeoutMs?: number;
  /** A lock file older than this is assumed to belong to a crashed writer. */
  staleMs?: number;
}

export class FileLockTimeoutError extends Error {
  constructor(public readonly lockPath: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for lock ${lockPath}`);
    this.name = 'FileLockTimeoutError';
  }
}

async function tryAcquire(lockPath: string): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await open(lockPath, 'wx');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      return false;
    }
    throw error;
  }

  try {
    await handle.writeFile(`${process.pid}\n`, 'utf-8');
    await handle.close();
  } catch (error) {
    // The lock was never handed out; do not leave it for others to wait on
    await handle.close().catch((closeError: unknown) => {
      logger.warn({ lockPath, err: closeError }, 'Failed to close half-created lock');
    });
    await unlink(lockPath).catch((unlinkError: unknown) => {
      logger.warn({ lockPath, err: unlinkError }, 'Failed to remove half-created lock');
    });
    throw error;
  }
  return true;
}

async function breakIfStale(lockPath: string, staleMs: number): Promise<void> {
  try {
    const stats = await stat(lockPath);
    if (Date.now() - stats.mtimeMs > staleMs) {
      logger.warn({ lockPath, ageMs: Date.now() - stats.mtimeMs }, 'Breaking stale lock');
      await unlink(lockPath);
    }
  } catch (error) {
    // Holder released it between our attempts
    if (isErrnoException(error) && error.code === 'ENOENT') return;
    throw error;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: FileLockOptions = {}
): Promise<T> {
  const retryMs = options.retryMs ?? DEFAULT_RETRY_MS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const staleMs = options.staleMs ?? STALE_LOCK_MS;
  const deadline = Date.now() + timeoutMs;

  while (!(await tryAcquire(lockPath))) {
    await breakIfStale(lockPath, staleMs);
    if (Date.now() >= deadline) {
      throw new FileLockTimeoutError(lockPath, timeoutMs);
    }
    await sleep(retryMs);
  }

  try {
    return await fn();
  } finally {
    await unlink(lockPath).catch((error: unknown) => {
      logger.warn({ lockPath, err: error }, 'Failed to release lock');
    });
  }
}
