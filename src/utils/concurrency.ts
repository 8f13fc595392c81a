import { promises as fs } from 'node:fs';
import path from 'node:path';
import { isErrnoException } from '../error-handling.js';

export interface FileLockOptions {
  retryIntervalMs?: number;
  /** A lock file older than this is taken over. */
  staleAfterMs?: number;
}

/**
 * Cross-process lock on a directory, held as `<dir>/.locks/<key>.lock`
 * created with O_EXCL. Temporal activities run in separate worker slots
 * and may share one output directory.
 */
export class FileLock {
  private readonly lockDir: string;
  private readonly retryIntervalMs: number;
  private readonly staleAfterMs: number;

  constructor(baseDir: string, options: FileLockOptions = {}) {
    this.lockDir = path.join(baseDir, '.locks');
    this.retryIntervalMs = options.retryIntervalMs ?? 25;
    this.staleAfterMs = options.staleAfterMs ?? 10_000;
  }

  async withLock<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const lockFile = path.join(this.lockDir, `${key}.lock`);
    await this.acquire(lockFile);
    try {
      return await fn();
    } finally {
      await fs.rm(lockFile, { force: true });
    }
  }

  private async acquire(lockFile: string): Promise<void> {
    await fs.mkdir(this.lockDir, { recursive: true });

    for (;;) {
      try {
        await fs.writeFile(lockFile, String(process.pid), { flag: 'wx' });
        return;
      } catch (error) {
        if (!isErrnoException(error, 'EEXIST')) throw error;
      }

      if (await this.isStale(lockFile)) {
        console.warn(`[lock] Taking over stale lock ${lockFile}`);
        await fs.rm(lockFile, { force: true });
        continue;
      }
      await new Promise((resolve) => setTimeout(resolve, this.retryIntervalMs));
    }
  }

  private async isStale(lockFile: string): Promise<boolean> {
    try {
      const { mtimeMs } = await fs.stat(lockFile);
      return Date.now() - mtimeMs > this.staleAfterMs;
    } catch (error) {
      // Released between our write attempt and the stat
      if (isErrnoException(error, 'ENOENT')) return false;
      throw error;
    }
  }
}

/**
 * Map `items` through `fn` with at most `limit` calls in flight. Results keep
 * the input order; a rejection is recorded, not thrown.
 */
export async function mapLimit<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    for (let i = next++; i < items.length; i = next++) {
      try {
        results[i] = { status: 'fulfilled', value: await fn(items[i], i) };
      } catch (reason) {
        results[i] = { status: 'rejected', reason };
      }
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, lane));
  return results;
}
