/**
 * Promise-based per-path mutex for file writes.
 * Single process only: the PID record and the agent config are written by
 * one manager at a time, so an in-process lock is enough.
 */

import { createLogger } from './logger.js';

const log = createLogger('mutex');

interface LockEntry {
  promise: Promise<void>;
  resolve: () => void;
}

function createEntry(): LockEntry {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export class FileMutex {
  private locks = new Map<string, LockEntry[]>();

  /**
   * Acquire the lock for `path`. The returned release function MUST be
   * called once the write is done.
   */
  async acquire(path: string, timeoutMs: number = 30000): Promise<() => void> {
    // Enqueue before waiting so later callers line up behind us
    const entry = createEntry();

    let queue = this.locks.get(path);
    if (!queue) {
      queue = [];
      this.locks.set(path, queue);
    }

    const waitFor = queue.length > 0 ? queue[queue.length - 1] : undefined;
    queue.push(entry);

    if (waitFor) {
      log.debug(`Waiting for lock on ${path}`, { queueLength: queue.length });

      let timer: ReturnType<typeof setTimeout> | undefined;
      const timeoutPromise = new Promise<'timeout'>((resolve) => {
        timer = setTimeout(() => resolve('timeout'), timeoutMs);
      });

      const outcome = await Promise.race([waitFor.promise.then(() => 'acquired' as const), timeoutPromise]);
      clearTimeout(timer);

      if (outcome === 'timeout') {
        this.remove(path, entry);
        log.warn(`Timed out waiting for lock on ${path}`);
        throw new Error(`Lock timeout after ${timeoutMs}ms`);
      }
    }

    return () => {
      entry.resolve();
      this.remove(path, entry);
    };
  }

  /**
   * Run `fn` while holding the lock; the lock is released even if it throws.
   */
  async withLock<T>(path: string, fn: () => Promise<T>, timeoutMs: number = 30000): Promise<T> {
    const release = await this.acquire(path, timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private remove(path: string, entry: LockEntry): void {
    const queue = this.locks.get(path);
    if (!queue) return;
    const index = queue.indexOf(entry);
    if (index > -1) {
      queue.splice(index, 1);
    }
    if (queue.length === 0) {
      this.locks.delete(path);
    }
  }
}

export const fileMutex = new FileMutex();

export const withLock = <T>(path: string, fn: () => Promise<T>, timeoutMs?: number): Promise<T> =>
  fileMutex.withLock(path, fn, timeoutMs);
