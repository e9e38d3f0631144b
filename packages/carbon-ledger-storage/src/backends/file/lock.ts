/**
 * Exclusive lock file for FILE backend writers.
 *
 * Acquisition creates the file with O_EXCL ('wx'); whoever creates it owns
 * the lock until it is unlinked. A lock older than `staleMs` is assumed to
 * belong to a crashed writer and is broken.
 *
 * Breaking happens under a second O_EXCL file (`<lock>.break`). The waiter
 * holding it re-checks that the lock is still the stale one it saw before
 * unlinking, so a fresh lock taken by another waiter is never removed.
 */

import * as fs from 'fs/promises';
import { StoreLockTimeoutError, createLogger } from 'carbon-ledger-core';

const logger = createLogger('file-lock');

const RETRY_DELAY_MS = 10;

export interface FileLockOptions {
  timeoutMs: number;
  staleMs: number;
}

// errors from fs may come from another realm (Jest), so no instanceof Error
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

function isCode(error: unknown, code: string): boolean {
  return isErrnoException(error) && error.code === code;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

async function tryCreate(lockPath: string): Promise<boolean> {
  try {
    const handle = await fs.open(lockPath, 'wx');
    try {
      await handle.writeFile(JSON.stringify({ pid: process.pid, acquired_at: new Date().toISOString() }));
    } finally {
      await handle.close();
    }
    return true;
  } catch (error) {
    if (isCode(error, 'EEXIST')) return false;
    throw error;
  }
}

interface LockIdentity {
  ino: number;
  mtimeMs: number;
}

async function statLock(lockPath: string): Promise<LockIdentity | null> {
  try {
    const stats = await fs.stat(lockPath);
    return { ino: stats.ino, mtimeMs: stats.mtimeMs };
  } catch (error) {
    if (isCode(error, 'ENOENT')) return null;
    throw error;
  }
}

function isStale(lock: LockIdentity, staleMs: number): boolean {
  return Date.now() - lock.mtimeMs > staleMs;
}

async function removeIfPresent(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error) {
    if (isCode(error, 'ENOENT')) return;
    throw error;
  }
}

async function breakIfStale(lockPath: string, staleMs: number): Promise<void> {
  const seen = await statLock(lockPath);
  if (!seen || !isStale(seen, staleMs)) return;

  const guardPath = `${lockPath}.break`;
  if (!(await tryCreate(guardPath))) {
    // another waiter is breaking it; a guard left by a crash goes stale too
    const guard = await statLock(guardPath);
    if (guard && isStale(guard, staleMs)) {
      await removeIfPresent(guardPath);
      logger.warn('stale lock guard removed', { lock: guardPath });
    }
    return;
  }

  try {
    const current = await statLock(lockPath);
    if (!current || current.ino !== seen.ino || current.mtimeMs !== seen.mtimeMs || !isStale(current, staleMs)) {
      return;
    }
    await fs.unlink(lockPath);
    logger.warn('stale lock removed', { lock: lockPath, age_ms: Math.round(Date.now() - seen.mtimeMs) });
  } finally {
    await removeIfPresent(guardPath);
  }
}

export async function acquireLock(lockPath: string, options: FileLockOptions): Promise<() => Promise<void>> {
  const deadline = Date.now() + options.timeoutMs;

  for (;;) {
    if (await tryCreate(lockPath)) {
      return () => releaseLock(lockPath);
    }
    await breakIfStale(lockPath, options.staleMs);
    if (Date.now() >= deadline) {
      throw new StoreLockTimeoutError(lockPath, options.timeoutMs);
    }
    await sleep(RETRY_DELAY_MS);
  }
}

async function releaseLock(lockPath: string): Promise<void> {
  try {
    await fs.unlink(lockPath);
  } catch (error) {
    if (isCode(error, 'ENOENT')) {
      logger.warn('lock already gone at release', { lock: lockPath });
      return;
    }
    throw error;
  }
}

export async function withLock<T>(lockPath: string, options: FileLockOptions, fn: () => Promise<T>): Promise<T> {
  const release = await acquireLock(lockPath, options);
  try {
    return await fn();
  } finally {
    await release();
  }
}
