/**
 * Cross-process advisory file locks for binstash
 *
 * Uses proper-lockfile so that two processes resolving the same artifact
 * do not download and publish into the same cache directory at once.
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import lockfile from 'proper-lockfile'

import { LockError, LockTimeoutError } from './errors.js'

/** Lock options */
export interface LockOptions {
  /** How long to wait for a held lock, in milliseconds (default: 600000) */
  timeout?: number
  /** Stale lock threshold in milliseconds (default: 10000) */
  stale?: number
}

/** Default lock options: a fetch may legitimately hold a lock for minutes */
const DEFAULT_LOCK_OPTIONS: Required<LockOptions> = {
  timeout: 600000,
  stale: 10000,
}

/** Wait between attempts to take a held lock */
const RETRY_INTERVAL_MS = 100

/** Lock release function */
export type ReleaseFn = () => Promise<void>

/** Lock handle returned by lock acquisition */
export interface LockHandle {
  /** Release the lock */
  release: ReleaseFn
  /** Path that is locked */
  path: string
}

/**
 * Ensure a file exists (create empty if needed) for locking
 */
async function ensureLockFile(lockPath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(lockPath), { recursive: true })
  const handle = await fs.promises.open(lockPath, 'a')
  await handle.close()
}

/**
 * Acquire a lock on a file
 *
 * @param lockPath - Path to lock (will create if needed)
 * @throws LockTimeoutError if the lock is still held after `timeout`
 * @throws LockError for other lock failures
 */
export async function acquireLock(lockPath: string, options: LockOptions = {}): Promise<LockHandle> {
  const opts = { ...DEFAULT_LOCK_OPTIONS, ...options }

  await ensureLockFile(lockPath)

  let release: ReleaseFn
  try {
    release = await lockfile.lock(lockPath, {
      stale: opts.stale,
      retries: {
        retries: Math.max(0, Math.ceil(opts.timeout / RETRY_INTERVAL_MS)),
        minTimeout: RETRY_INTERVAL_MS,
        maxTimeout: RETRY_INTERVAL_MS,
        factor: 1,
      },
    })
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ELOCKED') {
      throw new LockTimeoutError(lockPath, opts.timeout)
    }
    throw new LockError(err instanceof Error ? err.message : String(err), lockPath)
  }

  return {
    release: async () => {
      try {
        await release()
      } catch (err) {
        // A compromised or already released lock has nothing left to free
        if ((err as NodeJS.ErrnoException).code !== 'ERELEASED') {
          throw new LockError(
            `Failed to release lock: ${err instanceof Error ? err.message : String(err)}`,
            lockPath
          )
        }
      }
    },
    path: lockPath,
  }
}

/**
 * Check if a file is currently locked
 */
export async function isLocked(lockPath: string): Promise<boolean> {
  try {
    await fs.promises.access(lockPath)
  } catch {
    return false
  }
  return lockfile.check(lockPath)
}

/**
 * Execute a function with a lock held
 *
 * @param lockPath - Path to lock
 * @param fn - Function to execute while holding the lock
 * @returns Result of the function
 */
export async function withLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  const handle = await acquireLock(lockPath, options)
  try {
    return await fn()
  } finally {
    await handle.release()
  }
}
