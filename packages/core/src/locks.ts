/**
 * File locking primitives
 *
 * Uses proper-lockfile so cache entries can be written by concurrent targets
 * and concurrent runs sharing one cache directory.
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import lockfile from 'proper-lockfile'

import { LockError, LockTimeoutError } from './errors.js'

export interface LockOptions {
  /** Time to wait for the lock in milliseconds (default: 30000) */
  timeout?: number | undefined
  /** Stale lock threshold in milliseconds (default: 10000) */
  stale?: number | undefined
}

const RETRY_INTERVAL_MS = 100

export interface LockHandle {
  release: () => Promise<void>
  path: string
}

async function ensureLockFile(lockPath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(lockPath), { recursive: true })
  // 'a' creates the file without truncating a lock another process holds
  const handle = await fs.promises.open(lockPath, 'a')
  await handle.close()
}

/**
 * Acquire a lock on a file, creating it when needed
 *
 * @throws LockTimeoutError if the lock cannot be acquired within the timeout
 * @throws LockError for other lock failures
 */
export async function acquireLock(lockPath: string, options: LockOptions = {}): Promise<LockHandle> {
  const timeout = options.timeout ?? 30000
  const stale = options.stale ?? 10000

  await ensureLockFile(lockPath)

  let release: () => Promise<void>
  try {
    release = await lockfile.lock(lockPath, {
      stale,
      retries: {
        retries: Math.max(0, Math.ceil(timeout / RETRY_INTERVAL_MS)),
        minTimeout: RETRY_INTERVAL_MS,
        maxTimeout: RETRY_INTERVAL_MS * 2,
        factor: 1,
      },
    })
  } catch (err) {
    if (err instanceof Error) {
      if ('code' in err && err.code === 'ELOCKED') {
        throw new LockTimeoutError(lockPath, timeout)
      }
      throw new LockError(err.message, lockPath)
    }
    throw new LockError(String(err), lockPath)
  }

  return {
    path: lockPath,
    release: async () => {
      try {
        await release()
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ERELEASED') return
        throw new LockError(
          `Failed to release lock: ${err instanceof Error ? err.message : String(err)}`,
          lockPath
        )
      }
    },
  }
}

/**
 * Execute a function with a lock held
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
