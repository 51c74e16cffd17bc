/**
 * Build cache.
 *
 * WHY: A node whose resolved configuration, sources and dependency outputs
 * are unchanged produces the same output, so its tree is kept under a content
 * key and copied back instead of invoking the toolchain again. Entries are
 * never trusted blindly: the stored tree hash is recomputed on every hit.
 */

import { createHash } from 'node:crypto'
import { readFile, readdir, rm } from 'node:fs/promises'
import { join } from 'node:path'
import type { NodeId } from '@suitecraft/core'
import {
  CacheCorruptionError,
  type LockOptions,
  atomicDir,
  atomicWriteJson,
  copyDir,
  pathExists,
  withLock,
} from '@suitecraft/core'

import { type Sha256Integrity, computeTreeHash } from './integrity.js'
import { CACHE_METADATA_FILE, type PathResolver, ensureDir } from './paths.js'

// ============================================================================
// Cache keys
// ============================================================================

/**
 * JSON with object keys sorted and undefined members dropped.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null'
  }
  if (Array.isArray(value)) {
    return `[${value.map((v) => (v === undefined ? 'null' : canonicalJson(v))).join(',')}]`
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`
}

export interface CacheKeyInput {
  nodeId: NodeId
  /** Resolved per-target configuration */
  config: unknown
  /** Integrity of the node's source inputs */
  sourceHash: string
  /** Output integrity of each direct dependency */
  dependencyHashes: ReadonlyArray<{ id: NodeId; hash: string }>
  /** Included only for platform-dependent nodes */
  platform?: string | undefined
}

/**
 * Compute a cache key.
 *
 * Formula:
 * sha256("cache-v1\0" + nodeId + "\0" + platform + "\0" + canonicalJson(config) + "\0"
 *   + sourceHash + "\0" + for each dependency (sorted by id): id + "=" + hash + "\n")
 */
export function computeCacheKey(input: CacheKeyInput): string {
  const hash = createHash('sha256')
  hash.update(`cache-v1\0${input.nodeId}\0${input.platform ?? ''}\0`)
  hash.update(`${canonicalJson(input.config)}\0${input.sourceHash}\0`)
  const deps = [...input.dependencyHashes].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
  for (const dep of deps) {
    hash.update(`${dep.id}=${dep.hash}\n`)
  }
  return hash.digest('hex')
}

// ============================================================================
// Cache entries
// ============================================================================

export interface CacheMetadata {
  cacheKey: string
  nodeId: NodeId
  /** Target platform, for platform-dependent nodes */
  platform?: string | undefined
  /** Integrity of the cached tree, excluding this metadata file */
  outputHash: Sha256Integrity
  /** When the entry was created */
  createdAt: string
}

function isCacheMetadata(value: unknown): value is CacheMetadata {
  if (typeof value !== 'object' || value === null) return false
  const record: Record<string, unknown> = { ...value }
  return (
    typeof record['cacheKey'] === 'string' &&
    typeof record['nodeId'] === 'string' &&
    record['nodeId'].includes(':') &&
    typeof record['outputHash'] === 'string' &&
    record['outputHash'].startsWith('sha256:') &&
    typeof record['createdAt'] === 'string' &&
    (record['platform'] === undefined || typeof record['platform'] === 'string')
  )
}

export interface BuildCacheOptions {
  paths: PathResolver
  /** Lock options for entry writes */
  lock?: LockOptions | undefined
}

const CACHE_KEY_PATTERN = /^[0-9a-f]{64}$/

export class BuildCache {
  private readonly paths: PathResolver
  private readonly lockOptions: LockOptions

  constructor(options: BuildCacheOptions) {
    this.paths = options.paths
    this.lockOptions = options.lock ?? {}
  }

  /**
   * Look up an entry and verify its content.
   *
   * @returns The entry metadata, or null on a miss
   * @throws CacheCorruptionError when the entry exists but its metadata is
   *   unreadable or its tree no longer matches the recorded hash
   */
  async lookup(cacheKey: string): Promise<CacheMetadata | null> {
    if (!(await pathExists(this.paths.cacheEntry(cacheKey)))) return null
    // an entry being replaced is read only once the writer is done
    return withLock(this.paths.cacheLock(cacheKey), () => this.verify(cacheKey), this.lockOptions)
  }

  private async verify(cacheKey: string): Promise<CacheMetadata | null> {
    const entry = this.paths.cacheEntry(cacheKey)
    if (!(await pathExists(entry))) return null

    let parsed: unknown
    try {
      parsed = JSON.parse(await readFile(this.paths.cacheMetadata(cacheKey), 'utf-8'))
    } catch {
      throw new CacheCorruptionError(cacheKey, 'readable metadata', 'unreadable metadata')
    }
    if (!isCacheMetadata(parsed) || parsed.cacheKey !== cacheKey) {
      throw new CacheCorruptionError(cacheKey, 'valid metadata', 'malformed metadata')
    }

    const actual = await computeTreeHash(entry, { exclude: [CACHE_METADATA_FILE] })
    if (actual !== parsed.outputHash) {
      throw new CacheCorruptionError(cacheKey, parsed.outputHash, actual)
    }
    return parsed
  }

  /**
   * Copy a cached tree (without its metadata) into `dest`.
   */
  async restore(cacheKey: string, dest: string): Promise<void> {
    await withLock(
      this.paths.cacheLock(cacheKey),
      () => copyDir(this.paths.cacheEntry(cacheKey), dest, { exclude: [CACHE_METADATA_FILE] }),
      this.lockOptions
    )
  }

  /**
   * Store a built tree under `cacheKey`, holding the entry lock.
   */
  async store(
    cacheKey: string,
    sourceDir: string,
    meta: Omit<CacheMetadata, 'cacheKey' | 'outputHash' | 'createdAt'>
  ): Promise<CacheMetadata> {
    const entry = this.paths.cacheEntry(cacheKey)
    await ensureDir(this.paths.cacheDir)
    return withLock(
      this.paths.cacheLock(cacheKey),
      () =>
        atomicDir(entry, async (staging) => {
          await copyDir(sourceDir, staging)
          const metadata: CacheMetadata = {
            ...meta,
            cacheKey,
            outputHash: await computeTreeHash(staging, { exclude: [CACHE_METADATA_FILE] }),
            createdAt: new Date().toISOString(),
          }
          await atomicWriteJson(join(staging, CACHE_METADATA_FILE), metadata, { fsync: false })
          return metadata
        }),
      this.lockOptions
    )
  }

  /**
   * Remove an entry.
   */
  async evict(cacheKey: string): Promise<void> {
    await withLock(
      this.paths.cacheLock(cacheKey),
      () => rm(this.paths.cacheEntry(cacheKey), { recursive: true, force: true }),
      this.lockOptions
    )
  }

  /**
   * Keys of every entry on disk.
   */
  async list(): Promise<string[]> {
    try {
      const items = await readdir(this.paths.cacheDir, { withFileTypes: true })
      return items
        .filter((item) => item.isDirectory() && CACHE_KEY_PATTERN.test(item.name))
        .map((item) => item.name)
        .sort()
    } catch {
      return []
    }
  }

  /**
   * Remove every entry; returns the number removed.
   */
  async clear(): Promise<number> {
    const keys = await this.list()
    for (const key of keys) {
      await this.evict(key)
    }
    await rm(this.paths.cacheLocks, { recursive: true, force: true })
    return keys.length
  }
}
