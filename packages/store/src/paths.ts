/**
 * Path management for build outputs and the build cache.
 *
 * Output tree layout:
 *
 * <outputRoot>/
 * └── <os>-<arch>/           # one subtree per target platform
 *     └── <suite>/
 *         └── <name>/        # one directory per node, published atomically
 *
 * Cache layout:
 *
 * <cacheDir>/
 * ├── <cacheKey>/            # cached output tree
 * │   └── .suitecraft-cache.json
 * └── locks/
 *     └── <cacheKey>.lock
 */

import { mkdir } from 'node:fs/promises'
import { join } from 'node:path'
import type { NodeId, Platform } from '@suitecraft/core'
import { formatPlatform, splitNodeId } from '@suitecraft/core'

/** Metadata file stored inside each cache entry */
export const CACHE_METADATA_FILE = '.suitecraft-cache.json'

export interface PathOptions {
  /** Root of the output tree */
  outputRoot: string
  /** Build cache directory */
  cacheDir: string
}

export class PathResolver {
  readonly outputRoot: string
  readonly cacheDir: string

  constructor(options: PathOptions) {
    this.outputRoot = options.outputRoot
    this.cacheDir = options.cacheDir
  }

  /** Output subtree of one target platform */
  target(platform: Platform): string {
    return join(this.outputRoot, formatPlatform(platform))
  }

  /** Published output directory of a node for a platform */
  nodeOutput(platform: Platform, id: NodeId): string {
    const { suite, name } = splitNodeId(id)
    return join(this.target(platform), suite, name)
  }

  cacheEntry(cacheKey: string): string {
    return join(this.cacheDir, cacheKey)
  }

  cacheMetadata(cacheKey: string): string {
    return join(this.cacheEntry(cacheKey), CACHE_METADATA_FILE)
  }

  get cacheLocks(): string {
    return join(this.cacheDir, 'locks')
  }

  cacheLock(cacheKey: string): string {
    return join(this.cacheLocks, `${cacheKey}.lock`)
  }
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true })
}
