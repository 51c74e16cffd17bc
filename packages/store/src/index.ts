/**
 * @suitecraft/store
 *
 * Output and cache paths, content hashing and the build cache.
 */

export { CACHE_METADATA_FILE, type PathOptions, PathResolver, ensureDir } from './paths.js'

export {
  type FileHash,
  IGNORED_NAMES,
  type ListTreeOptions,
  type Sha256Integrity,
  type TreeFile,
  combineFileHashes,
  computeTreeHash,
  computeTreesHash,
  hashFile,
  hashTreeFile,
  hashTreeFiles,
  listTreeFiles,
} from './integrity.js'

export {
  BuildCache,
  type BuildCacheOptions,
  type CacheKeyInput,
  type CacheMetadata,
  canonicalJson,
  computeCacheKey,
} from './cache.js'
