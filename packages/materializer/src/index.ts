/**
 * @suitecraft/materializer
 *
 * Distribution layout materialization with reproducible hash and file-list
 * manifests.
 */

export { globToRegExp, matchGlob } from './glob.js'

export {
  DEFAULT_FILE_LIST_ENTRY,
  DEFAULT_HASH_ENTRY,
  type ManifestPaths,
  type TreeManifest,
  type VerifyResult,
  computeTreeManifest,
  formatFileList,
  formatHashManifest,
  manifestPaths,
  parseHashManifest,
  substitutePlatform,
  verifyDistribution,
  writeManifests,
} from './manifests.js'

export { type DistributionManifest, type MaterializeContext, materialize } from './materialize.js'
