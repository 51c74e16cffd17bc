/**
 * @suitecraft/core
 *
 * Manifest model for suitecraft: types, schema validation, suite loading,
 * platforms, settings, errors, locks and atomic writes.
 */

// Types
export * from './types/index.js'

// Schemas
export { suiteSchema, toEntityPath, validateSuiteManifest } from './schemas/index.js'
export type {
  RawDistribution,
  RawProject,
  RawSuite,
  ValidationResult,
} from './schemas/index.js'

// Manifest parsing and loading
export * from './manifest/index.js'

// Platforms
export {
  executableFileName,
  formatPlatform,
  hostPlatform,
  isPlatformString,
  libraryFileName,
  osKey,
  parsePlatform,
  samePlatform,
} from './platform.js'

// Settings
export {
  DEFAULT_GRACE_PERIOD_MS,
  DEFAULT_TIMEOUT_MS,
  ENV,
  type Env,
  getSuitecraftHome,
  type ResolveSettingsOptions,
  resolveSettings,
  resolveSuitePaths,
  type Settings,
  type SettingsFlags,
} from './settings.js'

export { ENGINE_VERSION } from './version.js'

// Errors
export * from './errors.js'

// Locks
export { acquireLock, type LockHandle, type LockOptions, withLock } from './locks.js'

// Atomic writes
export {
  type AtomicWriteOptions,
  atomicDir,
  atomicWrite,
  atomicWriteJson,
  copyDir,
  copyFile,
  pathExists,
  publishDir,
  stagingPath,
} from './atomic.js'
