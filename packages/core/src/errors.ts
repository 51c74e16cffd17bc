/**
 * Typed error classes for suitecraft
 *
 * Error hierarchy:
 * - SuitecraftError (base)
 *   - SchemaError (malformed manifest or settings)
 *   - GraphError (structural reference failures)
 *     - UnresolvedReferenceError (dangling dependency name)
 *     - CyclicDependencyError (reference cycle detected)
 *   - OverlayResolutionError (no matching platform branch)
 *   - BuildStepError (per-node build failures)
 *     - LayoutTokenError (dangling or premature layout token)
 *     - ToolchainError (external step exited non-zero or timed out)
 *     - BuildCancelledError (step interrupted by cancellation)
 *   - StoreError (build cache and output store)
 *     - CacheCorruptionError (stored hash does not match content)
 *     - VerificationError (distribution manifest mismatch)
 *   - LockError (file locking)
 */

/** Base error class for all suitecraft errors */
export class SuitecraftError extends Error {
  readonly code: string

  constructor(message: string, code: string) {
    super(message)
    this.name = 'SuitecraftError'
    this.code = code
    Error.captureStackTrace?.(this, this.constructor)
  }
}

// ============================================================================
// Schema errors
// ============================================================================

/** A single schema violation, located by entity path */
export interface SchemaIssue {
  path: string
  message: string
}

/** Error thrown when a manifest (or a setting) is malformed */
export class SchemaError extends SuitecraftError {
  readonly source: string
  readonly entityPath: string
  readonly issues: SchemaIssue[]

  constructor(source: string, issues: SchemaIssue[]) {
    const first = issues[0] ?? { path: '/', message: 'invalid manifest' }
    const details =
      issues.length > 1 ? `\n${issues.map((i) => `  ${i.path}: ${i.message}`).join('\n')}` : ''
    super(`${source}: ${first.path}: ${first.message}${details}`, 'SCHEMA_ERROR')
    this.name = 'SchemaError'
    this.source = source
    this.entityPath = first.path
    this.issues = issues
  }
}

// ============================================================================
// Graph errors
// ============================================================================

/** Base class for dependency graph errors */
export class GraphError extends SuitecraftError {
  constructor(message: string, code: string) {
    super(message, code)
    this.name = 'GraphError'
  }
}

/** Error thrown when a dependency reference names nothing in the suite closure */
export class UnresolvedReferenceError extends GraphError {
  readonly from: string
  readonly reference: string

  constructor(from: string, reference: string) {
    super(`"${from}" references unknown project or distribution "${reference}"`, 'UNRESOLVED_REFERENCE_ERROR')
    this.name = 'UnresolvedReferenceError'
    this.from = from
    this.reference = reference
  }
}

/** Error thrown when cyclic dependencies are detected */
export class CyclicDependencyError extends GraphError {
  readonly cycle: string[]

  constructor(cycle: string[]) {
    super(`Cyclic dependency detected: ${cycle.join(' -> ')}`, 'CYCLIC_DEPENDENCY_ERROR')
    this.name = 'CyclicDependencyError'
    this.cycle = cycle
  }
}

// ============================================================================
// Overlay errors
// ============================================================================

/** Error thrown when an overlay table has no branch for a platform */
export class OverlayResolutionError extends SuitecraftError {
  readonly node: string
  readonly platform: string
  readonly level: 'os' | 'arch'
  readonly key: string

  constructor(node: string, platform: string, level: 'os' | 'arch', key: string) {
    super(
      `No os_arch entry for ${level} "${key}" in "${node}" (platform ${platform}) and no <others> fallback`,
      'OVERLAY_RESOLUTION_ERROR'
    )
    this.name = 'OverlayResolutionError'
    this.node = node
    this.platform = platform
    this.level = level
    this.key = key
  }
}

// ============================================================================
// Build step errors
// ============================================================================

/** Base class for errors that fail a single node */
export class BuildStepError extends SuitecraftError {
  readonly node: string

  constructor(message: string, code: string, node: string) {
    super(message, code)
    this.name = 'BuildStepError'
    this.node = node
  }
}

/** Error thrown when a layout token cannot be expanded */
export class LayoutTokenError extends BuildStepError {
  readonly token: string

  constructor(distribution: string, token: string, reason: string) {
    super(`Layout of "${distribution}": ${reason}: "${token}"`, 'LAYOUT_TOKEN_ERROR', distribution)
    this.name = 'LayoutTokenError'
    this.token = token
  }
}

/** Error thrown when an external toolchain step fails or times out */
export class ToolchainError extends BuildStepError {
  readonly command: string
  readonly exitCode: number
  readonly stderr: string
  readonly timedOut: boolean

  constructor(
    node: string,
    command: string,
    exitCode: number,
    stderr: string,
    timedOut = false
  ) {
    const reason = timedOut ? 'timed out' : `exited with code ${exitCode}`
    const detail = stderr.trim() ? `\n${stderr.trim()}` : ''
    super(`Toolchain for "${node}" ${reason}: ${command}${detail}`, 'TOOLCHAIN_ERROR', node)
    this.name = 'ToolchainError'
    this.command = command
    this.exitCode = exitCode
    this.stderr = stderr
    this.timedOut = timedOut
  }
}

/** Error thrown when a step is interrupted because the run was cancelled */
export class BuildCancelledError extends BuildStepError {
  constructor(node: string) {
    super(`Build of "${node}" was cancelled`, 'BUILD_CANCELLED', node)
    this.name = 'BuildCancelledError'
  }
}

// ============================================================================
// Store errors
// ============================================================================

/** Base class for store-related errors */
export class StoreError extends SuitecraftError {
  constructor(message: string, code: string) {
    super(message, code)
    this.name = 'StoreError'
  }
}

/** Error thrown when a cache entry no longer matches its recorded hash */
export class CacheCorruptionError extends StoreError {
  readonly cacheKey: string
  readonly expected: string
  readonly actual: string

  constructor(cacheKey: string, expected: string, actual: string) {
    super(
      `Cache entry ${cacheKey} is corrupt: expected ${expected}, got ${actual}`,
      'CACHE_CORRUPTION_ERROR'
    )
    this.name = 'CacheCorruptionError'
    this.cacheKey = cacheKey
    this.expected = expected
    this.actual = actual
  }
}

/** Error thrown when a distribution tree no longer matches its hash manifest */
export class VerificationError extends StoreError {
  readonly distribution: string
  readonly added: string[]
  readonly removed: string[]
  readonly changed: string[]

  constructor(distribution: string, added: string[], removed: string[], changed: string[]) {
    super(
      `Distribution "${distribution}" does not match its manifest (${added.length} added, ${removed.length} removed, ${changed.length} changed)`,
      'VERIFICATION_ERROR'
    )
    this.name = 'VerificationError'
    this.distribution = distribution
    this.added = added
    this.removed = removed
    this.changed = changed
  }
}

// ============================================================================
// Lock errors
// ============================================================================

/** Error thrown during file locking operations */
export class LockError extends SuitecraftError {
  readonly lockPath: string

  constructor(message: string, lockPath: string) {
    super(`Lock error for "${lockPath}": ${message}`, 'LOCK_ERROR')
    this.name = 'LockError'
    this.lockPath = lockPath
  }
}

/** Error thrown when lock acquisition times out */
export class LockTimeoutError extends LockError {
  readonly timeout: number

  constructor(lockPath: string, timeout: number) {
    super(`Timed out after ${timeout}ms`, lockPath)
    this.name = 'LockTimeoutError'
    this.timeout = timeout
  }
}

// ============================================================================
// Type guards
// ============================================================================

export function isSuitecraftError(error: unknown): error is SuitecraftError {
  return error instanceof SuitecraftError
}

export function isSchemaError(error: unknown): error is SchemaError {
  return error instanceof SchemaError
}

export function isGraphError(error: unknown): error is GraphError {
  return error instanceof GraphError
}

/**
 * Structural errors abort a whole run before any build starts.
 */
export function isStructuralError(error: unknown): error is SchemaError | GraphError {
  return error instanceof SchemaError || error instanceof GraphError
}

export function isBuildStepError(error: unknown): error is BuildStepError {
  return error instanceof BuildStepError
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError
}
