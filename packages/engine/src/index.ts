/**
 * @suitecraft/engine - Build orchestration.
 *
 * WHY: This package coordinates the resolver, store and materializer:
 * - Building (every node of every target, in dependency order)
 * - Distributions (one distribution and its closure)
 * - Verifying (recomputing distribution manifests)
 * - Cleaning and graph export
 */

// Building
export { type GraphInput, type RunOptions, run, toBuildGraph } from './build.js'

// Distributions, verification, cleaning, graph export
export {
  type CleanOptions,
  type CleanResult,
  type VerifyTargetResult,
  assertVerified,
  buildDistribution,
  clean,
  exportGraph,
  findDistribution,
  verify,
} from './operations.js'

// Reports
export {
  type BuildFailure,
  type BuildReport,
  EXIT_CODES,
  type ExitCode,
  type NodeOutcome,
  type NodeStatus,
  type StatusCounts,
  type TargetReport,
  aggregateExitCode,
  countStatuses,
  findOutcome,
  targetExitCode,
} from './report.js'

// Events
export {
  type BuildEvent,
  BuildEventEmitter,
  type BuildEventEmitterOptions,
  type BuildEventInput,
  type BuildEventListener,
  type CacheEvictedEvent,
  type NodeFinishedEvent,
  type NodeStartedEvent,
  type TargetFinishedEvent,
  type TargetStartedEvent,
  createEventEmitter,
} from './events.js'

// Toolchains
export {
  CommandToolchain,
  type CommandToolchainOptions,
  type Toolchain,
  type ToolchainDependency,
  type ToolchainKind,
  type ToolchainRequest,
  type ToolchainRunOptions,
  toolchainKind,
} from './toolchain.js'

export { WorkerPool } from './pool.js'
