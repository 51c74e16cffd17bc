/**
 * Build orchestration.
 *
 * WHY: Every target walks the same read-only graph. A node starts once all of
 * its dependencies have settled for the same target and a worker slot is
 * free; the slots are shared by all targets, so `jobs` bounds the number of
 * external processes for the whole run. Outputs are written to a staging
 * directory and renamed into `<outputRoot>/<platform>/<suite>/<name>` only on
 * success, so a failed or cancelled step never leaves a partial tree behind.
 *
 * Failure handling:
 * - OverlayResolutionError: the target is abandoned before any node runs
 * - ToolchainError, LayoutTokenError: the node fails, dependents are blocked
 * - CacheCorruptionError: the entry is evicted and the node rebuilt
 * - Schema and graph errors are thrown before anything is scheduled
 */

import { lstat } from 'node:fs/promises'
import { join } from 'node:path'
import type {
  BuildNode,
  Distribution,
  NodeId,
  Platform,
  PlatformString,
  Project,
  Suite,
  SuiteSet,
} from '@suitecraft/core'
import {
  BuildCancelledError,
  CacheCorruptionError,
  OverlayResolutionError,
  atomicDir,
  formatPlatform,
  isSuitecraftError,
  pathExists,
} from '@suitecraft/core'
import { materialize } from '@suitecraft/materializer'
import {
  type BuildGraph,
  type NodeResolution,
  type Registry,
  type ResolvedNodeConfig,
  buildGraph,
  compareIds,
  dependenciesOf,
  dependencyClosure,
  primaryArtifactName,
  resolveNodeConfig,
  sourceDir,
  subgraphFor,
} from '@suitecraft/resolver'
import {
  BuildCache,
  type FileHash,
  PathResolver,
  combineFileHashes,
  computeCacheKey,
  computeTreeHash,
  computeTreesHash,
  hashFile,
  hashTreeFiles,
} from '@suitecraft/store'

import { BuildEventEmitter } from './events.js'
import { WorkerPool } from './pool.js'
import {
  type BuildReport,
  type NodeOutcome,
  type NodeStatus,
  type TargetReport,
  createReport,
  targetExitCode,
} from './report.js'
import { CommandToolchain, type Toolchain, type ToolchainRequest, toolchainKind } from './toolchain.js'

// ============================================================================
// Options
// ============================================================================

export type GraphInput = BuildGraph | SuiteSet | Iterable<Suite> | Registry

export interface RunOptions {
  /** Root of the output tree */
  outputRoot: string
  /** Build cache directory */
  cacheDir: string
  /** Worker slots shared by all targets (default: 1) */
  jobs?: number | undefined
  /** Defaults to a CommandToolchain over `toolchainPaths` */
  toolchain?: Toolchain | undefined
  toolchainPaths?: readonly string[] | undefined
  /** Toolchain timeout in milliseconds (default: 600000) */
  timeout?: number | undefined
  /** Milliseconds a cancelled toolchain gets before it is killed (default: 5000) */
  gracePeriod?: number | undefined
  signal?: AbortSignal | undefined
  /** Only these nodes and their dependencies (default: every node) */
  nodes?: readonly NodeId[] | undefined
  /** Use the build cache (default: true) */
  cache?: boolean | undefined
  events?: BuildEventEmitter | undefined
}

const DEFAULT_TIMEOUT = 600_000
const DEFAULT_GRACE_PERIOD = 5_000

function isBuildGraph(input: GraphInput): input is BuildGraph {
  return (
    typeof input === 'object' &&
    input !== null &&
    'order' in input &&
    'edges' in input &&
    'reverse' in input
  )
}

/**
 * The build graph of an input, building it when needed.
 *
 * @throws SchemaError, UnresolvedReferenceError or CyclicDependencyError
 */
export function toBuildGraph(input: GraphInput): BuildGraph {
  return isBuildGraph(input) ? input : buildGraph(input).graph
}

// ============================================================================
// Source hashing
// ============================================================================

async function projectSourceHash(project: Project, registry: Registry): Promise<string> {
  const root = sourceDir(project, registry)
  const dirs = project.sourceDirs.length > 0 ? project.sourceDirs : ['.']
  return computeTreesHash(dirs.map((dir) => ({ prefix: dir, root: join(root, dir) })))
}

/**
 * Literal files the layout copies; inline content and tokens are part of the
 * resolved configuration instead.
 */
async function distributionSourceHash(
  distribution: Distribution,
  config: ResolvedNodeConfig,
  registry: Registry
): Promise<string> {
  if (!config.layout) {
    return distribution.subDir === undefined
      ? combineFileHashes([])
      : computeTreeHash(sourceDir(distribution, registry))
  }
  const root = registry.suites.get(distribution.suite)?.root ?? '.'
  const files: FileHash[] = []
  for (const rule of config.layout) {
    for (const entry of rule.entries) {
      if (entry.kind !== 'literal') continue
      const abs = join(root, entry.path)
      if (!(await pathExists(abs))) continue
      if ((await lstat(abs)).isDirectory()) {
        for (const file of await hashTreeFiles(abs)) {
          files.push({ path: `${entry.path}/${file.path}`, sha256: file.sha256 })
        }
      } else {
        files.push({ path: entry.path, sha256: await hashFile(abs) })
      }
    }
  }
  return combineFileHashes(files)
}

function cacheConfig(node: BuildNode, config: ResolvedNodeConfig): unknown {
  if (node.kind === 'project') {
    return {
      kind: toolchainKind(node),
      native: config.native,
      nativeKind: node.native,
      deliverable: node.deliverable,
      compliance: node.compliance,
      sourceDirs: node.sourceDirs,
      artifact: node.artifact,
    }
  }
  return {
    kind: config.layout ? 'layout' : 'archive',
    type: node.type,
    layout: config.layout,
    platformDependent: node.platformDependent,
    hashEntry: node.hashEntry,
    fileListEntry: node.fileListEntry,
    artifact: node.artifact,
  }
}

// ============================================================================
// Target execution
// ============================================================================

interface RunContext {
  graph: BuildGraph
  paths: PathResolver
  cache: BuildCache | undefined
  pool: WorkerPool
  toolchain: Toolchain
  timeout: number
  gracePeriod: number
  signal: AbortSignal | undefined
  events: BuildEventEmitter
}

const SETTLED_BAD: ReadonlySet<NodeStatus> = new Set(['failed', 'blocked', 'aborted'])

function describeError(err: unknown): { cause: string; errorCode?: string | undefined } {
  if (isSuitecraftError(err)) return { cause: err.message, errorCode: err.code }
  return { cause: err instanceof Error ? err.message : String(err) }
}

class TargetBuild {
  private readonly name: PlatformString
  private readonly outcomes = new Map<NodeId, NodeOutcome>()
  private readonly settled = new Map<NodeId, Promise<NodeOutcome>>()

  constructor(
    private readonly ctx: RunContext,
    private readonly platform: Platform,
    private readonly nodes: readonly NodeId[]
  ) {
    this.name = formatPlatform(platform)
  }

  async run(): Promise<TargetReport> {
    const started = Date.now()
    this.ctx.events.emit({ event: 'target_started', platform: this.name, nodes: this.nodes.length })

    const resolutions = this.resolveAll()
    if (resolutions.kind === 'aborted') {
      this.abort(resolutions.node, resolutions.error)
    } else {
      for (const id of this.nodes) {
        const resolution = resolutions.byNode.get(id)
        if (!resolution) continue
        this.settled.set(id, this.schedule(resolution))
      }
      await Promise.all(this.settled.values())
    }

    const nodes = this.nodes.flatMap((id) => {
      const outcome = this.outcomes.get(id)
      return outcome ? [outcome] : []
    })
    const exitCode = targetExitCode(nodes)
    const durationMs = Date.now() - started
    this.ctx.events.emit({ event: 'target_finished', platform: this.name, exitCode, durationMs })
    return { platform: this.platform, name: this.name, nodes, exitCode, durationMs }
  }

  /**
   * Resolve every node up front so a missing overlay branch abandons the
   * target before any toolchain runs.
   */
  private resolveAll():
    | { kind: 'resolved'; byNode: Map<NodeId, NodeResolution> }
    | { kind: 'aborted'; node: NodeId; error: OverlayResolutionError } {
    const byNode = new Map<NodeId, NodeResolution>()
    for (const id of this.nodes) {
      const node = this.ctx.graph.registry.get(id)
      if (!node) continue
      try {
        byNode.set(id, resolveNodeConfig(node, this.platform, this.ctx.graph.registry))
      } catch (err) {
        if (err instanceof OverlayResolutionError) return { kind: 'aborted', node: id, error: err }
        throw err
      }
    }
    return { kind: 'resolved', byNode }
  }

  private abort(offender: NodeId, error: OverlayResolutionError): void {
    for (const id of this.nodes) {
      const outcome: NodeOutcome =
        id === offender
          ? { id, status: 'failed', ...describeError(error), cacheHit: false, durationMs: 0 }
          : {
              id,
              status: 'aborted',
              cause: `target ${this.name} aborted: ${error.message}`,
              cacheHit: false,
              durationMs: 0,
            }
      this.finish(outcome)
    }
  }

  private finish(outcome: NodeOutcome): NodeOutcome {
    this.outcomes.set(outcome.id, outcome)
    this.ctx.events.emit({
      event: 'node_finished',
      platform: this.name,
      node: outcome.id,
      status: outcome.status,
      cacheHit: outcome.cacheHit,
      durationMs: outcome.durationMs,
      cause: outcome.cause,
    })
    return outcome
  }

  private skipped(id: NodeId, status: NodeStatus, cause: string): NodeOutcome {
    return this.finish({ id, status, cause, cacheHit: false, durationMs: 0 })
  }

  private async schedule(resolution: NodeResolution): Promise<NodeOutcome> {
    const id = resolution.node.id
    if (resolution.status === 'ignored') {
      return this.skipped(id, 'ignored', resolution.reason)
    }

    const deps = dependenciesOf(this.ctx.graph, id)
    const depOutcomes = await Promise.all(
      deps.flatMap((dep) => {
        const pending = this.settled.get(dep)
        return pending ? [pending] : []
      })
    )
    const broken = depOutcomes.find((d) => SETTLED_BAD.has(d.status))
    if (broken) return this.skipped(id, 'blocked', `dependency "${broken.id}" ${broken.status}`)
    const cancelledDep = depOutcomes.find((d) => d.status === 'cancelled')
    if (cancelledDep || this.ctx.signal?.aborted) return this.skipped(id, 'cancelled', 'build cancelled')

    return this.ctx.pool.run(async () => {
      if (this.ctx.signal?.aborted) return this.skipped(id, 'cancelled', 'build cancelled')
      const started = Date.now()
      this.ctx.events.emit({ event: 'node_started', platform: this.name, node: id })
      try {
        const result = await this.buildNode(resolution.node, resolution.config, depOutcomes)
        return this.finish({ id, status: 'built', ...result, durationMs: Date.now() - started })
      } catch (err) {
        const status: NodeStatus = err instanceof BuildCancelledError ? 'cancelled' : 'failed'
        return this.finish({
          id,
          status,
          ...describeError(err),
          cacheHit: false,
          durationMs: Date.now() - started,
        })
      }
    })
  }

  private async cacheKey(
    node: BuildNode,
    config: ResolvedNodeConfig,
    deps: readonly NodeOutcome[]
  ): Promise<string> {
    const registry = this.ctx.graph.registry
    const sourceHash =
      node.kind === 'project'
        ? await projectSourceHash(node, registry)
        : await distributionSourceHash(node, config, registry)
    return computeCacheKey({
      nodeId: node.id,
      config: cacheConfig(node, config),
      sourceHash,
      dependencyHashes: this.keyedDependencies(node, deps).map((d) => ({
        id: d.id,
        hash: d.outputHash ?? d.status,
      })),
      platform: node.platformDependent ? this.name : undefined,
    })
  }

  /**
   * Outcomes a node's output is derived from. A distribution layout can copy
   * from any node in its closure, so distributions key on the whole closure.
   */
  private keyedDependencies(node: BuildNode, deps: readonly NodeOutcome[]): NodeOutcome[] {
    if (node.kind !== 'distribution') return [...deps]
    return [...dependencyClosure(this.ctx.graph, node.id)]
      .sort(compareIds)
      .flatMap((id) => {
        const outcome = this.outcomes.get(id)
        return outcome ? [outcome] : []
      })
  }

  /**
   * Look up a cache entry; a corrupt entry is evicted and reported as a miss.
   */
  private async lookup(cache: BuildCache, node: NodeId, key: string): Promise<string | undefined> {
    try {
      return (await cache.lookup(key))?.outputHash
    } catch (err) {
      if (!(err instanceof CacheCorruptionError)) throw err
      await cache.evict(key)
      this.ctx.events.emit({
        event: 'cache_evicted',
        platform: this.name,
        node,
        cacheKey: key,
        reason: err.message,
      })
      return undefined
    }
  }

  private async buildNode(
    node: BuildNode,
    config: ResolvedNodeConfig,
    deps: readonly NodeOutcome[]
  ): Promise<{ cacheHit: boolean; outputDir: string; outputHash: string }> {
    const outputDir = this.ctx.paths.nodeOutput(this.platform, node.id)
    const cache = this.ctx.cache
    const key = cache ? await this.cacheKey(node, config, deps) : undefined

    if (cache && key) {
      const cached = await this.lookup(cache, node.id, key)
      if (cached) {
        await atomicDir(outputDir, (staging) => cache.restore(key, staging))
        return { cacheHit: true, outputDir, outputHash: cached }
      }
    }

    await atomicDir(outputDir, (staging) => this.produce(node, config, deps, staging))
    const outputHash = await computeTreeHash(outputDir)
    if (cache && key) {
      await cache.store(key, outputDir, {
        nodeId: node.id,
        platform: node.platformDependent ? this.name : undefined,
      })
    }
    return { cacheHit: false, outputDir, outputHash }
  }

  private async produce(
    node: BuildNode,
    config: ResolvedNodeConfig,
    deps: readonly NodeOutcome[],
    staging: string
  ): Promise<void> {
    if (node.kind === 'distribution' && config.layout) {
      await materialize(
        node,
        {
          platform: this.platform,
          graph: this.ctx.graph,
          layout: config.layout,
          outputOf: (id) => this.outcomes.get(id)?.outputDir,
        },
        staging
      )
      return
    }
    await this.ctx.toolchain.run(this.request(node, config, deps, staging), {
      timeout: this.ctx.timeout,
      gracePeriod: this.ctx.gracePeriod,
      signal: this.ctx.signal,
    })
  }

  private request(
    node: BuildNode,
    config: ResolvedNodeConfig,
    deps: readonly NodeOutcome[],
    staging: string
  ): ToolchainRequest {
    return {
      kind: toolchainKind(node),
      node: node.id,
      platform: this.name,
      sourceDir: sourceDir(node, this.ctx.graph.registry),
      sourceDirs: node.kind === 'project' ? node.sourceDirs : [],
      outputDir: staging,
      dependencies: deps.flatMap((d) => (d.outputDir ? [{ id: d.id, outputDir: d.outputDir }] : [])),
      artifact: primaryArtifactName(node, this.platform),
      compliance: node.kind === 'project' ? node.compliance : undefined,
      native: config.native,
      nativeKind: node.kind === 'project' ? node.native : undefined,
      deliverable: node.kind === 'project' ? node.deliverable : undefined,
    }
  }
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Build every requested target.
 *
 * Targets run concurrently over one worker pool. The returned report lists
 * every node of every target; it is returned (not thrown) when nodes fail.
 *
 * @throws SchemaError, UnresolvedReferenceError or CyclicDependencyError
 *   before anything is built
 *
 * @example
 * ```typescript
 * const suites = await loadSuites('./my-suite')
 * const report = await run(suites, [{ os: 'linux', arch: 'amd64' }], {
 *   outputRoot: './build',
 *   cacheDir: './.cache',
 *   jobs: 4,
 * })
 * process.exitCode = report.exitCode
 * ```
 */
export async function run(
  input: GraphInput,
  targets: readonly Platform[],
  options: RunOptions
): Promise<BuildReport> {
  const graph = toBuildGraph(input)
  const nodes = options.nodes ? subgraphFor(graph, options.nodes) : graph.order
  const paths = new PathResolver({ outputRoot: options.outputRoot, cacheDir: options.cacheDir })

  const ctx: RunContext = {
    graph,
    paths,
    cache: options.cache === false ? undefined : new BuildCache({ paths }),
    pool: new WorkerPool(options.jobs ?? 1),
    toolchain: options.toolchain ?? new CommandToolchain({ paths: options.toolchainPaths }),
    timeout: options.timeout ?? DEFAULT_TIMEOUT,
    gracePeriod: options.gracePeriod ?? DEFAULT_GRACE_PERIOD,
    signal: options.signal,
    events: options.events ?? new BuildEventEmitter(),
  }

  const reports = await Promise.all(targets.map((platform) => new TargetBuild(ctx, platform, nodes).run()))
  return createReport(reports, options.signal?.aborted ?? false)
}
