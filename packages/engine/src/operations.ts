/**
 * Engine entrypoints beyond a full build: single distributions, verification,
 * cleaning and graph export.
 */

import { rm } from 'node:fs/promises'
import { join } from 'node:path'
import type { Distribution, Platform, SuiteSet } from '@suitecraft/core'
import {
  StoreError,
  UnresolvedReferenceError,
  VerificationError,
  formatPlatform,
  parseDependencyRef,
  pathExists,
} from '@suitecraft/core'
import { type VerifyResult, manifestPaths, verifyDistribution } from '@suitecraft/materializer'
import { type BuildGraph, type GraphFormat, formatGraph } from '@suitecraft/resolver'
import { BuildCache, PathResolver } from '@suitecraft/store'

import { type GraphInput, type RunOptions, run, toBuildGraph } from './build.js'
import type { BuildReport } from './report.js'

const COMMAND_LINE = '<command line>'

function isSuiteSet(input: GraphInput): input is SuiteSet {
  return typeof input === 'object' && input !== null && 'primary' in input && 'suites' in input
}

/** Suite bare names on the command line resolve against */
function primarySuite(graph: BuildGraph, input: GraphInput): string {
  if (isSuiteSet(input)) return input.primary.name
  const first = graph.registry.suites.keys().next()
  return first.done ? '' : first.value
}

/**
 * Find a distribution by `name` or `suite:name`.
 *
 * @throws UnresolvedReferenceError when no distribution has that name
 */
export function findDistribution(graph: BuildGraph, name: string, fromSuite = ''): Distribution {
  const ref = parseDependencyRef(name)
  const node = ref.ok ? graph.registry.resolve(ref.value, fromSuite) : undefined
  if (node?.kind !== 'distribution') throw new UnresolvedReferenceError(COMMAND_LINE, name)
  return node
}

// ============================================================================
// dist
// ============================================================================

/**
 * Build one distribution and the part of the graph it depends on.
 */
export async function buildDistribution(
  input: GraphInput,
  name: string,
  targets: readonly Platform[],
  options: Omit<RunOptions, 'nodes'>
): Promise<{ distribution: Distribution; report: BuildReport }> {
  const graph = toBuildGraph(input)
  const distribution = findDistribution(graph, name, primarySuite(graph, input))
  const report = await run(graph, targets, { ...options, nodes: [distribution.id] })
  return { distribution, report }
}

// ============================================================================
// verify
// ============================================================================

export interface VerifyTargetResult extends VerifyResult {
  platform: Platform
  /** Published distribution directory */
  dir: string
}

/**
 * Recompute a built distribution's manifests and compare them with the
 * stored ones, per target.
 *
 * @throws StoreError when the distribution has no manifests for a target
 */
export async function verify(
  input: GraphInput,
  name: string,
  targets: readonly Platform[],
  options: { outputRoot: string }
): Promise<{ distribution: Distribution; results: VerifyTargetResult[] }> {
  const graph = toBuildGraph(input)
  const distribution = findDistribution(graph, name, primarySuite(graph, input))
  const paths = new PathResolver({ outputRoot: options.outputRoot, cacheDir: options.outputRoot })

  const results: VerifyTargetResult[] = []
  for (const platform of targets) {
    const dir = paths.nodeOutput(platform, distribution.id)
    const entries = manifestPaths(distribution, platform)
    if (!(await pathExists(join(dir, entries.hashEntry)))) {
      throw new StoreError(
        `Distribution "${distribution.id}" has no manifest for ${formatPlatform(platform)} at ${join(dir, entries.hashEntry)}`,
        'MANIFEST_NOT_FOUND'
      )
    }
    results.push({ platform, dir, ...(await verifyDistribution(dir, entries)) })
  }
  return { distribution, results }
}

/**
 * @throws VerificationError for the first target that does not match
 */
export function assertVerified(distribution: Distribution, results: readonly VerifyTargetResult[]): void {
  const failed = results.find((r) => !r.ok)
  if (failed) {
    throw new VerificationError(distribution.id, failed.added, failed.removed, failed.changed)
  }
}

// ============================================================================
// clean
// ============================================================================

export interface CleanOptions {
  outputRoot: string
  cacheDir: string
  /** Also empty the build cache (default: false) */
  cache?: boolean | undefined
}

export interface CleanResult {
  outputRemoved: boolean
  cacheEntriesRemoved: number
}

export async function clean(options: CleanOptions): Promise<CleanResult> {
  const outputRemoved = await pathExists(options.outputRoot)
  await rm(options.outputRoot, { recursive: true, force: true })

  let cacheEntriesRemoved = 0
  if (options.cache) {
    const cache = new BuildCache({
      paths: new PathResolver({ outputRoot: options.outputRoot, cacheDir: options.cacheDir }),
    })
    cacheEntriesRemoved = await cache.clear()
  }
  return { outputRemoved, cacheEntriesRemoved }
}

// ============================================================================
// graph
// ============================================================================

export function exportGraph(input: GraphInput, format: GraphFormat): string {
  return formatGraph(toBuildGraph(input), format)
}
