/**
 * Build reports and exit codes.
 *
 * Node statuses:
 * - built: output published (from a toolchain, the materializer or the cache)
 * - ignored: the node is not built for the platform
 * - failed: the node's own step failed
 * - blocked: a dependency did not build
 * - cancelled: the run was cancelled before or while the node ran
 * - aborted: the whole target was abandoned before any node ran
 */

import type { NodeId, Platform, PlatformString } from '@suitecraft/core'

export type NodeStatus = 'built' | 'ignored' | 'failed' | 'blocked' | 'cancelled' | 'aborted'

export const EXIT_CODES = {
  success: 0,
  failed: 1,
  structural: 2,
  cancelled: 3,
} as const

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES]

export interface NodeOutcome {
  id: NodeId
  status: NodeStatus
  /** Why the node was not built */
  cause?: string | undefined
  /** Error code of the failure, when there is one */
  errorCode?: string | undefined
  cacheHit: boolean
  durationMs: number
  /** Published output directory, for built nodes */
  outputDir?: string | undefined
  /** Output tree integrity, for built nodes */
  outputHash?: string | undefined
}

export interface TargetReport {
  platform: Platform
  name: PlatformString
  /** Outcomes in build order */
  nodes: NodeOutcome[]
  exitCode: ExitCode
  durationMs: number
}

export interface BuildFailure {
  platform: PlatformString
  node: NodeId
  cause: string
}

export interface BuildReport {
  targets: TargetReport[]
  /** Every failure across all targets */
  failures: BuildFailure[]
  exitCode: ExitCode
  cancelled: boolean
}

export type StatusCounts = Record<NodeStatus, number>

export function countStatuses(nodes: readonly NodeOutcome[]): StatusCounts {
  const counts: StatusCounts = { built: 0, ignored: 0, failed: 0, blocked: 0, cancelled: 0, aborted: 0 }
  for (const node of nodes) counts[node.status]++
  return counts
}

/**
 * Exit code of one target: cancelled beats failed beats success.
 */
export function targetExitCode(nodes: readonly NodeOutcome[]): ExitCode {
  const counts = countStatuses(nodes)
  if (counts.cancelled > 0) return EXIT_CODES.cancelled
  if (counts.failed > 0 || counts.blocked > 0 || counts.aborted > 0) return EXIT_CODES.failed
  return EXIT_CODES.success
}

/**
 * Worst exit code across targets, with the same precedence.
 */
export function aggregateExitCode(targets: readonly TargetReport[]): ExitCode {
  const codes = targets.map((t) => t.exitCode)
  if (codes.includes(EXIT_CODES.cancelled)) return EXIT_CODES.cancelled
  if (codes.includes(EXIT_CODES.failed)) return EXIT_CODES.failed
  return EXIT_CODES.success
}

export function collectFailures(targets: readonly TargetReport[]): BuildFailure[] {
  const failures: BuildFailure[] = []
  for (const target of targets) {
    for (const node of target.nodes) {
      if (node.status === 'failed') {
        failures.push({ platform: target.name, node: node.id, cause: node.cause ?? 'failed' })
      }
    }
  }
  return failures
}

export function createReport(targets: TargetReport[], cancelled: boolean): BuildReport {
  return {
    targets,
    failures: collectFailures(targets),
    exitCode: cancelled ? EXIT_CODES.cancelled : aggregateExitCode(targets),
    cancelled,
  }
}

/**
 * Outcome of a node on one target.
 */
export function findOutcome(report: BuildReport, platform: PlatformString, id: NodeId): NodeOutcome | undefined {
  return report.targets.find((t) => t.name === platform)?.nodes.find((n) => n.id === id)
}
