/**
 * Module-info validation: every exported package must be physically present
 * in one of the distribution's constituent projects.
 */

import type { Distribution, NodeId, SchemaIssue } from '@suitecraft/core'
import { SchemaError } from '@suitecraft/core'

import type { BuildGraph } from './graph.js'

/**
 * Projects packaged into a distribution: reached through `dependencies`,
 * without descending into other distributions.
 */
export function constituentProjects(graph: BuildGraph, distribution: Distribution): NodeId[] {
  const found = new Set<NodeId>()
  const stack: NodeId[] = [distribution.id]
  const seen = new Set<NodeId>()
  for (let id = stack.pop(); id !== undefined; id = stack.pop()) {
    if (seen.has(id)) continue
    seen.add(id)
    for (const edge of graph.edges.get(id) ?? []) {
      if (edge.kind !== 'dependency') continue
      const target = graph.registry.get(edge.to)
      if (target?.kind !== 'project') continue
      found.add(target.id)
      stack.push(target.id)
    }
  }
  return [...found].sort()
}

/**
 * @throws SchemaError at `distributions.<name>.moduleInfo.exports[i]` for the
 *   first suite with a violation
 */
export function validateModuleInfo(graph: BuildGraph): void {
  for (const suite of graph.registry.suites.values()) {
    const issues: SchemaIssue[] = []
    for (const distribution of suite.distributions) {
      const info = distribution.moduleInfo
      if (!info) continue
      const present = new Set<string>()
      for (const id of constituentProjects(graph, distribution)) {
        const project = graph.registry.get(id)
        if (project?.kind === 'project') project.packages.forEach((p) => present.add(p))
      }
      for (const [i, entry] of info.exports.entries()) {
        const missing = entry.packages.filter((p) => !present.has(p))
        if (missing.length > 0) {
          issues.push({
            path: `distributions.${distribution.name}.moduleInfo.exports[${i}]`,
            message: `exported package ${missing.map((p) => `"${p}"`).join(', ')} is not in any constituent project`,
          })
        }
      }
    }
    if (issues.length > 0) throw new SchemaError(suite.source, issues)
  }
}
