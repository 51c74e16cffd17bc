/**
 * Graph export for `suitecraft graph`.
 */

import type { NodeId } from '@suitecraft/core'

import type { BuildGraph, Edge } from './graph.js'

export type GraphFormat = 'dot' | 'json'

export interface GraphJson {
  nodes: Array<{
    id: NodeId
    kind: 'project' | 'distribution'
    suite: string
    name: string
    platformDependent: boolean
    dependencies: Array<{ id: NodeId; kind: Edge['kind'] }>
  }>
  order: NodeId[]
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`
}

/**
 * Graphviz rendering; nodes and edges follow the build order.
 */
export function formatGraphDot(graph: BuildGraph): string {
  const lines = ['digraph suites {', '  rankdir=LR;']
  for (const id of graph.order) {
    const node = graph.registry.get(id)
    const shape = node?.kind === 'distribution' ? 'box' : 'ellipse'
    lines.push(`  ${quote(id)} [shape=${shape}];`)
  }
  for (const id of graph.order) {
    for (const edge of graph.edges.get(id) ?? []) {
      const style = edge.kind === 'dependency' ? '' : ` [style=dashed, label=${quote(edge.kind)}]`
      lines.push(`  ${quote(edge.from)} -> ${quote(edge.to)}${style};`)
    }
  }
  lines.push('}')
  return `${lines.join('\n')}\n`
}

export function toGraphJson(graph: BuildGraph): GraphJson {
  const nodes: GraphJson['nodes'] = []
  for (const id of graph.order) {
    const node = graph.registry.get(id)
    if (!node) continue
    nodes.push({
      id,
      kind: node.kind,
      suite: node.suite,
      name: node.name,
      platformDependent: node.platformDependent,
      dependencies: (graph.edges.get(id) ?? []).map((edge) => ({ id: edge.to, kind: edge.kind })),
    })
  }
  return { nodes, order: [...graph.order] }
}

export function formatGraphJson(graph: BuildGraph): string {
  return `${JSON.stringify(toGraphJson(graph), null, 2)}\n`
}

export function formatGraph(graph: BuildGraph, format: GraphFormat): string {
  return format === 'dot' ? formatGraphDot(graph) : formatGraphJson(graph)
}
