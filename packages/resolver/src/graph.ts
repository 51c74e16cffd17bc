/**
 * Dependency graph construction and deterministic build order.
 *
 * WHY: Hash manifests and cache keys must not vary between otherwise
 * identical builds, so the build order is a pure function of the manifests:
 * Kahn's algorithm over a ready set kept in code-unit order of node ids.
 * Cycles are found first with a three-colour DFS so the error can report the
 * exact path.
 */

import type { BuildNode, NodeId, Suite, SuiteSet } from '@suitecraft/core'
import { CyclicDependencyError, UnresolvedReferenceError } from '@suitecraft/core'

import { validateModuleInfo } from './module-info.js'
import { type EdgeKind, nodeReferences, pathTokenReferences } from './references.js'
import { Registry, compareIds } from './registry.js'

/** A resolved reference, from dependent to dependency */
export interface Edge {
  from: NodeId
  to: NodeId
  kind: EdgeKind
}

export interface BuildGraph {
  readonly registry: Registry
  /** Outgoing edges per node, one per dependency, in declaration order */
  readonly edges: ReadonlyMap<NodeId, readonly Edge[]>
  /** Direct dependents per node, sorted */
  readonly reverse: ReadonlyMap<NodeId, readonly NodeId[]>
  /** Dependencies first, ties broken by node id */
  readonly order: readonly NodeId[]
}

export interface GraphResult {
  graph: BuildGraph
  order: NodeId[]
}

function resolveEdges(registry: Registry): Map<NodeId, Edge[]> {
  const edges = new Map<NodeId, Edge[]>()
  for (const id of registry.ids()) {
    const node = registry.get(id)
    if (!node) continue
    const out: Edge[] = []
    const seen = new Set<NodeId>()
    for (const reference of nodeReferences(node)) {
      const target = registry.resolve(reference.ref, node.suite)
      if (!target) {
        if (reference.required) throw new UnresolvedReferenceError(id, reference.ref.raw)
        continue
      }
      if (seen.has(target.id)) continue
      seen.add(target.id)
      out.push({ from: id, to: target.id, kind: reference.kind })
    }
    for (const ref of pathTokenReferences(node)) {
      if (!registry.resolve(ref, node.suite)) throw new UnresolvedReferenceError(id, ref.raw)
    }
    edges.set(id, out)
  }
  return edges
}

/**
 * Three-colour DFS. Throws on the first back edge with the cycle it closes.
 */
function detectCycles(ids: readonly NodeId[], edges: ReadonlyMap<NodeId, readonly Edge[]>): void {
  const state = new Map<NodeId, 'visiting' | 'visited'>()
  const path: NodeId[] = []

  const visit = (id: NodeId): void => {
    const current = state.get(id)
    if (current === 'visited') return
    if (current === 'visiting') {
      throw new CyclicDependencyError([...path.slice(path.indexOf(id)), id])
    }
    state.set(id, 'visiting')
    path.push(id)
    for (const edge of edges.get(id) ?? []) visit(edge.to)
    path.pop()
    state.set(id, 'visited')
  }

  for (const id of ids) visit(id)
}

/**
 * Kahn's algorithm; the smallest ready id is always taken next.
 */
function topologicalOrder(
  ids: readonly NodeId[],
  edges: ReadonlyMap<NodeId, readonly Edge[]>,
  reverse: ReadonlyMap<NodeId, readonly NodeId[]>
): NodeId[] {
  const remaining = new Map<NodeId, number>()
  for (const id of ids) remaining.set(id, edges.get(id)?.length ?? 0)

  const ready = ids.filter((id) => remaining.get(id) === 0)
  const order: NodeId[] = []

  while (ready.length > 0) {
    ready.sort(compareIds)
    const id = ready.shift()
    if (id === undefined) break
    order.push(id)
    for (const dependent of reverse.get(id) ?? []) {
      const left = (remaining.get(dependent) ?? 0) - 1
      remaining.set(dependent, left)
      if (left === 0) ready.push(dependent)
    }
  }
  return order
}

/**
 * Resolve every reference and compute the build order.
 *
 * @throws SchemaError for duplicate names or module-info violations
 * @throws UnresolvedReferenceError for references naming nothing
 * @throws CyclicDependencyError when the reference graph has a cycle
 */
export function buildGraph(input: SuiteSet | Iterable<Suite> | Registry): GraphResult {
  const registry = input instanceof Registry ? input : Registry.create(input)
  const ids = registry.ids()
  const edges = resolveEdges(registry)
  detectCycles(ids, edges)

  const reverseLists = new Map<NodeId, NodeId[]>(ids.map((id): [NodeId, NodeId[]] => [id, []]))
  for (const list of edges.values()) {
    for (const edge of list) reverseLists.get(edge.to)?.push(edge.from)
  }
  for (const list of reverseLists.values()) list.sort(compareIds)

  const order = topologicalOrder(ids, edges, reverseLists)
  const graph: BuildGraph = { registry, edges, reverse: reverseLists, order }
  validateModuleInfo(graph)
  return { graph, order: [...order] }
}

// ============================================================================
// Graph queries
// ============================================================================

/** Direct dependencies of a node */
export function dependenciesOf(graph: BuildGraph, id: NodeId): NodeId[] {
  return (graph.edges.get(id) ?? []).map((edge) => edge.to)
}

export function getNode(graph: BuildGraph, id: NodeId): BuildNode {
  const node = graph.registry.get(id)
  if (!node) throw new Error(`Unknown node "${id}"`)
  return node
}

function walk(
  start: readonly NodeId[],
  next: (id: NodeId) => readonly NodeId[]
): Set<NodeId> {
  const seen = new Set<NodeId>()
  const stack = [...start.flatMap(next)]
  for (let id = stack.pop(); id !== undefined; id = stack.pop()) {
    if (seen.has(id)) continue
    seen.add(id)
    stack.push(...next(id))
  }
  return seen
}

/**
 * Transitive dependencies of a node, excluding the node itself.
 */
export function dependencyClosure(graph: BuildGraph, id: NodeId): Set<NodeId> {
  return walk([id], (n) => dependenciesOf(graph, n))
}

/**
 * Transitive dependents of a node, sorted.
 */
export function dependents(graph: BuildGraph, id: NodeId): NodeId[] {
  return [...walk([id], (n) => graph.reverse.get(n) ?? [])].sort(compareIds)
}

/**
 * The nodes in `ids` and everything they depend on, in build order.
 */
export function subgraphFor(graph: BuildGraph, ids: readonly NodeId[]): NodeId[] {
  const keep = new Set<NodeId>(ids)
  for (const id of ids) {
    for (const dep of dependencyClosure(graph, id)) keep.add(dep)
  }
  return graph.order.filter((id) => keep.has(id))
}
