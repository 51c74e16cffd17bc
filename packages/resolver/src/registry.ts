/**
 * Immutable node registry.
 *
 * WHY: Every resolver stage needs to look nodes up by qualified id and to
 * resolve symbolic references. The registry is built once per run from the
 * loaded suites and passed by reference, so concurrent target builds share it
 * without any global lookup table.
 */

import type { BuildNode, DependencyRef, NodeId, Suite, SuiteSet } from '@suitecraft/core'
import { SchemaError, asNodeId } from '@suitecraft/core'

function isSuiteSet(input: SuiteSet | Iterable<Suite>): input is SuiteSet {
  return 'primary' in input && 'suites' in input
}

export class Registry {
  readonly suites: ReadonlyMap<string, Suite>
  readonly nodes: ReadonlyMap<NodeId, BuildNode>
  /** Node ids by bare name; names are unique across the closure */
  private readonly byName: ReadonlyMap<string, NodeId>

  private constructor(
    suites: ReadonlyMap<string, Suite>,
    nodes: ReadonlyMap<NodeId, BuildNode>,
    byName: ReadonlyMap<string, NodeId>
  ) {
    this.suites = suites
    this.nodes = nodes
    this.byName = byName
  }

  /**
   * Build a registry from loaded suites.
   *
   * @throws SchemaError when a project or distribution name is defined twice
   *   within the closure
   */
  static create(input: SuiteSet | Iterable<Suite>): Registry {
    const list = isSuiteSet(input) ? [...input.suites.values()] : [...input]
    const suites = new Map<string, Suite>()
    const nodes = new Map<NodeId, BuildNode>()
    const byName = new Map<string, NodeId>()

    for (const suite of list) {
      if (suites.has(suite.name)) {
        throw new SchemaError(suite.source, [
          { path: 'name', message: `suite "${suite.name}" is loaded twice` },
        ])
      }
      suites.set(suite.name, suite)

      const entries: Array<[string, BuildNode]> = [
        ...suite.projects.map((p): [string, BuildNode] => [`projects.${p.name}`, p]),
        ...suite.distributions.map((d): [string, BuildNode] => [`distributions.${d.name}`, d]),
      ]
      for (const [path, node] of entries) {
        const existing = byName.get(node.name)
        if (existing !== undefined) {
          throw new SchemaError(suite.source, [
            { path, message: `name "${node.name}" is already defined as "${existing}"` },
          ])
        }
        byName.set(node.name, node.id)
        nodes.set(node.id, node)
      }
    }

    return new Registry(suites, nodes, byName)
  }

  get(id: NodeId): BuildNode | undefined {
    return this.nodes.get(id)
  }

  /**
   * Resolve a reference written in `fromSuite`.
   *
   * Qualified references name their suite. Bare names resolve within the
   * referencing suite first, then across the closure.
   */
  resolve(ref: DependencyRef, fromSuite: string): BuildNode | undefined {
    if (ref.suite !== undefined) {
      return this.nodes.get(asNodeId(ref.suite, ref.name))
    }
    const local = this.nodes.get(asNodeId(fromSuite, ref.name))
    if (local) return local
    const id = this.byName.get(ref.name)
    return id === undefined ? undefined : this.nodes.get(id)
  }

  /** Node ids in lexicographic order */
  ids(): NodeId[] {
    return [...this.nodes.keys()].sort(compareIds)
  }
}

/**
 * Create a registry; see Registry.create.
 */
export function createRegistry(input: SuiteSet | Iterable<Suite>): Registry {
  return Registry.create(input)
}

/** Code-unit order, identical on every platform and locale */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}
