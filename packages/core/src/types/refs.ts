/**
 * Reference types for suite manifests
 *
 * A dependency reference is either a bare name (`com.acme.util`), resolved
 * within the referencing suite, or a suite-qualified pair
 * (`tools:TOOLS_API`). Resolution is deferred until every imported suite
 * has been loaded.
 */

/** Qualified node identifier: `<suite>:<name>` */
export type NodeId = `${string}:${string}`

/** Parsed dependency reference */
export interface DependencyRef {
  /** Owning suite, when the reference is suite-qualified */
  suite?: string | undefined
  /** Project or distribution name */
  name: string
  /** Reference exactly as written in the manifest */
  raw: string
}

const NAME_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9._-]*$/

export function isEntityName(value: string): boolean {
  return NAME_PATTERN.test(value)
}

export function asNodeId(suite: string, name: string): NodeId {
  return `${suite}:${name}`
}

/**
 * Split a node id at its first colon. Suite names never contain one.
 */
export function splitNodeId(id: NodeId): { suite: string; name: string } {
  const index = id.indexOf(':')
  return { suite: id.slice(0, index), name: id.slice(index + 1) }
}

/**
 * Qualify a reference against the suite that wrote it.
 */
export function qualifyRef(ref: DependencyRef, fromSuite: string): NodeId {
  return asNodeId(ref.suite ?? fromSuite, ref.name)
}
