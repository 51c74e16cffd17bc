/**
 * Reference extraction from build nodes.
 */

import type { BuildNode, DependencyRef, NativeConfig } from '@suitecraft/core'
import { parseDependencyRef } from '@suitecraft/core'

export type EdgeKind =
  | 'dependency'
  | 'distDependency'
  | 'buildDependency'
  | 'annotationProcessor'
  | 'toolchain'

export interface NodeReference {
  kind: EdgeKind
  ref: DependencyRef
  /** Reference must resolve (toolchain names may be opaque tool names) */
  required: boolean
}

/** `<path:name>` or `<path:suite:name>` inside a flag */
export const PATH_TOKEN = /<path:([^>]+)>/g

function nativeConfigs(node: BuildNode): NativeConfig[] {
  if (node.kind !== 'project') return []
  const configs = [node.config]
  for (const branch of node.osArch?.branches.values() ?? []) {
    for (const leaf of branch.values()) {
      if (leaf.kind === 'config') configs.push(leaf.value)
    }
  }
  return configs
}

/**
 * Every reference a node declares, in declaration order.
 */
export function nodeReferences(node: BuildNode): NodeReference[] {
  const out: NodeReference[] = node.dependencies.map((ref) => ({
    kind: 'dependency',
    ref,
    required: true,
  }))
  if (node.kind === 'distribution') {
    for (const ref of node.distDependencies) out.push({ kind: 'distDependency', ref, required: true })
    return out
  }
  for (const ref of node.buildDependencies) out.push({ kind: 'buildDependency', ref, required: true })
  for (const ref of node.annotationProcessors) {
    out.push({ kind: 'annotationProcessor', ref, required: true })
  }
  for (const config of nativeConfigs(node)) {
    if (config.toolchain === undefined) continue
    const parsed = parseDependencyRef(config.toolchain)
    if (parsed.ok) out.push({ kind: 'toolchain', ref: parsed.value, required: false })
  }
  return out
}

/**
 * References embedded in native flags as `<path:...>` tokens.
 */
export function pathTokenReferences(node: BuildNode): DependencyRef[] {
  const out: DependencyRef[] = []
  for (const config of nativeConfigs(node)) {
    for (const flag of [...config.cflags, ...config.ldflags, ...config.ldlibs]) {
      for (const match of flag.matchAll(PATH_TOKEN)) {
        const parsed = parseDependencyRef(match[1] ?? '')
        out.push(parsed.ok ? parsed.value : { name: match[1] ?? '', raw: match[1] ?? '' })
      }
    }
  }
  return out
}
