/**
 * Per-target node configuration.
 *
 * Turns a node plus a platform into what the builder needs: the selected
 * native flags (projects) or layout (distributions), or an "ignored" outcome
 * when the node is not built for the platform.
 */

import { join } from 'node:path'
import type {
  BuildNode,
  Distribution,
  Layout,
  NativeConfig,
  Platform,
  Project,
} from '@suitecraft/core'
import {
  UnresolvedReferenceError,
  executableFileName,
  formatPlatform,
  libraryFileName,
  parseDependencyRef,
  samePlatform,
} from '@suitecraft/core'

import { type OverlayMatch, resolveOverlay } from './overlay.js'
import { PATH_TOKEN } from './references.js'
import type { Registry } from './registry.js'

export interface ResolvedNodeConfig {
  /** Native flags selected for the platform (projects) */
  native?: NativeConfig | undefined
  /** Layout selected for the platform (distributions) */
  layout?: Layout | undefined
  /** Overlay keys used, when the node has an overlay */
  overlay?: OverlayMatch | undefined
}

export type NodeResolution =
  | { status: 'active'; node: BuildNode; platform: Platform; config: ResolvedNodeConfig }
  | { status: 'ignored'; node: BuildNode; platform: Platform; reason: string }

/**
 * Source directory of a node: `<suite root>/<subDir>`.
 */
export function sourceDir(node: BuildNode, registry: Registry): string {
  const root = registry.suites.get(node.suite)?.root ?? '.'
  return node.subDir === undefined ? root : join(root, node.subDir)
}

function expandPaths(
  flags: readonly string[],
  node: BuildNode,
  registry: Registry
): string[] {
  return flags.map((flag) =>
    flag.replace(PATH_TOKEN, (_token, raw: string) => {
      const parsed = parseDependencyRef(raw)
      const target = parsed.ok ? registry.resolve(parsed.value, node.suite) : undefined
      if (!target) throw new UnresolvedReferenceError(node.id, raw)
      return sourceDir(target, registry)
    })
  )
}

function expandNative(config: NativeConfig, node: BuildNode, registry: Registry): NativeConfig {
  return {
    cflags: expandPaths(config.cflags, node, registry),
    ldflags: expandPaths(config.ldflags, node, registry),
    ldlibs: expandPaths(config.ldlibs, node, registry),
    toolchain: config.toolchain,
  }
}

function resolveProject(project: Project, platform: Platform, registry: Registry): NodeResolution {
  if (!project.osArch) {
    return {
      status: 'active',
      node: project,
      platform,
      config: { native: expandNative(project.config, project, registry) },
    }
  }
  const outcome = resolveOverlay(project.osArch, platform, project.id)
  if (outcome.kind === 'ignored') {
    return { status: 'ignored', node: project, platform, reason: outcome.reason }
  }
  return {
    status: 'active',
    node: project,
    platform,
    config: { native: expandNative(outcome.config, project, registry), overlay: outcome.match },
  }
}

function resolveDistribution(distribution: Distribution, platform: Platform): NodeResolution {
  if (distribution.platforms && !distribution.platforms.some((p) => samePlatform(p, platform))) {
    return {
      status: 'ignored',
      node: distribution,
      platform,
      reason: `not built for ${formatPlatform(platform)}`,
    }
  }
  if (!distribution.osArch) {
    return { status: 'active', node: distribution, platform, config: { layout: distribution.layout } }
  }
  const outcome = resolveOverlay(distribution.osArch, platform, distribution.id)
  if (outcome.kind === 'ignored') {
    return { status: 'ignored', node: distribution, platform, reason: outcome.reason }
  }
  return {
    status: 'active',
    node: distribution,
    platform,
    // a leaf replaces the layout only when it declares one
    config: { layout: outcome.config.layout ?? distribution.layout, overlay: outcome.match },
  }
}

/**
 * Resolve a node's configuration for one platform.
 *
 * @throws OverlayResolutionError when the node's overlay has no branch for
 *   the platform
 */
export function resolveNodeConfig(
  node: BuildNode,
  platform: Platform,
  registry: Registry
): NodeResolution {
  return node.kind === 'project'
    ? resolveProject(node, platform, registry)
    : resolveDistribution(node, platform)
}

/**
 * Filename of the node's primary artifact on a platform, or undefined when the
 * whole output tree is the artifact.
 */
export function primaryArtifactName(node: BuildNode, platform: Platform): string | undefined {
  if (node.artifact !== undefined) return node.artifact
  if (node.kind === 'project') {
    const base = node.deliverable ?? node.name
    if (node.native === 'shared_lib') return libraryFileName(base, platform.os)
    if (node.native === 'executable') return executableFileName(base, platform.os)
    return undefined
  }
  if (node.type === 'dir') return undefined
  return `${node.name.toLowerCase().replace(/_/g, '-')}.jar`
}
