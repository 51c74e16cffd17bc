/**
 * Platform overlay resolution.
 *
 * WHY: `os_arch` tables are free-form in the manifest. Resolution is a total,
 * pure function over the typed OverlaySpec: one OS branch, then one leaf, each
 * by exact key before the `<others>` wildcard. The selected leaf is returned
 * whole; fields from other leaves are never merged in.
 */

import type { OverlaySpec, Platform } from '@suitecraft/core'
import { OverlayResolutionError, WILDCARD, formatPlatform, osKey } from '@suitecraft/core'

/** Keys that matched at each level */
export interface OverlayMatch {
  os: string
  arch: string
}

export type OverlayResolution<T> =
  | { kind: 'config'; config: T; match: OverlayMatch }
  | { kind: 'ignored'; reason: string; match: OverlayMatch }

/**
 * OS keys tried in order: `os-variant` (when the platform has a variant),
 * plain `os`, then the wildcard.
 */
function osCandidates(platform: Platform): string[] {
  const keys = platform.variant ? [osKey(platform), platform.os] : [platform.os]
  return [...keys, WILDCARD]
}

/**
 * Resolve an overlay for a platform.
 *
 * @param node - Owning node id, for error messages
 * @throws OverlayResolutionError when a level has neither a matching key nor
 *   a wildcard
 */
export function resolveOverlay<T>(
  spec: OverlaySpec<T>,
  platform: Platform,
  node = '<overlay>'
): OverlayResolution<T> {
  const osMatch = osCandidates(platform).find((key) => spec.branches.has(key))
  const branch = osMatch === undefined ? undefined : spec.branches.get(osMatch)
  if (osMatch === undefined || branch === undefined) {
    throw new OverlayResolutionError(node, formatPlatform(platform), 'os', osKey(platform))
  }

  const archMatch = [platform.arch, WILDCARD].find((key) => branch.has(key))
  const leaf = archMatch === undefined ? undefined : branch.get(archMatch)
  if (archMatch === undefined || leaf === undefined) {
    throw new OverlayResolutionError(node, formatPlatform(platform), 'arch', platform.arch)
  }

  const match = { os: osMatch, arch: archMatch }
  return leaf.kind === 'ignore'
    ? { kind: 'ignored', reason: leaf.reason, match }
    : { kind: 'config', config: leaf.value, match }
}
