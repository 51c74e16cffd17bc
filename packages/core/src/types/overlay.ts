/**
 * Platform overlay tables
 *
 * An overlay is keyed first by operating system, then by architecture. Either
 * level may carry the wildcard key, matched only when no explicit key applies.
 * Leaves are never merged: the selected leaf is the whole configuration.
 */

/** Wildcard key matching any otherwise unmatched OS or architecture */
export const WILDCARD = '<others>'

/** A resolved overlay leaf */
export type OverlayLeaf<T> =
  | { kind: 'config'; value: T }
  | { kind: 'ignore'; reason: string }

/** Architecture-level table */
export type OverlayBranch<T> = ReadonlyMap<string, OverlayLeaf<T>>

/** Two-level overlay keyed by OS, then architecture */
export interface OverlaySpec<T> {
  readonly branches: ReadonlyMap<string, OverlayBranch<T>>
}
