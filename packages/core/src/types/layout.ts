/**
 * Distribution layout types
 *
 * Layout token grammar, parsed once at load time:
 * - `file:<path>`                               literal file from the suite tree
 * - `dependency:<suite>:<name>`                 primary artifact of a node
 * - `dependency:<suite>:<name>/*`               whole output tree of a node
 * - `dependency:<suite>:<name>/<pattern>`       matching files of a node
 * - `dependency:<suite>:<name>/<lib:<lib>>`     platform shared library
 * - `{ source_type = "string", value = "..." }` inline generated content
 */

import type { DependencyRef } from './refs.js'

/** Literal file inclusion, relative to the suite root */
export interface LiteralEntry {
  kind: 'literal'
  path: string
  token: string
}

/** Primary artifact of a dependency */
export interface DependencyEntry {
  kind: 'dependency'
  ref: DependencyRef
  token: string
}

/** Files of a dependency's output tree (`*` selects everything) */
export interface DependencyGlobEntry {
  kind: 'dependency-glob'
  ref: DependencyRef
  pattern: string
  token: string
}

/** Platform-specific shared library built by a dependency */
export interface LibraryEntry {
  kind: 'library'
  ref: DependencyRef
  library: string
  token: string
}

/** Inline generated content */
export interface InlineEntry {
  kind: 'inline'
  content: string
  token: string
}

export type LayoutEntry =
  | LiteralEntry
  | DependencyEntry
  | DependencyGlobEntry
  | LibraryEntry
  | InlineEntry

/** Every entry under one output path pattern */
export interface LayoutRule {
  /** Output path pattern; a trailing `/` makes it a directory */
  destination: string
  entries: LayoutEntry[]
}

export type Layout = LayoutRule[]
