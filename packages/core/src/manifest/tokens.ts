/**
 * Parsers for the string grammars embedded in suite manifests:
 * dependency references, layout tokens and module exports.
 */

import type { LayoutEntry } from '../types/layout.js'
import type { DependencyRef } from '../types/refs.js'
import { isEntityName } from '../types/refs.js'
import type { ModuleExport } from '../types/suite.js'

export type ParseResult<T> = { ok: true; value: T } | { ok: false; message: string }

function fail<T>(message: string): ParseResult<T> {
  return { ok: false, message }
}

/**
 * Parse `name` or `suite:name`.
 */
export function parseDependencyRef(raw: string): ParseResult<DependencyRef> {
  const parts = raw.split(':')
  if (parts.length === 1) {
    const [name = ''] = parts
    if (!isEntityName(name)) return fail(`"${raw}" is not a valid reference`)
    return { ok: true, value: { name, raw } }
  }
  if (parts.length === 2) {
    const [suite = '', name = ''] = parts
    if (!isEntityName(suite) || !isEntityName(name)) {
      return fail(`"${raw}" is not a valid reference (expected <name> or <suite>:<name>)`)
    }
    return { ok: true, value: { suite, name, raw } }
  }
  return fail(`"${raw}" is not a valid reference (expected <name> or <suite>:<name>)`)
}

const LIB_SELECTOR_PATTERN = /^<lib:([A-Za-z0-9_][A-Za-z0-9._-]*)>$/

/**
 * Parse one layout entry (a token string or an inline content table).
 */
export function parseLayoutEntry(raw: unknown): ParseResult<LayoutEntry> {
  if (typeof raw === 'object' && raw !== null && !Array.isArray(raw)) {
    const sourceType = 'source_type' in raw ? raw.source_type : undefined
    const value = 'value' in raw ? raw.value : undefined
    if (sourceType !== 'string' || typeof value !== 'string') {
      return fail('inline entries need source_type = "string" and a string value')
    }
    return { ok: true, value: { kind: 'inline', content: value, token: `string:${value}` } }
  }
  if (typeof raw !== 'string' || raw.length === 0) {
    return fail('layout entries must be non-empty strings or inline tables')
  }

  if (raw.startsWith('file:')) {
    const path = raw.slice('file:'.length)
    if (path === '' || path.startsWith('/')) {
      return fail(`"${raw}" must name a path relative to the suite`)
    }
    return { ok: true, value: { kind: 'literal', path, token: raw } }
  }

  if (raw.startsWith('dependency:')) {
    const rest = raw.slice('dependency:'.length)
    const slash = rest.indexOf('/')
    const refPart = slash === -1 ? rest : rest.slice(0, slash)
    const selector = slash === -1 ? undefined : rest.slice(slash + 1)
    const ref = parseDependencyRef(refPart)
    if (!ref.ok) return fail(`"${raw}": ${ref.message}`)

    if (selector === undefined) {
      return { ok: true, value: { kind: 'dependency', ref: ref.value, token: raw } }
    }
    if (selector === '') {
      return fail(`"${raw}" has an empty selector after "/"`)
    }
    const lib = LIB_SELECTOR_PATTERN.exec(selector)
    if (lib) {
      return {
        ok: true,
        value: { kind: 'library', ref: ref.value, library: lib[1] ?? '', token: raw },
      }
    }
    if (selector.includes('<')) {
      return fail(`"${raw}" has an unknown selector "${selector}"`)
    }
    return {
      ok: true,
      value: { kind: 'dependency-glob', ref: ref.value, pattern: selector, token: raw },
    }
  }

  return fail(`"${raw}" is not a layout token (expected file: or dependency:)`)
}

/**
 * Parse a module export: `pkg` or `pkg1,pkg2 to mod1,mod2`.
 */
export function parseModuleExport(raw: string): ParseResult<ModuleExport> {
  const [left = '', right, extra] = raw.split(/\s+to\s+/)
  if (extra !== undefined) return fail(`"${raw}" has more than one "to" clause`)
  const split = (s: string) =>
    s
      .split(',')
      .map((p) => p.trim())
      .filter((p) => p.length > 0)
  const packages = split(left)
  const to = right === undefined ? [] : split(right)
  if (packages.length === 0) return fail(`"${raw}" exports no package`)
  if (right !== undefined && to.length === 0) return fail(`"${raw}" names no target module`)
  return { ok: true, value: { packages, to, raw } }
}
