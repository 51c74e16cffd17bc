/**
 * JSON Schema validation for suite manifests
 */

import { createRequire } from 'node:module'
import { Ajv, type ErrorObject } from 'ajv'

import type { SchemaIssue } from '../errors.js'

const require = createRequire(import.meta.url)
const suiteSchema = require('./suite.schema.json')

// ============================================================================
// Raw manifest shapes (as decoded from TOML or JSON, after schema checks)
// ============================================================================

export type RawLayoutEntry = string | { source_type: 'string'; value: string }

export type RawLayout = Record<string, RawLayoutEntry | RawLayoutEntry[]>

/** os -> arch -> leaf table */
export type RawOsArch = Record<string, Record<string, Record<string, unknown>>>

export interface RawProject {
  subDir: string
  sourceDirs?: string[]
  dependencies?: string[]
  buildDependencies?: string[]
  annotationProcessors?: string[]
  compliance?: string
  javaCompliance?: string
  native?: 'shared_lib' | 'executable'
  deliverable?: string
  platformDependent?: boolean
  cflags?: string[]
  ldflags?: string[]
  ldlibs?: string[]
  toolchain?: string
  os_arch?: RawOsArch
  packages?: string[]
  artifact?: string
  license?: string
  description?: string
}

export interface RawModuleInfo {
  name: string
  exports?: string[]
  requires?: string[]
}

export interface RawDistribution {
  subDir?: string
  type?: 'archive' | 'dir'
  dependencies?: string[]
  distDependencies?: string[]
  layout?: RawLayout
  os_arch?: RawOsArch
  moduleInfo?: RawModuleInfo
  platformDependent?: boolean
  platforms?: string[]
  hashEntry?: string
  fileListEntry?: string
  artifact?: string
  description?: string
}

export interface RawBuildDefaults {
  jobs?: number
  targets?: string[]
  cacheDir?: string
  outputDir?: string
  toolchainPaths?: string[]
  timeout?: number
  gracePeriod?: number
}

export interface RawSuite {
  name: string
  version?: string
  engineVersion?: string
  imports?: { suites?: Array<{ name: string; subdir?: boolean }> }
  build?: RawBuildDefaults
  projects?: Record<string, RawProject>
  distributions?: Record<string, RawDistribution>
}

// ============================================================================
// Ajv instance setup
// ============================================================================

const ajv = new Ajv({
  strict: true,
  strictTypes: false,
  allErrors: true,
})

const validateSuiteSchema = ajv.compile<RawSuite>(suiteSchema)

export type ValidationResult<T> = { valid: true; data: T } | { valid: false; issues: SchemaIssue[] }

// ============================================================================
// Error formatting
// ============================================================================

/**
 * Convert a JSON pointer (`/projects/a.b/dependencies/2`) into an entity path
 * (`projects.a.b.dependencies[2]`).
 */
export function toEntityPath(pointer: string): string {
  if (pointer === '' || pointer === '/') return '/'
  let out = ''
  for (const raw of pointer.split('/').slice(1)) {
    const segment = raw.replace(/~1/g, '/').replace(/~0/g, '~')
    if (/^\d+$/.test(segment)) {
      out += `[${segment}]`
    } else {
      out += out === '' ? segment : `.${segment}`
    }
  }
  return out
}

function issueFor(err: ErrorObject): SchemaIssue {
  const base = toEntityPath(err.instancePath)
  if (err.keyword === 'required') {
    const missing = String(err.params['missingProperty'])
    return {
      path: base === '/' ? missing : `${base}.${missing}`,
      message: 'required field is missing',
    }
  }
  if (err.keyword === 'enum') {
    const allowed = err.params['allowedValues']
    return {
      path: base,
      message: `must be one of ${Array.isArray(allowed) ? allowed.join(', ') : String(allowed)}`,
    }
  }
  return { path: base, message: err.message ?? 'invalid value' }
}

function formatIssues(errors: ErrorObject[] | null | undefined): SchemaIssue[] {
  if (!errors) return []
  // anyOf reports every failed branch; keep the most specific message per path
  const seen = new Set<string>()
  const issues: SchemaIssue[] = []
  for (const err of errors) {
    if (err.keyword === 'anyOf') continue
    const issue = issueFor(err)
    if (seen.has(issue.path)) continue
    seen.add(issue.path)
    issues.push(issue)
  }
  return issues
}

// ============================================================================
// Validation functions
// ============================================================================

/**
 * Validate a decoded suite manifest against the JSON schema.
 */
export function validateSuiteManifest(data: unknown): ValidationResult<RawSuite> {
  if (validateSuiteSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, issues: formatIssues(validateSuiteSchema.errors) }
}

export { suiteSchema }
