/**
 * Suite manifest model: raw decoded manifest -> typed Suite.
 *
 * WHY: The JSON schema checks the outer shape; the embedded grammars
 * (references, layout tokens, overlay leaves, platforms) are checked here so
 * every later stage works on typed values and never re-parses strings.
 * Nothing is resolved: references stay symbolic until the graph is built.
 */

import semver from 'semver'

import { type SchemaIssue, SchemaError } from '../errors.js'
import { parsePlatform } from '../platform.js'
import type { RawDistribution, RawProject, RawSuite } from '../schemas/index.js'
import { validateSuiteManifest } from '../schemas/index.js'
import type { Layout, LayoutEntry } from '../types/layout.js'
import type { OverlayBranch, OverlayLeaf, OverlaySpec } from '../types/overlay.js'
import type { Platform } from '../types/platform.js'
import type { DependencyRef } from '../types/refs.js'
import { asNodeId, isEntityName } from '../types/refs.js'
import type {
  BuildDefaults,
  Distribution,
  DistributionConfig,
  ModuleInfo,
  NativeConfig,
  Project,
  Suite,
} from '../types/suite.js'
import { parseDependencyRef, parseLayoutEntry, parseModuleExport } from './tokens.js'

export interface ParseSuiteOptions {
  /** Manifest path, used in error messages */
  source: string
  /** Directory the suite lives in */
  root: string
}

/**
 * Collects issues while walking a manifest.
 */
class IssueCollector {
  readonly issues: SchemaIssue[] = []

  add(path: string, message: string): void {
    this.issues.push({ path, message })
  }
}

function refs(raw: string[] | undefined, path: string, issues: IssueCollector): DependencyRef[] {
  const out: DependencyRef[] = []
  for (const [i, value] of (raw ?? []).entries()) {
    const parsed = parseDependencyRef(value)
    if (parsed.ok) {
      out.push(parsed.value)
    } else {
      issues.add(`${path}[${i}]`, parsed.message)
    }
  }
  return out
}

function stringList(value: unknown, path: string, issues: IssueCollector): string[] {
  if (value === undefined) return []
  if (!Array.isArray(value)) {
    issues.add(path, 'must be an array of strings')
    return []
  }
  const out: string[] = []
  for (const [i, item] of value.entries()) {
    if (typeof item === 'string') {
      out.push(item)
    } else {
      issues.add(`${path}[${i}]`, 'must be a string')
    }
  }
  return out
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse a layout table (`destination -> entry | entry[]`).
 */
function parseLayout(raw: unknown, path: string, issues: IssueCollector): Layout {
  if (!isTable(raw)) {
    issues.add(path, 'must be a table of output paths')
    return []
  }
  const layout: Layout = []
  for (const [destination, value] of Object.entries(raw)) {
    const entryPath = `${path}.${destination}`
    if (destination.trim() === '' || destination.startsWith('/')) {
      issues.add(entryPath, 'output path must be relative')
      continue
    }
    const items = Array.isArray(value) ? value : [value]
    const entries: LayoutEntry[] = []
    for (const [i, item] of items.entries()) {
      const parsed = parseLayoutEntry(item)
      if (parsed.ok) {
        entries.push(parsed.value)
      } else {
        issues.add(Array.isArray(value) ? `${entryPath}[${i}]` : entryPath, parsed.message)
      }
    }
    if (!destination.endsWith('/') && entries.length > 1) {
      issues.add(entryPath, 'a file destination takes exactly one entry (end it with "/" for a directory)')
    }
    layout.push({ destination, entries })
  }
  return layout
}

/**
 * Parse an `os_arch` table with a caller-supplied leaf parser.
 */
function parseOverlay<T>(
  raw: unknown,
  path: string,
  issues: IssueCollector,
  parseLeaf: (leaf: Record<string, unknown>, leafPath: string) => T
): OverlaySpec<T> {
  const branches = new Map<string, OverlayBranch<T>>()
  if (!isTable(raw)) {
    issues.add(path, 'must be a table keyed by operating system')
    return { branches }
  }
  for (const [os, archTable] of Object.entries(raw)) {
    const osPath = `${path}.${os}`
    if (!isTable(archTable)) {
      issues.add(osPath, 'must be a table keyed by architecture')
      continue
    }
    const branch = new Map<string, OverlayLeaf<T>>()
    for (const [arch, leaf] of Object.entries(archTable)) {
      const leafPath = `${osPath}.${arch}`
      if (!isTable(leaf)) {
        issues.add(leafPath, 'must be a table')
        continue
      }
      const ignore = leaf['ignore']
      if (ignore !== undefined && ignore !== false) {
        if (typeof ignore === 'string' && ignore.length > 0) {
          branch.set(arch, { kind: 'ignore', reason: ignore })
        } else if (ignore === true) {
          branch.set(arch, { kind: 'ignore', reason: 'unsupported platform' })
        } else {
          issues.add(`${leafPath}.ignore`, 'must be a reason string or true')
        }
        continue
      }
      branch.set(arch, { kind: 'config', value: parseLeaf(leaf, leafPath) })
    }
    branches.set(os, branch)
  }
  return { branches }
}

function nativeConfig(
  raw: Record<string, unknown>,
  path: string,
  issues: IssueCollector
): NativeConfig {
  const toolchain = raw['toolchain']
  if (toolchain !== undefined && typeof toolchain !== 'string') {
    issues.add(`${path}.toolchain`, 'must be a string')
  }
  return {
    cflags: stringList(raw['cflags'], `${path}.cflags`, issues),
    ldflags: stringList(raw['ldflags'], `${path}.ldflags`, issues),
    ldlibs: stringList(raw['ldlibs'], `${path}.ldlibs`, issues),
    toolchain: typeof toolchain === 'string' ? toolchain : undefined,
  }
}

function parseProject(
  suite: string,
  name: string,
  raw: RawProject,
  issues: IssueCollector
): Project {
  const path = `projects.${name}`
  const project: Project = {
    kind: 'project',
    id: asNodeId(suite, name),
    suite,
    name,
    subDir: raw.subDir,
    sourceDirs: raw.sourceDirs ?? ['src'],
    dependencies: refs(raw.dependencies, `${path}.dependencies`, issues),
    buildDependencies: refs(raw.buildDependencies, `${path}.buildDependencies`, issues),
    annotationProcessors: refs(raw.annotationProcessors, `${path}.annotationProcessors`, issues),
    compliance: raw.compliance ?? raw.javaCompliance,
    native: raw.native,
    deliverable: raw.deliverable,
    platformDependent: raw.platformDependent ?? raw.os_arch !== undefined,
    config: nativeConfig({ ...raw }, path, issues),
    packages: raw.packages ?? [name],
    artifact: raw.artifact,
    license: raw.license,
    description: raw.description,
  }
  if (raw.os_arch !== undefined) {
    project.osArch = parseOverlay(raw.os_arch, `${path}.os_arch`, issues, (leaf, leafPath) =>
      nativeConfig(leaf, leafPath, issues)
    )
  }
  if (raw.deliverable !== undefined && raw.native === undefined) {
    issues.add(`${path}.deliverable`, 'only native projects have a deliverable')
  }
  return project
}

function parseModuleInfo(
  raw: NonNullable<RawDistribution['moduleInfo']>,
  path: string,
  issues: IssueCollector
): ModuleInfo {
  const info: ModuleInfo = { name: raw.name, exports: [], requires: raw.requires ?? [] }
  for (const [i, value] of (raw.exports ?? []).entries()) {
    const parsed = parseModuleExport(value)
    if (parsed.ok) {
      info.exports.push(parsed.value)
    } else {
      issues.add(`${path}.exports[${i}]`, parsed.message)
    }
  }
  return info
}

function parsePlatforms(raw: string[], path: string, issues: IssueCollector): Platform[] {
  const platforms: Platform[] = []
  for (const [i, value] of raw.entries()) {
    try {
      platforms.push(parsePlatform(value))
    } catch (err) {
      issues.add(`${path}[${i}]`, err instanceof Error ? err.message : String(err))
    }
  }
  return platforms
}

function parseDistribution(
  suite: string,
  name: string,
  raw: RawDistribution,
  issues: IssueCollector
): Distribution {
  const path = `distributions.${name}`
  const distribution: Distribution = {
    kind: 'distribution',
    id: asNodeId(suite, name),
    suite,
    name,
    subDir: raw.subDir,
    type: raw.type ?? 'archive',
    dependencies: refs(raw.dependencies, `${path}.dependencies`, issues),
    distDependencies: refs(raw.distDependencies, `${path}.distDependencies`, issues),
    platformDependent: raw.platformDependent ?? raw.os_arch !== undefined,
    hashEntry: raw.hashEntry,
    fileListEntry: raw.fileListEntry,
    artifact: raw.artifact,
    description: raw.description,
  }
  if (raw.layout !== undefined) {
    distribution.layout = parseLayout(raw.layout, `${path}.layout`, issues)
  }
  if (raw.os_arch !== undefined) {
    distribution.osArch = parseOverlay<DistributionConfig>(
      raw.os_arch,
      `${path}.os_arch`,
      issues,
      (leaf, leafPath) =>
        leaf['layout'] === undefined
          ? {}
          : { layout: parseLayout(leaf['layout'], `${leafPath}.layout`, issues) }
    )
  }
  if (raw.moduleInfo !== undefined) {
    distribution.moduleInfo = parseModuleInfo(raw.moduleInfo, `${path}.moduleInfo`, issues)
  }
  if (raw.platforms !== undefined) {
    distribution.platforms = parsePlatforms(raw.platforms, `${path}.platforms`, issues)
  }
  for (const key of ['hashEntry', 'fileListEntry'] as const) {
    const value = raw[key]
    if (value !== undefined && (value.startsWith('/') || value.split('/').includes('..'))) {
      issues.add(`${path}.${key}`, 'must be a path inside the distribution')
    }
  }
  return distribution
}

function parseBuildDefaults(raw: RawSuite['build']): BuildDefaults {
  return {
    jobs: raw?.jobs,
    targets: raw?.targets,
    cacheDir: raw?.cacheDir,
    outputDir: raw?.outputDir,
    toolchainPaths: raw?.toolchainPaths,
    timeout: raw?.timeout,
    gracePeriod: raw?.gracePeriod,
  }
}

/**
 * Parse a decoded manifest into a typed Suite.
 *
 * @throws SchemaError listing every issue found, the first one in the message
 */
export function parseSuite(raw: unknown, options: ParseSuiteOptions): Suite {
  const result = validateSuiteManifest(raw)
  if (!result.valid) {
    throw new SchemaError(options.source, result.issues)
  }
  const data = result.data
  const issues = new IssueCollector()

  const version = data.version ?? '0.0.0'
  if (semver.valid(version) === null) {
    issues.add('version', `"${version}" is not a semantic version`)
  }
  if (data.engineVersion !== undefined && semver.validRange(data.engineVersion) === null) {
    issues.add('engineVersion', `"${data.engineVersion}" is not a version range`)
  }

  const projects: Project[] = []
  for (const [name, project] of Object.entries(data.projects ?? {})) {
    if (!isEntityName(name)) {
      issues.add(`projects.${name}`, 'invalid project name')
      continue
    }
    projects.push(parseProject(data.name, name, project, issues))
  }

  const distributions: Distribution[] = []
  for (const [name, distribution] of Object.entries(data.distributions ?? {})) {
    if (!isEntityName(name)) {
      issues.add(`distributions.${name}`, 'invalid distribution name')
      continue
    }
    if (data.projects?.[name] !== undefined) {
      issues.add(`distributions.${name}`, 'name is already used by a project')
      continue
    }
    distributions.push(parseDistribution(data.name, name, distribution, issues))
  }

  const imports = (data.imports?.suites ?? []).map((s) => ({
    name: s.name,
    subdir: s.subdir ?? false,
  }))

  for (const [i, value] of (data.build?.targets ?? []).entries()) {
    try {
      parsePlatform(value)
    } catch (err) {
      issues.add(`build.targets[${i}]`, err instanceof Error ? err.message : String(err))
    }
  }

  if (issues.issues.length > 0) {
    throw new SchemaError(options.source, issues.issues)
  }

  return {
    name: data.name,
    version,
    engineVersion: data.engineVersion,
    root: options.root,
    source: options.source,
    imports,
    projects,
    distributions,
    build: parseBuildDefaults(data.build),
  }
}

