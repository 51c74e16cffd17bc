/**
 * Build settings resolution
 *
 * Precedence, highest first: explicit flag, environment variable, the
 * primary suite's `[build]` table, built-in default.
 */

import { availableParallelism, homedir } from 'node:os'
import { delimiter, join, resolve } from 'node:path'

import { type SchemaIssue, SchemaError } from './errors.js'
import { hostPlatform, parsePlatform } from './platform.js'
import type { Platform } from './types/platform.js'
import type { Suite } from './types/suite.js'

export const DEFAULT_TIMEOUT_MS = 600_000
export const DEFAULT_GRACE_PERIOD_MS = 5_000

/** Environment variables read by resolveSettings */
export const ENV = {
  HOME: 'SUITECRAFT_HOME',
  JOBS: 'SUITECRAFT_JOBS',
  TARGETS: 'SUITECRAFT_TARGETS',
  CACHE_DIR: 'SUITECRAFT_CACHE_DIR',
  TOOLCHAIN_PATH: 'SUITECRAFT_TOOLCHAIN_PATH',
  OUTPUT_DIR: 'SUITECRAFT_OUTPUT_DIR',
  TIMEOUT: 'SUITECRAFT_TIMEOUT',
  GRACE_PERIOD: 'SUITECRAFT_GRACE_PERIOD',
  SUITE_PATH: 'SUITECRAFT_SUITE_PATH',
} as const

export type Env = Readonly<Record<string, string | undefined>>

/** Values as given on the command line */
export interface SettingsFlags {
  jobs?: string | undefined
  targets?: string[] | undefined
  cacheDir?: string | undefined
  toolchainPaths?: string[] | undefined
  outputDir?: string | undefined
  timeout?: string | undefined
  suitePaths?: string[] | undefined
}

export interface Settings {
  jobs: number
  targets: Platform[]
  cacheDir: string
  toolchainPaths: string[]
  outputDir: string
  timeout: number
  gracePeriod: number
  suitePaths: string[]
  home: string
}

export interface ResolveSettingsOptions {
  flags?: SettingsFlags | undefined
  env?: Env | undefined
  /** Primary suite, for `[build]` defaults and the default output directory */
  suite?: Suite | undefined
  /** Base for relative flag and environment paths (default: process.cwd()) */
  cwd?: string | undefined
}

/**
 * SUITECRAFT_HOME, defaulting to ~/.suitecraft
 */
export function getSuitecraftHome(env: Env = process.env): string {
  return env[ENV.HOME] || join(homedir(), '.suitecraft')
}

function splitList(value: string, separator: string): string[] {
  return value
    .split(separator)
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
}

/**
 * Suite search path, needed before any suite is loaded.
 */
export function resolveSuitePaths(
  flags: SettingsFlags = {},
  env: Env = process.env,
  cwd: string = process.cwd()
): string[] {
  if (flags.suitePaths && flags.suitePaths.length > 0) {
    return flags.suitePaths.map((p) => resolve(cwd, p))
  }
  const fromEnv = env[ENV.SUITE_PATH]
  return fromEnv ? splitList(fromEnv, delimiter).map((p) => resolve(cwd, p)) : []
}

/** A value together with where it came from, for error paths */
interface Sourced<T> {
  value: T
  path: string
}

function pick<T>(...candidates: Array<Sourced<T | undefined>>): Sourced<T> | undefined {
  for (const candidate of candidates) {
    if (candidate.value !== undefined && candidate.value !== '') {
      return { value: candidate.value, path: candidate.path }
    }
  }
  return undefined
}

function integer(
  source: Sourced<string | number> | undefined,
  min: number,
  fallback: number,
  issues: SchemaIssue[]
): number {
  if (!source) return fallback
  const value = typeof source.value === 'number' ? source.value : Number(source.value.trim())
  if (!Number.isInteger(value) || value < min) {
    issues.push({ path: source.path, message: `must be an integer >= ${min}, got "${source.value}"` })
    return fallback
  }
  return value
}

function platforms(source: Sourced<string[]> | undefined, issues: SchemaIssue[]): Platform[] {
  if (!source) return [hostPlatform()]
  const out: Platform[] = []
  const seen = new Set<string>()
  for (const raw of source.value) {
    try {
      const platform = parsePlatform(raw)
      const key = raw.trim()
      if (seen.has(key)) continue
      seen.add(key)
      out.push(platform)
    } catch (err) {
      issues.push({ path: source.path, message: err instanceof Error ? err.message : String(err) })
    }
  }
  if (out.length === 0 && issues.length === 0) {
    issues.push({ path: source.path, message: 'no target platform given' })
  }
  return out
}

/**
 * Resolve every build setting.
 *
 * @throws SchemaError naming the flag, variable or manifest field at fault
 */
export function resolveSettings(options: ResolveSettingsOptions = {}): Settings {
  const flags = options.flags ?? {}
  const env = options.env ?? process.env
  const cwd = options.cwd ?? process.cwd()
  const suite = options.suite
  const build = suite?.build ?? {}
  const suiteRoot = suite?.root ?? cwd
  const issues: SchemaIssue[] = []

  const envList = (name: string, separator: string): string[] | undefined => {
    const value = env[name]
    return value ? splitList(value, separator) : undefined
  }
  const nonEmpty = (list: string[] | undefined): string[] | undefined =>
    list && list.length > 0 ? list : undefined

  const jobs = integer(
    pick<string | number>(
      { value: flags.jobs, path: '--jobs' },
      { value: env[ENV.JOBS], path: ENV.JOBS },
      { value: build.jobs, path: 'build.jobs' }
    ),
    1,
    availableParallelism(),
    issues
  )

  const targets = platforms(
    pick<string[]>(
      { value: nonEmpty(flags.targets), path: '--target' },
      { value: envList(ENV.TARGETS, ','), path: ENV.TARGETS },
      { value: nonEmpty(build.targets), path: 'build.targets' }
    ),
    issues
  )

  const timeout = integer(
    pick<string | number>(
      { value: flags.timeout, path: '--timeout' },
      { value: env[ENV.TIMEOUT], path: ENV.TIMEOUT },
      { value: build.timeout, path: 'build.timeout' }
    ),
    1,
    DEFAULT_TIMEOUT_MS,
    issues
  )

  const gracePeriod = integer(
    pick<string | number>(
      { value: env[ENV.GRACE_PERIOD], path: ENV.GRACE_PERIOD },
      { value: build.gracePeriod, path: 'build.gracePeriod' }
    ),
    0,
    DEFAULT_GRACE_PERIOD_MS,
    issues
  )

  if (issues.length > 0) {
    throw new SchemaError('settings', issues)
  }

  const home = getSuitecraftHome(env)
  const dir = (flag: string | undefined, envName: string, manifest: string | undefined) => {
    if (flag) return resolve(cwd, flag)
    const fromEnv = env[envName]
    if (fromEnv) return resolve(cwd, fromEnv)
    if (manifest) return resolve(suiteRoot, manifest)
    return undefined
  }

  const toolchainPaths =
    nonEmpty(flags.toolchainPaths)?.map((p) => resolve(cwd, p)) ??
    envList(ENV.TOOLCHAIN_PATH, delimiter)?.map((p) => resolve(cwd, p)) ??
    (build.toolchainPaths ?? []).map((p) => resolve(suiteRoot, p))

  return {
    jobs,
    targets,
    cacheDir: dir(flags.cacheDir, ENV.CACHE_DIR, build.cacheDir) ?? join(home, 'cache'),
    toolchainPaths,
    outputDir: dir(flags.outputDir, ENV.OUTPUT_DIR, build.outputDir) ?? join(suiteRoot, 'build'),
    timeout,
    gracePeriod,
    suitePaths: resolveSuitePaths(flags, env, cwd),
    home,
  }
}
