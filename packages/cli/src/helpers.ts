/**
 * Shared CLI helper utilities.
 *
 * WHY: Every command loads the same suite set and resolves the same settings
 * from flags, environment and manifest defaults; error reporting and exit
 * codes are identical across commands too.
 */

import { resolve } from 'node:path'
import type { Env, Settings, SettingsFlags, SuiteSet } from '@suitecraft/core'
import {
  BuildCancelledError,
  ENGINE_VERSION,
  SchemaError,
  isStructuralError,
  loadSuites,
  resolveSettings,
  resolveSuitePaths,
} from '@suitecraft/core'
import { EXIT_CODES, type ExitCode, type Toolchain } from '@suitecraft/engine'

import * as ui from './ui.js'

/**
 * Options every command accepts (declared on the program).
 */
export type GlobalOptions = {
  suite?: string | undefined
  output?: string | undefined
  cacheDir?: string | undefined
  toolchainPath?: string[] | undefined
  timeout?: string | undefined
  suitePath?: string[] | undefined
  events?: string | undefined
}

/**
 * Options of the commands that run builds.
 */
export type BuildFlags = GlobalOptions & {
  target?: string[] | undefined
  jobs?: string | undefined
  /** False under --no-cache */
  cache: boolean
}

/**
 * Per-process state handed to every command.
 */
export interface CliRuntime {
  env: Env
  cwd: string
  /** Aborted on SIGINT */
  signal?: AbortSignal | undefined
  /** Replaces the command toolchain (embedding and tests) */
  toolchain?: Toolchain | undefined
  /** Records the exit code (default: sets process.exitCode) */
  exit: (code: ExitCode) => void
}

export function defaultRuntime(signal?: AbortSignal): CliRuntime {
  return {
    env: process.env,
    cwd: process.cwd(),
    signal,
    exit: (code) => {
      process.exitCode = code
    },
  }
}

/** Commander argument parser for repeatable options */
export function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value]
}

/**
 * Loaded suites together with the settings that apply to them.
 */
export interface BuildContext {
  suites: SuiteSet
  settings: Settings
}

/**
 * Load the suite set and resolve settings.
 *
 * @throws SchemaError for malformed manifests or settings
 */
export async function getBuildContext(
  globals: GlobalOptions,
  runtime: CliRuntime,
  flags: Pick<BuildFlags, 'jobs' | 'target'> = {}
): Promise<BuildContext> {
  const settingsFlags: SettingsFlags = {
    jobs: flags.jobs,
    targets: flags.target,
    cacheDir: globals.cacheDir,
    toolchainPaths: globals.toolchainPath,
    outputDir: globals.output,
    timeout: globals.timeout,
    suitePaths: globals.suitePath,
  }
  const suiteDir = resolve(runtime.cwd, globals.suite ?? '.')
  const suites = await loadSuites(suiteDir, {
    searchPaths: resolveSuitePaths(settingsFlags, runtime.env, runtime.cwd),
    engineVersion: ENGINE_VERSION,
  })
  const settings = resolveSettings({
    flags: settingsFlags,
    env: runtime.env,
    suite: suites.primary,
    cwd: runtime.cwd,
  })
  return { suites, settings }
}

/**
 * Exit code for an error that escaped a command.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (isStructuralError(error)) return EXIT_CODES.structural
  if (error instanceof BuildCancelledError) return EXIT_CODES.cancelled
  return EXIT_CODES.failed
}

/**
 * Lines describing an error; schema errors list each issue.
 */
export function formatError(error: unknown): string[] {
  if (error instanceof SchemaError && error.issues.length > 1) {
    return [
      `${error.source}: ${error.issues.length} problems`,
      ...error.issues.map((issue) => `  ${issue.path}: ${issue.message}`),
    ]
  }
  if (error instanceof Error) return error.message.split('\n')
  return [String(error)]
}

/**
 * Print an error and record its exit code.
 */
export function handleCliError(error: unknown, runtime: CliRuntime): void {
  const [first = 'unknown error', ...rest] = formatError(error)
  ui.error(first)
  for (const line of rest) {
    console.error(ui.colors.muted(line))
  }
  runtime.exit(exitCodeFor(error))
}

/**
 * Run a command body, routing errors through handleCliError.
 */
export async function runAction(runtime: CliRuntime, body: () => Promise<void>): Promise<void> {
  try {
    await body()
  } catch (error) {
    handleCliError(error, runtime)
  }
}
