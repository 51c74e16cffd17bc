/**
 * Build progress rendering.
 *
 * WHY: The engine reports progress only as events. The CLI turns them into a
 * spinner while a build runs and a per-target summary once it is done.
 */

import { resolve } from 'node:path'
import type { Settings } from '@suitecraft/core'
import {
  type BuildEvent,
  type BuildEventEmitter,
  type BuildReport,
  type RunOptions,
  countStatuses,
  createEventEmitter,
} from '@suitecraft/engine'

import type { BuildFlags, CliRuntime } from './helpers.js'
import * as ui from './ui.js'

/**
 * Engine options for a build command.
 */
export function runOptions(
  settings: Settings,
  flags: BuildFlags,
  runtime: CliRuntime,
  events: BuildEventEmitter
): Omit<RunOptions, 'nodes'> {
  return {
    outputRoot: settings.outputDir,
    cacheDir: settings.cacheDir,
    jobs: settings.jobs,
    toolchain: runtime.toolchain,
    toolchainPaths: settings.toolchainPaths,
    timeout: settings.timeout,
    gracePeriod: settings.gracePeriod,
    signal: runtime.signal,
    cache: flags.cache,
    events,
  }
}

function describeEvent(event: BuildEvent): string | undefined {
  switch (event.event) {
    case 'node_started':
      return `${event.platform} ${event.node}`
    case 'cache_evicted':
      return `${event.platform} ${event.node}: evicted corrupt cache entry`
    default:
      return undefined
  }
}

/**
 * Run `body` with a spinner following its events, appending them to the
 * --events file when one was given.
 */
export async function withProgress<T>(
  label: string,
  flags: BuildFlags,
  runtime: CliRuntime,
  body: (events: BuildEventEmitter) => Promise<T>
): Promise<T> {
  const spinner = ui.createSpinner(label)
  const events = await createEventEmitter({
    outputPath: flags.events ? resolve(runtime.cwd, flags.events) : undefined,
    listeners: [
      (event) => {
        const text = describeEvent(event)
        if (text) spinner.text = ui.colors.muted(`${label} ${text}`)
      },
    ],
  })

  spinner.start()
  try {
    return await body(events)
  } finally {
    spinner.stop()
    await events.close()
  }
}

/**
 * Print every target's node outcomes and the run's totals.
 */
export function printReport(report: BuildReport): void {
  for (const target of report.targets) {
    ui.header(`${target.name} ${ui.colors.muted(`(${ui.formatDuration(target.durationMs)})`)}`)
    target.nodes.forEach((node, i) => {
      const hit = node.cacheHit ? ui.colors.dim(' cached') : ''
      const cause = node.cause ? ui.colors.muted(` ${node.cause.split('\n')[0] ?? ''}`) : ''
      ui.treeItem(`${ui.statusSymbol(node.status)} ${node.id}${hit}${cause}`, i === target.nodes.length - 1)
    })
  }

  const counts = countStatuses(report.targets.flatMap((t) => t.nodes))
  ui.summaryBlock([
    { label: 'Built', value: String(counts.built) },
    { label: 'Ignored', value: String(counts.ignored) },
    { label: 'Failed', value: String(counts.failed + counts.aborted) },
    { label: 'Blocked', value: String(counts.blocked) },
    { label: 'Cancelled', value: String(counts.cancelled) },
  ])
  console.log()

  if (report.cancelled) {
    ui.warning('Build cancelled')
  } else if (report.failures.length > 0) {
    for (const failure of report.failures) {
      ui.error(`${failure.platform} ${failure.node}`)
      for (const line of failure.cause.split('\n')) {
        console.error(ui.colors.muted(`  ${line}`))
      }
    }
  } else if (report.exitCode === 0) {
    ui.success('Build complete')
  }
}
