/**
 * Dist command - Build one distribution and what it depends on.
 */

import type { Command } from 'commander'
import { formatPlatform } from '@suitecraft/core'
import { buildDistribution, findOutcome } from '@suitecraft/engine'

import { type BuildFlags, type CliRuntime, collect, getBuildContext, runAction } from '../helpers.js'
import { printReport, runOptions, withProgress } from '../progress.js'
import * as ui from '../ui.js'

/**
 * Register the dist command.
 */
export function registerDistCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('dist')
    .description('Build a distribution and its dependencies')
    .argument('<name>', 'Distribution name, or suite:name')
    .option('-t, --target <platform>', 'Target platform, os-arch (repeatable)', collect)
    .option('-j, --jobs <n>', 'Parallel toolchain invocations')
    .option('--no-cache', 'Ignore the build cache')
    .action(async (name: string, _options: unknown, command: Command) =>
      runAction(runtime, async () => {
        const flags = command.optsWithGlobals<BuildFlags>()
        const { suites, settings } = await getBuildContext(flags, runtime, flags)

        const { distribution, report } = await withProgress(`Packaging ${name}`, flags, runtime, (events) =>
          buildDistribution(suites, name, settings.targets, runOptions(settings, flags, runtime, events))
        )
        printReport(report)

        for (const platform of settings.targets) {
          const outcome = findOutcome(report, formatPlatform(platform), distribution.id)
          if (outcome?.status === 'built' && outcome.outputDir) {
            ui.treeItem(`${formatPlatform(platform)} ${ui.formatPath(outcome.outputDir)}`)
          }
        }
        runtime.exit(report.exitCode)
      })
    )
}
