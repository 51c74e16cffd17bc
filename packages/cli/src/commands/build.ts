/**
 * Build command - Build every node of the suite set for each target.
 *
 * WHY: The everyday entrypoint. Nodes that fail leave their dependents
 * blocked while independent nodes keep building, so one run reports every
 * failure at once.
 */

import type { Command } from 'commander'
import { run } from '@suitecraft/engine'

import { type BuildFlags, type CliRuntime, collect, getBuildContext, runAction } from '../helpers.js'
import { printReport, runOptions, withProgress } from '../progress.js'

/**
 * Register the build command.
 */
export function registerBuildCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('build')
    .description('Build every project and distribution for each target platform')
    .option('-t, --target <platform>', 'Target platform, os-arch (repeatable)', collect)
    .option('-j, --jobs <n>', 'Parallel toolchain invocations')
    .option('--no-cache', 'Ignore the build cache')
    .action(async (_options: unknown, command: Command) =>
      runAction(runtime, async () => {
        const flags = command.optsWithGlobals<BuildFlags>()
        const { suites, settings } = await getBuildContext(flags, runtime, flags)

        const report = await withProgress('Building', flags, runtime, (events) =>
          run(suites, settings.targets, runOptions(settings, flags, runtime, events))
        )
        printReport(report)
        runtime.exit(report.exitCode)
      })
    )
}
