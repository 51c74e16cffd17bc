/**
 * Clean command - Remove build outputs, and optionally the cache.
 */

import type { Command } from 'commander'
import { clean } from '@suitecraft/engine'

import { type CliRuntime, type GlobalOptions, getBuildContext, runAction } from '../helpers.js'
import * as ui from '../ui.js'

type CleanCommandOptions = GlobalOptions & {
  cache?: boolean | undefined
}

/**
 * Register the clean command.
 */
export function registerCleanCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('clean')
    .description('Remove the output directory')
    .option('--cache', 'Also empty the build cache')
    .action(async (_options: unknown, command: Command) =>
      runAction(runtime, async () => {
        const flags = command.optsWithGlobals<CleanCommandOptions>()
        const { settings } = await getBuildContext(flags, runtime)

        const result = await clean({
          outputRoot: settings.outputDir,
          cacheDir: settings.cacheDir,
          cache: flags.cache,
        })

        if (result.outputRemoved) {
          ui.success(`Removed ${ui.formatPath(settings.outputDir)}`)
        } else {
          console.log(ui.colors.muted(`Nothing to remove at ${ui.formatPath(settings.outputDir)}`))
        }
        if (flags.cache) {
          ui.success(`Removed ${result.cacheEntriesRemoved} cache entries`)
        }
      })
    )
}
