/**
 * Verify command - Check built distributions against their manifests.
 *
 * WHY: Output trees can be edited after a build. Recomputing the hash and
 * file manifests shows exactly which files were added, removed or changed.
 */

import type { Command } from 'commander'
import { formatPlatform } from '@suitecraft/core'
import { EXIT_CODES, verify } from '@suitecraft/engine'

import { type CliRuntime, type GlobalOptions, collect, getBuildContext, runAction } from '../helpers.js'
import * as ui from '../ui.js'

type VerifyOptions = GlobalOptions & {
  target?: string[] | undefined
}

/**
 * Register the verify command.
 */
export function registerVerifyCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('verify')
    .description('Verify a built distribution against its manifests')
    .argument('<distribution>', 'Distribution name, or suite:name')
    .option('-t, --target <platform>', 'Target platform, os-arch (repeatable)', collect)
    .action(async (name: string, _options: unknown, command: Command) =>
      runAction(runtime, async () => {
        const flags = command.optsWithGlobals<VerifyOptions>()
        const { suites, settings } = await getBuildContext(flags, runtime, flags)

        const { distribution, results } = await verify(suites, name, settings.targets, {
          outputRoot: settings.outputDir,
        })

        let ok = true
        for (const result of results) {
          const target = formatPlatform(result.platform)
          if (result.ok) {
            ui.success(`${distribution.id} ${target}`)
            continue
          }
          ok = false
          ui.error(`${distribution.id} ${target}`)
          for (const path of result.added) ui.treeItem(`${ui.colors.success('+')} ${path}`)
          for (const path of result.removed) ui.treeItem(`${ui.colors.error('-')} ${path}`)
          for (const path of result.changed) ui.treeItem(`${ui.colors.warn('~')} ${path}`)
        }
        runtime.exit(ok ? EXIT_CODES.success : EXIT_CODES.failed)
      })
    )
}
