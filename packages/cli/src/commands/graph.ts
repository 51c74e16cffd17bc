/**
 * Graph command - Print the build graph.
 */

import { type Command, Option } from 'commander'
import { exportGraph } from '@suitecraft/engine'
import type { GraphFormat } from '@suitecraft/resolver'

import { type CliRuntime, type GlobalOptions, getBuildContext, runAction } from '../helpers.js'

type GraphOptions = GlobalOptions & {
  format: GraphFormat
}

export function registerGraphCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('graph')
    .description('Print the build graph')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['dot', 'json']).default('dot'))
    .action(async (_options: unknown, command: Command) =>
      runAction(runtime, async () => {
        const flags = command.optsWithGlobals<GraphOptions>()
        const { suites } = await getBuildContext(flags, runtime)
        process.stdout.write(exportGraph(suites, flags.format))
      })
    )
}
