/**
 * @suitecraft/cli - Command line interface for suitecraft.
 *
 * WHY: Provides a thin argument parsing layer that delegates
 * all build logic to the engine package. This keeps the CLI
 * focused on user interaction while the engine handles orchestration.
 */

import { Command } from 'commander'

import { ENGINE_VERSION } from '@suitecraft/core'

import { registerBuildCommand } from './commands/build.js'
import { registerCleanCommand } from './commands/clean.js'
import { registerDistCommand } from './commands/dist.js'
import { registerGraphCommand } from './commands/graph.js'
import { registerVerifyCommand } from './commands/verify.js'
import { type CliRuntime, collect, defaultRuntime } from './helpers.js'

export {
  type BuildFlags,
  type CliRuntime,
  type GlobalOptions,
  defaultRuntime,
  exitCodeFor,
  formatError,
} from './helpers.js'

/**
 * Create the CLI program.
 */
export function createProgram(overrides: Partial<CliRuntime> = {}): Command {
  const runtime: CliRuntime = { ...defaultRuntime(), ...overrides }

  const program = new Command()
    .name('suitecraft')
    .description('Build multi-platform software suites from declarative manifests')
    .version(ENGINE_VERSION)
    .option('-s, --suite <dir>', 'Primary suite directory', '.')
    .option('-o, --output <dir>', 'Output directory')
    .option('--cache-dir <dir>', 'Build cache directory')
    .option('--toolchain-path <dir>', 'Directory searched for toolchain commands (repeatable)', collect)
    .option('--timeout <ms>', 'Toolchain timeout in milliseconds')
    .option('--suite-path <dir>', 'Directory searched for referenced suites (repeatable)', collect)
    .option('--events <file>', 'Append build events to a JSONL file')

  registerBuildCommand(program, runtime)
  registerDistCommand(program, runtime)
  registerVerifyCommand(program, runtime)
  registerCleanCommand(program, runtime)
  registerGraphCommand(program, runtime)

  return program
}
