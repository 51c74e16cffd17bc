/**
 * suitecraft executable.
 *
 * The first SIGINT cancels the running build: toolchains get their grace
 * period and the run ends with exit code 3. A second SIGINT exits at once.
 */

import { EXIT_CODES } from '@suitecraft/engine'

import { defaultRuntime, handleCliError } from './helpers.js'
import { createProgram } from './index.js'

const controller = new AbortController()

process.on('SIGINT', () => {
  if (controller.signal.aborted) {
    process.exit(EXIT_CODES.cancelled)
  }
  controller.abort()
})

const runtime = defaultRuntime(controller.signal)

try {
  await createProgram(runtime).parseAsync(process.argv)
} catch (error) {
  handleCliError(error, runtime)
}
