/**
 * External toolchain invocation.
 *
 * WHY: Compilers, linkers and archivers are opaque collaborators. The engine
 * hands each one a JSON request on stdin and judges it only by its exit code,
 * so any executable named `suitecraft-<kind>` on the toolchain search path can
 * take part in a build. Commands are spawned from argv (no shell).
 */

import { spawn } from 'node:child_process'
import { delimiter } from 'node:path'
import type { BuildNode, NativeConfig, NodeId, PlatformString } from '@suitecraft/core'
import { BuildCancelledError, ToolchainError } from '@suitecraft/core'

// ============================================================================
// Requests
// ============================================================================

/** Which external step builds a node */
export type ToolchainKind = 'native' | 'compile' | 'archive'

export interface ToolchainDependency {
  id: NodeId
  /** Published output directory for the same target */
  outputDir: string
}

export interface ToolchainRequest {
  kind: ToolchainKind
  node: NodeId
  platform: PlatformString
  /** `<suite root>/<subDir>` */
  sourceDir: string
  /** Source directories relative to `sourceDir` */
  sourceDirs: string[]
  /** Staging directory the step writes into */
  outputDir: string
  /** Built dependencies, in declaration order */
  dependencies: ToolchainDependency[]
  /** Expected primary artifact, when the node has one */
  artifact?: string | undefined
  compliance?: string | undefined
  native?: NativeConfig | undefined
  nativeKind?: string | undefined
  deliverable?: string | undefined
}

export interface ToolchainRunOptions {
  /** Milliseconds before the step is killed and failed */
  timeout: number
  /** Milliseconds between SIGTERM and SIGKILL */
  gracePeriod: number
  signal?: AbortSignal | undefined
}

export interface Toolchain {
  /**
   * Run one build step.
   *
   * @throws ToolchainError when the step fails or times out
   * @throws BuildCancelledError when `signal` aborts the step
   */
  run(request: ToolchainRequest, options: ToolchainRunOptions): Promise<void>
}

export function toolchainKind(node: BuildNode): ToolchainKind {
  if (node.kind === 'distribution') return 'archive'
  return node.native ? 'native' : 'compile'
}

// ============================================================================
// Command toolchain
// ============================================================================

export interface CommandToolchainOptions {
  /** Directories searched before PATH */
  paths?: readonly string[] | undefined
  /** Extra environment for every step */
  env?: Record<string, string> | undefined
  /** Executable name for a kind (default: `suitecraft-<kind>`) */
  command?: ((kind: ToolchainKind) => string) | undefined
}

/**
 * Spawns `suitecraft-<kind>` with the request as JSON on stdin.
 *
 * @example
 * ```typescript
 * const toolchain = new CommandToolchain({ paths: ['/opt/suitecraft/bin'] })
 * await toolchain.run(request, { timeout: 60_000, gracePeriod: 5_000 })
 * ```
 */
export class CommandToolchain implements Toolchain {
  private readonly paths: readonly string[]
  private readonly env: Record<string, string>
  private readonly command: (kind: ToolchainKind) => string

  constructor(options: CommandToolchainOptions = {}) {
    this.paths = options.paths ?? []
    this.env = options.env ?? {}
    this.command = options.command ?? ((kind) => `suitecraft-${kind}`)
  }

  private searchPath(): string {
    return [...this.paths, process.env['PATH'] ?? ''].filter((p) => p !== '').join(delimiter)
  }

  run(request: ToolchainRequest, options: ToolchainRunOptions): Promise<void> {
    const command = this.command(request.kind)
    const { signal } = options
    if (signal?.aborted) return Promise.reject(new BuildCancelledError(request.node))

    return new Promise((resolve, reject) => {
      const child = spawn(command, [], {
        cwd: request.sourceDir,
        env: { ...process.env, ...this.env, PATH: this.searchPath() },
        stdio: ['pipe', 'pipe', 'pipe'],
      })

      let stderr = ''
      let timedOut = false
      let cancelled = false
      let killTimer: ReturnType<typeof setTimeout> | undefined

      const terminate = () => {
        child.kill('SIGTERM')
        killTimer = setTimeout(() => child.kill('SIGKILL'), options.gracePeriod)
      }

      const timeoutTimer = setTimeout(() => {
        timedOut = true
        terminate()
      }, options.timeout)

      const onAbort = () => {
        cancelled = true
        terminate()
      }
      signal?.addEventListener('abort', onAbort, { once: true })

      const cleanup = () => {
        clearTimeout(timeoutTimer)
        if (killTimer) clearTimeout(killTimer)
        signal?.removeEventListener('abort', onAbort)
      }

      child.stdout.resume()
      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString()
      })
      // a step that never reads stdin closes the pipe early
      child.stdin.on('error', () => undefined)
      child.stdin.end(`${JSON.stringify(request)}\n`)

      child.on('error', (err) => {
        cleanup()
        reject(new ToolchainError(request.node, command, -1, err.message))
      })

      child.on('close', (code) => {
        cleanup()
        if (cancelled) {
          reject(new BuildCancelledError(request.node))
        } else if (timedOut) {
          reject(new ToolchainError(request.node, command, code ?? -1, stderr, true))
        } else if (code !== 0) {
          reject(new ToolchainError(request.node, command, code ?? -1, stderr))
        } else {
          resolve()
        }
      })
    })
  }
}
