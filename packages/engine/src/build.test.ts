/**
 * Tests for build orchestration, using fake toolchains.
 */

import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import type { Platform, Suite } from '@suitecraft/core'
import { BuildCancelledError, CyclicDependencyError, ToolchainError, parseSuite } from '@suitecraft/core'
import { BuildCache, PathResolver } from '@suitecraft/store'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { type RunOptions, run } from './build.js'
import { type BuildEvent, BuildEventEmitter } from './events.js'
import { buildDistribution, verify } from './operations.js'
import { EXIT_CODES, findOutcome } from './report.js'
import type { Toolchain, ToolchainRequest, ToolchainRunOptions } from './toolchain.js'

const linux: Platform = { os: 'linux', arch: 'amd64' }
const darwin: Platform = { os: 'darwin', arch: 'aarch64' }

type Step = (request: ToolchainRequest, options: ToolchainRunOptions) => Promise<void>

/** Writes the expected artifact (or out.txt) into the staging directory */
const writeArtifact: Step = async (request) => {
  await fs.promises.writeFile(
    path.join(request.outputDir, request.artifact ?? 'out.txt'),
    `built ${request.node}\n`
  )
}

class FakeToolchain implements Toolchain {
  readonly calls: ToolchainRequest[] = []

  constructor(private readonly step: Step = writeArtifact) {}

  async run(request: ToolchainRequest, options: ToolchainRunOptions): Promise<void> {
    this.calls.push(request)
    await this.step(request, options)
  }
}

let tmpDir: string

function suite(raw: Record<string, unknown>): Suite {
  const root = path.join(tmpDir, 'suite')
  return parseSuite({ name: 's', ...raw }, { source: path.join(root, 'suite.toml'), root })
}

function options(toolchain: Toolchain, extra: Partial<RunOptions> = {}): RunOptions {
  return {
    outputRoot: path.join(tmpDir, 'out'),
    cacheDir: path.join(tmpDir, 'cache'),
    toolchain,
    ...extra,
  }
}

beforeEach(async () => {
  tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'engine-build-test-'))
})

afterEach(async () => {
  await fs.promises.rm(tmpDir, { recursive: true, force: true })
})

describe('run', () => {
  const independentBranches = () =>
    suite({
      projects: {
        C: { subDir: 'c', dependencies: ['D'] },
        D: { subDir: 'd' },
        E: { subDir: 'e' },
      },
    })

  test('a failed node blocks its dependents while independent nodes build', async () => {
    const toolchain = new FakeToolchain(async (request, opts) => {
      if (request.node === 's:D') throw new ToolchainError('s:D', 'suitecraft-compile', 1, 'boom')
      await writeArtifact(request, opts)
    })

    const report = await run([independentBranches()], [linux], options(toolchain))

    expect(report.targets[0]?.nodes.map((n) => [n.id, n.status])).toEqual([
      ['s:D', 'failed'],
      ['s:C', 'blocked'],
      ['s:E', 'built'],
    ])
    expect(findOutcome(report, 'linux-amd64', 's:C')?.cause).toBe('dependency "s:D" failed')
    expect(report.failures).toEqual([
      {
        platform: 'linux-amd64',
        node: 's:D',
        cause: 'Toolchain for "s:D" exited with code 1: suitecraft-compile\nboom',
      },
    ])
    expect(report.exitCode).toBe(EXIT_CODES.failed)
    expect(toolchain.calls.map((c) => c.node)).toEqual(['s:D', 's:E'])
  })

  test('publishes outputs per platform and node', async () => {
    const report = await run([independentBranches()], [linux, darwin], options(new FakeToolchain()))

    expect(report.exitCode).toBe(EXIT_CODES.success)
    for (const platform of ['linux-amd64', 'darwin-aarch64']) {
      const file = path.join(tmpDir, 'out', platform, 's', 'C', 'out.txt')
      expect(await fs.promises.readFile(file, 'utf-8')).toBe('built s:C\n')
    }
  })

  test('passes dependency outputs to the toolchain', async () => {
    const toolchain = new FakeToolchain()
    await run([independentBranches()], [linux], options(toolchain))

    const request = toolchain.calls.find((c) => c.node === 's:C')
    expect(request?.kind).toBe('compile')
    expect(request?.platform).toBe('linux-amd64')
    expect(request?.dependencies).toEqual([
      { id: 's:D', outputDir: path.join(tmpDir, 'out', 'linux-amd64', 's', 'D') },
    ])
  })

  test('failed steps leave nothing in the output tree', async () => {
    const toolchain = new FakeToolchain(async (request) => {
      await fs.promises.writeFile(path.join(request.outputDir, 'partial.txt'), 'partial')
      throw new ToolchainError(request.node, 'suitecraft-compile', 2, '')
    })

    await run([suite({ projects: { E: { subDir: 'e' } } })], [linux], options(toolchain))

    expect(fs.existsSync(path.join(tmpDir, 'out', 'linux-amd64', 's', 'E'))).toBe(false)
  })

  test('respects the job limit', async () => {
    let active = 0
    let peak = 0
    const toolchain = new FakeToolchain(async (request, opts) => {
      active++
      peak = Math.max(peak, active)
      await new Promise((resolve) => setTimeout(resolve, 10))
      await writeArtifact(request, opts)
      active--
    })
    const manyLeaves = suite({
      projects: { A: { subDir: 'a' }, B: { subDir: 'b' }, C: { subDir: 'c' }, D: { subDir: 'd' } },
    })

    const report = await run([manyLeaves], [linux, darwin], options(toolchain, { jobs: 2, cache: false }))

    expect(report.exitCode).toBe(EXIT_CODES.success)
    expect(toolchain.calls).toHaveLength(8)
    expect(peak).toBe(2)
  })

  test('structural errors are thrown before anything runs', async () => {
    const toolchain = new FakeToolchain()
    const cyclic = suite({
      projects: { A: { subDir: 'a', dependencies: ['B'] }, B: { subDir: 'b', dependencies: ['A'] } },
    })

    await expect(run([cyclic], [linux], options(toolchain))).rejects.toBeInstanceOf(CyclicDependencyError)
    expect(toolchain.calls).toEqual([])
  })
})

describe('platform overlays', () => {
  const overlaid = () =>
    suite({
      projects: {
        native: {
          subDir: 'native',
          native: 'shared_lib',
          os_arch: {
            linux: { '<others>': { cflags: ['-DLINUX'] } },
            windows: { '<others>': { ignore: 'no windows port' } },
          },
        },
        plain: { subDir: 'plain' },
      },
    })

  test('a missing branch aborts only that target', async () => {
    const toolchain = new FakeToolchain()
    const report = await run([overlaid()], [linux, darwin], options(toolchain))

    const darwinTarget = report.targets.find((t) => t.name === 'darwin-aarch64')
    expect(darwinTarget?.nodes.map((n) => [n.id, n.status])).toEqual([
      ['s:native', 'failed'],
      ['s:plain', 'aborted'],
    ])
    expect(darwinTarget?.nodes[0]?.errorCode).toBe('OVERLAY_RESOLUTION_ERROR')
    expect(report.targets.find((t) => t.name === 'linux-amd64')?.exitCode).toBe(EXIT_CODES.success)
    expect(report.exitCode).toBe(EXIT_CODES.failed)
    expect(toolchain.calls.map((c) => [c.node, c.platform])).toEqual([
      ['s:native', 'linux-amd64'],
      ['s:plain', 'linux-amd64'],
    ])
  })

  test('ignored nodes are reported and not built', async () => {
    const toolchain = new FakeToolchain()
    const report = await run([overlaid()], [{ os: 'windows', arch: 'amd64' }], options(toolchain))

    expect(findOutcome(report, 'windows-amd64', 's:native')).toMatchObject({
      status: 'ignored',
      cause: 'no windows port',
    })
    expect(report.exitCode).toBe(EXIT_CODES.success)
    expect(toolchain.calls.map((c) => c.node)).toEqual(['s:plain'])
  })

  test('native requests carry the selected flags', async () => {
    const toolchain = new FakeToolchain()
    await run([overlaid()], [linux], options(toolchain))

    const request = toolchain.calls.find((c) => c.node === 's:native')
    expect(request?.kind).toBe('native')
    expect(request?.artifact).toBe('libnative.so')
    expect(request?.native?.cflags).toEqual(['-DLINUX'])
  })
})

describe('build cache', () => {
  const single = () => suite({ projects: { E: { subDir: 'e' } } })

  test('an unchanged node is restored from the cache', async () => {
    const toolchain = new FakeToolchain()
    await run([single()], [linux], options(toolchain))
    await fs.promises.rm(path.join(tmpDir, 'out'), { recursive: true })

    const report = await run([single()], [linux], options(toolchain))

    expect(findOutcome(report, 'linux-amd64', 's:E')).toMatchObject({ status: 'built', cacheHit: true })
    expect(toolchain.calls).toHaveLength(1)
    expect(
      await fs.promises.readFile(path.join(tmpDir, 'out', 'linux-amd64', 's', 'E', 'out.txt'), 'utf-8')
    ).toBe('built s:E\n')
  })

  test('changed sources miss the cache', async () => {
    const toolchain = new FakeToolchain()
    await run([single()], [linux], options(toolchain))
    await fs.promises.mkdir(path.join(tmpDir, 'suite', 'e', 'src'), { recursive: true })
    await fs.promises.writeFile(path.join(tmpDir, 'suite', 'e', 'src', 'Main.txt'), 'v2')

    const report = await run([single()], [linux], options(toolchain))

    expect(findOutcome(report, 'linux-amd64', 's:E')?.cacheHit).toBe(false)
    expect(toolchain.calls).toHaveLength(2)
  })

  test('a corrupt entry is evicted and rebuilt', async () => {
    const toolchain = new FakeToolchain()
    await run([single()], [linux], options(toolchain))
    const cache = new BuildCache({
      paths: new PathResolver({ outputRoot: path.join(tmpDir, 'out'), cacheDir: path.join(tmpDir, 'cache') }),
    })
    const [key] = await cache.list()
    if (!key) throw new Error('expected a cache entry')
    await fs.promises.writeFile(path.join(tmpDir, 'cache', key, 'out.txt'), 'tampered')

    const events: BuildEvent[] = []
    const emitter = new BuildEventEmitter({ listeners: [(e) => events.push(e)] })
    const report = await run([single()], [linux], options(toolchain, { events: emitter }))

    expect(findOutcome(report, 'linux-amd64', 's:E')).toMatchObject({ status: 'built', cacheHit: false })
    expect(toolchain.calls).toHaveLength(2)
    expect(events.filter((e) => e.event === 'cache_evicted')).toMatchObject([
      { node: 's:E', cacheKey: key, platform: 'linux-amd64' },
    ])
    expect(
      await fs.promises.readFile(path.join(tmpDir, 'cache', key, 'out.txt'), 'utf-8')
    ).toBe('built s:E\n')
  })

  test('a distribution misses when a transitive dependency changes', async () => {
    const chain = () =>
      suite({
        projects: {
          P1: { subDir: 'p1', dependencies: ['P2'] },
          P2: { subDir: 'p2' },
        },
        distributions: { D: { dependencies: ['P1'], layout: { 'lib/': 'dependency:P2/*' } } },
      })
    // P1's output never changes; P2 copies its source
    const toolchain = new FakeToolchain(async (request) => {
      const text =
        request.node === 's:P2'
          ? await fs.promises.readFile(path.join(request.sourceDir, 'v.txt'), 'utf-8')
          : 'p1\n'
      await fs.promises.writeFile(path.join(request.outputDir, 'out.txt'), text)
    })
    const version = path.join(tmpDir, 'suite', 'p2', 'v.txt')
    await fs.promises.mkdir(path.dirname(version), { recursive: true })
    await fs.promises.writeFile(version, 'v1\n')
    await run([chain()], [linux], options(toolchain))

    await fs.promises.writeFile(version, 'v2\n')
    const report = await run([chain()], [linux], options(toolchain))

    expect(findOutcome(report, 'linux-amd64', 's:P2')?.cacheHit).toBe(false)
    expect(findOutcome(report, 'linux-amd64', 's:D')).toMatchObject({ status: 'built', cacheHit: false })
    expect(
      await fs.promises.readFile(path.join(tmpDir, 'out', 'linux-amd64', 's', 'D', 'lib', 'out.txt'), 'utf-8')
    ).toBe('v2\n')
  })

  test('can be turned off', async () => {
    const toolchain = new FakeToolchain()
    await run([single()], [linux], options(toolchain, { cache: false }))
    await run([single()], [linux], options(toolchain, { cache: false }))

    expect(toolchain.calls).toHaveLength(2)
    expect(fs.existsSync(path.join(tmpDir, 'cache'))).toBe(false)
  })
})

describe('cancellation', () => {
  test('in-flight and pending nodes are cancelled', async () => {
    const controller = new AbortController()
    const toolchain = new FakeToolchain(async (request) => {
      controller.abort()
      throw new BuildCancelledError(request.node)
    })
    const graph = suite({
      projects: {
        C: { subDir: 'c', dependencies: ['D'] },
        D: { subDir: 'd' },
        E: { subDir: 'e' },
      },
    })

    const report = await run([graph], [linux], options(toolchain, { signal: controller.signal }))

    expect(report.targets[0]?.nodes.map((n) => [n.id, n.status])).toEqual([
      ['s:D', 'cancelled'],
      ['s:C', 'cancelled'],
      ['s:E', 'cancelled'],
    ])
    expect(report.cancelled).toBe(true)
    expect(report.exitCode).toBe(EXIT_CODES.cancelled)
    expect(toolchain.calls).toHaveLength(1)
    expect(fs.existsSync(path.join(tmpDir, 'out', 'linux-amd64', 's', 'D'))).toBe(false)
  })
})

describe('events', () => {
  test('reports target and node lifecycle in order', async () => {
    const events: BuildEvent[] = []
    const emitter = new BuildEventEmitter({ listeners: [(e) => events.push(e)] })

    await run(
      [suite({ projects: { E: { subDir: 'e' } } })],
      [linux],
      options(new FakeToolchain(), { events: emitter })
    )

    expect(events.map((e) => e.event)).toEqual([
      'target_started',
      'node_started',
      'node_finished',
      'target_finished',
    ])
    expect(events[2]).toMatchObject({ node: 's:E', status: 'built', cacheHit: false })
  })
})

describe('distributions', () => {
  const withDistribution = () =>
    suite({
      projects: {
        nativeLib: { subDir: 'native', native: 'shared_lib', deliverable: 'foo' },
        unrelated: { subDir: 'unrelated' },
      },
      distributions: {
        NATIVE: {
          dependencies: ['nativeLib'],
          platformDependent: true,
          layout: { 'lib/': 'dependency:nativeLib/<lib:foo>' },
        },
      },
    })

  test('buildDistribution builds only the closure and materializes the layout', async () => {
    const toolchain = new FakeToolchain()
    const { distribution, report } = await buildDistribution(
      [withDistribution()],
      'NATIVE',
      [linux],
      options(toolchain)
    )

    expect(distribution.id).toBe('s:NATIVE')
    expect(report.targets[0]?.nodes.map((n) => [n.id, n.status])).toEqual([
      ['s:nativeLib', 'built'],
      ['s:NATIVE', 'built'],
    ])
    const dist = path.join(tmpDir, 'out', 'linux-amd64', 's', 'NATIVE')
    expect(await fs.promises.readFile(path.join(dist, 'lib', 'libfoo.so'), 'utf-8')).toBe(
      'built s:nativeLib\n'
    )
    expect(await fs.promises.readFile(path.join(dist, 'files'), 'utf-8')).toBe('lib/libfoo.so\n')
  })

  test('verify detects a modified distribution', async () => {
    await buildDistribution([withDistribution()], 'NATIVE', [linux], options(new FakeToolchain()))
    const outputRoot = path.join(tmpDir, 'out')

    const clean = await verify([withDistribution()], 'NATIVE', [linux], { outputRoot })
    expect(clean.results.map((r) => r.ok)).toEqual([true])

    await fs.promises.writeFile(path.join(outputRoot, 'linux-amd64', 's', 'NATIVE', 'lib', 'libfoo.so'), 'x')
    const dirty = await verify([withDistribution()], 'NATIVE', [linux], { outputRoot })
    expect(dirty.results[0]).toMatchObject({ ok: false, changed: ['lib/libfoo.so'], added: [], removed: [] })
  })

  test('a layout naming an unbuilt library fails the distribution', async () => {
    const toolchain = new FakeToolchain(async (request, opts) => {
      await writeArtifact({ ...request, artifact: 'other.so' }, opts)
    })
    const { report } = await buildDistribution([withDistribution()], 'NATIVE', [linux], options(toolchain))

    expect(findOutcome(report, 'linux-amd64', 's:NATIVE')).toMatchObject({
      status: 'failed',
      errorCode: 'LAYOUT_TOKEN_ERROR',
    })
  })
})
