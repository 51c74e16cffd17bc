/**
 * CLI package tests.
 *
 * WHY: These tests drive the commands through commander with a fake
 * toolchain, checking what reaches stdout and which exit code is recorded.
 */

import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { BuildCancelledError, SchemaError, ToolchainError } from '@suitecraft/core'
import type { ExitCode, Toolchain, ToolchainRequest } from '@suitecraft/engine'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'

import { createProgram, exitCodeFor, formatError } from './index.js'

const SUITE_TOML = `name = "s"

[projects.lib]
subDir = "lib"

[distributions.DIST]
dependencies = ["lib"]

[distributions.DIST.layout]
"./" = "dependency:lib/*"
`

class FakeToolchain implements Toolchain {
  readonly calls: ToolchainRequest[] = []

  constructor(private readonly fail: string[] = []) {}

  async run(request: ToolchainRequest): Promise<void> {
    this.calls.push(request)
    if (this.fail.includes(request.node)) {
      throw new ToolchainError(request.node, 'suitecraft-compile', 1, 'boom')
    }
    await fs.promises.writeFile(path.join(request.outputDir, 'out.txt'), `built ${request.node}\n`)
  }
}

let tmpDir: string
let suiteDir: string
let exits: ExitCode[]

async function cli(args: string[], toolchain: Toolchain = new FakeToolchain()): Promise<void> {
  const program = createProgram({
    env: {},
    cwd: tmpDir,
    toolchain,
    exit: (code) => {
      exits.push(code)
    },
  })
  await program.parseAsync(['node', 'suitecraft', '--suite', suiteDir, ...args])
}

const distDir = () => path.join(tmpDir, 'out', 'linux-amd64', 's', 'DIST')

const buildArgs = () => [
  '--output',
  'out',
  '--cache-dir',
  'cache',
  'build',
  '--target',
  'linux-amd64',
  '--jobs',
  '2',
]

beforeEach(async () => {
  tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'cli-test-'))
  suiteDir = path.join(tmpDir, 'suite')
  await fs.promises.mkdir(path.join(suiteDir, 'lib'), { recursive: true })
  await fs.promises.writeFile(path.join(suiteDir, 'suite.toml'), SUITE_TOML)
  await fs.promises.writeFile(path.join(suiteDir, 'lib', 'main.c'), 'int main(void) { return 0; }\n')
  exits = []
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
})

afterEach(async () => {
  vi.restoreAllMocks()
  await fs.promises.rm(tmpDir, { recursive: true, force: true })
})

describe('exitCodeFor', () => {
  test('maps errors to exit codes', () => {
    expect(exitCodeFor(new SchemaError('suite.toml', [{ path: '/', message: 'bad' }]))).toBe(2)
    expect(exitCodeFor(new BuildCancelledError('s:lib'))).toBe(3)
    expect(exitCodeFor(new Error('disk full'))).toBe(1)
  })
})

describe('formatError', () => {
  test('lists every schema issue', () => {
    const error = new SchemaError('suite.toml', [
      { path: 'projects.a.subDir', message: 'required field is missing' },
      { path: 'name', message: 'must be a string' },
    ])
    expect(formatError(error)).toEqual([
      'suite.toml: 2 problems',
      '  projects.a.subDir: required field is missing',
      '  name: must be a string',
    ])
  })
})

describe('graph command', () => {
  test('prints the dot graph', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    await cli(['graph'])

    expect(write).toHaveBeenCalledWith(
      [
        'digraph suites {',
        '  rankdir=LR;',
        '  "s:lib" [shape=ellipse];',
        '  "s:DIST" [shape=box];',
        '  "s:DIST" -> "s:lib";',
        '}',
        '',
      ].join('\n')
    )
    expect(exits).toEqual([])
  })

  test('a missing suite manifest exits with 2', async () => {
    await fs.promises.rm(path.join(suiteDir, 'suite.toml'))
    await cli(['graph'])
    expect(exits).toEqual([2])
  })
})

describe('build command', () => {
  test('builds the project and lays out the distribution', async () => {
    const toolchain = new FakeToolchain()
    await cli(buildArgs(), toolchain)

    expect(toolchain.calls.map((c) => c.node)).toEqual(['s:lib'])
    expect(await fs.promises.readFile(path.join(distDir(), 'out.txt'), 'utf8')).toBe('built s:lib\n')
    expect(await fs.promises.readFile(path.join(distDir(), 'files'), 'utf8')).toBe('out.txt\n')
    expect(exits).toEqual([0])
  })

  test('a failing toolchain exits with 1 and blocks dependents', async () => {
    const toolchain = new FakeToolchain(['s:lib'])
    await cli(buildArgs(), toolchain)

    expect(toolchain.calls.map((c) => c.node)).toEqual(['s:lib'])
    expect(exits).toEqual([1])
  })

  test('an invalid target is a settings error', async () => {
    await cli(['build', '--target', 'linux'])
    expect(exits).toEqual([2])
  })

  test('appends events to the --events file', async () => {
    await cli(['--events', 'events.jsonl', ...buildArgs()])

    const lines = (await fs.promises.readFile(path.join(tmpDir, 'events.jsonl'), 'utf8')).trim().split('\n')
    const events = lines.map((line) => JSON.parse(line).event)
    expect(events[0]).toBe('target_started')
    expect(events.at(-1)).toBe('target_finished')
    expect(events.filter((e) => e === 'node_finished')).toHaveLength(2)
  })
})

describe('verify command', () => {
  test('passes after dist and fails after an edit', async () => {
    await cli(['--output', 'out', '--cache-dir', 'cache', 'dist', 'DIST', '--target', 'linux-amd64'])
    expect(exits).toEqual([0])

    await cli(['--output', 'out', 'verify', 'DIST', '--target', 'linux-amd64'])
    expect(exits).toEqual([0, 0])

    await fs.promises.writeFile(path.join(distDir(), 'out.txt'), 'edited\n')
    await cli(['--output', 'out', 'verify', 'DIST', '--target', 'linux-amd64'])
    expect(exits).toEqual([0, 0, 1])
  })

  test('an unbuilt distribution exits with 1', async () => {
    await cli(['--output', 'out', 'verify', 'DIST', '--target', 'linux-amd64'])
    expect(exits).toEqual([1])
  })
})

describe('clean command', () => {
  test('removes the output directory', async () => {
    await cli(buildArgs())
    await cli(['--output', 'out', '--cache-dir', 'cache', 'clean', '--cache'])

    expect(fs.existsSync(path.join(tmpDir, 'out'))).toBe(false)
    expect(exits).toEqual([0])
  })
})
