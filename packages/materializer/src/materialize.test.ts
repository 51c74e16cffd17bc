/**
 * Tests for layout materialization.
 */

import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import type { Distribution, NodeId, Platform } from '@suitecraft/core'
import { LayoutTokenError, parseSuite } from '@suitecraft/core'
import { type BuildGraph, buildGraph } from '@suitecraft/resolver'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { materialize } from './materialize.js'

const HELLO_SHA = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
const EMPTY_SHA = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'

const linux: Platform = { os: 'linux', arch: 'amd64' }

let tmpDir: string
let graph: BuildGraph
let nativeOut: string

async function write(rel: string, content: string): Promise<void> {
  const abs = path.join(tmpDir, rel)
  await fs.promises.mkdir(path.dirname(abs), { recursive: true })
  await fs.promises.writeFile(abs, content)
}

function distribution(id: NodeId): Distribution {
  const node = graph.registry.get(id)
  if (node?.kind !== 'distribution') throw new Error(`no distribution ${id}`)
  return node
}

function context(
  id: NodeId,
  options: { platform?: Platform; built?: boolean } = {}
): Parameters<typeof materialize>[1] {
  return {
    platform: options.platform ?? linux,
    graph,
    layout: distribution(id).layout ?? [],
    outputOf: (node) =>
      node === 'suiteX:nativeLib' && options.built !== false ? nativeOut : undefined,
  }
}

async function layoutError(promise: Promise<unknown>): Promise<LayoutTokenError> {
  try {
    await promise
  } catch (err) {
    if (err instanceof LayoutTokenError) return err
    throw err
  }
  throw new Error('expected a LayoutTokenError')
}

beforeEach(async () => {
  tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'materialize-test-'))
  await write('suiteX/README.md', 'hello')
  nativeOut = path.join(tmpDir, 'out', 'nativeLib')
  await write('out/nativeLib/libfoo.so', 'hello')
  await write('out/nativeLib/include/foo.h', '#pragma once\n')
  await write('out/nativeLib/include/internal/bar.h', '')

  const suite = parseSuite(
    {
      name: 'suiteX',
      projects: {
        nativeLib: { subDir: 'native', native: 'shared_lib', deliverable: 'foo' },
        other: { subDir: 'other' },
      },
      distributions: {
        NATIVE_DIST: {
          dependencies: ['nativeLib'],
          platformDependent: true,
          layout: {
            './': 'file:README.md',
            'lib/<os>-<arch>/': 'dependency:suiteX:nativeLib/<lib:foo>',
            VERSION: { source_type: 'string', value: '' },
          },
        },
        HEADERS: {
          type: 'dir',
          dependencies: ['nativeLib'],
          layout: { 'include/': 'dependency:nativeLib/include/*.h', 'all/': 'dependency:nativeLib/*' },
        },
        OUTSIDE: { dependencies: ['nativeLib'], layout: { 'x/': 'dependency:other/*' } },
        MISSING_FILE: { dependencies: [], layout: { './': 'file:NOTICE' } },
      },
    },
    { source: path.join(tmpDir, 'suiteX', 'suite.toml'), root: path.join(tmpDir, 'suiteX') }
  )
  graph = buildGraph([suite]).graph
})

afterEach(async () => {
  await fs.promises.rm(tmpDir, { recursive: true, force: true })
})

describe('materialize', () => {
  test('writes the platform library into the resolved path', async () => {
    const dest = path.join(tmpDir, 'dist')
    await materialize(distribution('suiteX:NATIVE_DIST'), context('suiteX:NATIVE_DIST'), dest)

    expect(await fs.promises.readFile(path.join(dest, 'lib', 'linux-amd64', 'libfoo.so'), 'utf-8')).toBe(
      'hello'
    )
    expect(await fs.promises.readFile(path.join(dest, 'README.md'), 'utf-8')).toBe('hello')
    expect(await fs.promises.readFile(path.join(dest, 'VERSION'), 'utf-8')).toBe('')
  })

  test('emits sorted hash and file-list manifests', async () => {
    const dest = path.join(tmpDir, 'dist')
    const result = await materialize(
      distribution('suiteX:NATIVE_DIST'),
      context('suiteX:NATIVE_DIST'),
      dest
    )

    expect(result.paths).toEqual({ hashEntry: 'sha256', fileListEntry: 'files' })
    expect(await fs.promises.readFile(path.join(dest, 'files'), 'utf-8')).toBe(
      'README.md\nVERSION\nlib/linux-amd64/libfoo.so\n'
    )
    expect(await fs.promises.readFile(path.join(dest, 'sha256'), 'utf-8')).toBe(
      `${HELLO_SHA}  README.md\n${EMPTY_SHA}  VERSION\n${HELLO_SHA}  lib/linux-amd64/libfoo.so\n`
    )
  })

  test('is idempotent', async () => {
    const first = path.join(tmpDir, 'first')
    const second = path.join(tmpDir, 'second')
    await materialize(distribution('suiteX:NATIVE_DIST'), context('suiteX:NATIVE_DIST'), first)
    await materialize(distribution('suiteX:NATIVE_DIST'), context('suiteX:NATIVE_DIST'), second)

    const a = await fs.promises.readFile(path.join(first, 'sha256'))
    const b = await fs.promises.readFile(path.join(second, 'sha256'))
    expect(b.equals(a)).toBe(true)
  })

  test('copies pattern matches and whole trees; no manifests when platform independent', async () => {
    const dest = path.join(tmpDir, 'headers')
    const result = await materialize(distribution('suiteX:HEADERS'), context('suiteX:HEADERS'), dest)

    expect(result.manifest).toBeUndefined()
    expect(await fs.promises.readdir(path.join(dest, 'include'))).toEqual(['foo.h'])
    expect((await fs.promises.readdir(path.join(dest, 'all'))).sort()).toEqual(['include', 'libfoo.so'])
    expect((await fs.promises.readdir(dest)).sort()).toEqual(['all', 'include'])
  })

  test('rejects tokens outside the dependency closure', async () => {
    const err = await layoutError(
      materialize(distribution('suiteX:OUTSIDE'), context('suiteX:OUTSIDE'), path.join(tmpDir, 'o'))
    )
    expect(err.message).toBe(
      'Layout of "suiteX:OUTSIDE": "suiteX:other" is not in the declared dependency closure: "dependency:other/*"'
    )
    expect(err.node).toBe('suiteX:OUTSIDE')
    expect(err.token).toBe('dependency:other/*')
  })

  test('rejects dependencies not built for the platform', async () => {
    const err = await layoutError(
      materialize(
        distribution('suiteX:NATIVE_DIST'),
        context('suiteX:NATIVE_DIST', { built: false }),
        path.join(tmpDir, 'd')
      )
    )
    expect(err.message).toContain('"suiteX:nativeLib" was not built for linux-amd64')
  })

  test('rejects a library missing for the platform', async () => {
    const err = await layoutError(
      materialize(
        distribution('suiteX:NATIVE_DIST'),
        context('suiteX:NATIVE_DIST', { platform: { os: 'darwin', arch: 'aarch64' } }),
        path.join(tmpDir, 'd')
      )
    )
    expect(err.message).toBe(
      'Layout of "suiteX:NATIVE_DIST": library "libfoo.dylib" was not built: "dependency:suiteX:nativeLib/<lib:foo>"'
    )
  })

  test('rejects missing literal files', async () => {
    const err = await layoutError(
      materialize(
        distribution('suiteX:MISSING_FILE'),
        context('suiteX:MISSING_FILE'),
        path.join(tmpDir, 'm')
      )
    )
    expect(err.token).toBe('file:NOTICE')
  })
})
