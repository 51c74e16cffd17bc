/**
 * Tests for platform overlay resolution.
 */

import type { OverlayLeaf, OverlaySpec, Platform } from '@suitecraft/core'
import { OverlayResolutionError } from '@suitecraft/core'
import { describe, expect, test } from 'vitest'

import { resolveOverlay } from './overlay.js'

interface Flags {
  cflags: string[]
  ldflags?: string[]
}

function overlay(table: Record<string, Record<string, Flags | string>>): OverlaySpec<Flags> {
  const branches = new Map<string, Map<string, OverlayLeaf<Flags>>>()
  for (const [os, arches] of Object.entries(table)) {
    const branch = new Map<string, OverlayLeaf<Flags>>()
    for (const [arch, leaf] of Object.entries(arches)) {
      branch.set(
        arch,
        typeof leaf === 'string' ? { kind: 'ignore', reason: leaf } : { kind: 'config', value: leaf }
      )
    }
    branches.set(os, branch)
  }
  return { branches }
}

const linuxAmd64: Platform = { os: 'linux', arch: 'amd64' }
const darwinArm64: Platform = { os: 'darwin', arch: 'arm64' }

function resolutionError(fn: () => unknown): OverlayResolutionError {
  try {
    fn()
  } catch (err) {
    if (err instanceof OverlayResolutionError) return err
    throw err
  }
  throw new Error('expected an OverlayResolutionError')
}

describe('resolveOverlay', () => {
  test('exact OS branch, wildcard arch, and full wildcard fallback', () => {
    const spec = overlay({
      linux: { '<others>': { cflags: ['-DLINUX'] } },
      '<others>': { '<others>': { cflags: ['-DOTHER'] } },
    })

    expect(resolveOverlay(spec, darwinArm64)).toEqual({
      kind: 'config',
      config: { cflags: ['-DOTHER'] },
      match: { os: '<others>', arch: '<others>' },
    })
    expect(resolveOverlay(spec, linuxAmd64)).toEqual({
      kind: 'config',
      config: { cflags: ['-DLINUX'] },
      match: { os: 'linux', arch: '<others>' },
    })
  })

  test('an exact leaf is used whole, never merged with the wildcard leaf', () => {
    const spec = overlay({
      linux: {
        amd64: { cflags: ['-march=x86-64'] },
        '<others>': { cflags: ['-O1'], ldflags: ['-lm'] },
      },
    })

    const result = resolveOverlay(spec, linuxAmd64)
    expect(result).toEqual({
      kind: 'config',
      config: { cflags: ['-march=x86-64'] },
      match: { os: 'linux', arch: 'amd64' },
    })
    expect(result.kind === 'config' && result.config.ldflags).toBeUndefined()
  })

  test('is pure', () => {
    const spec = overlay({ '<others>': { amd64: { cflags: ['-a'] }, '<others>': 'unsupported' } })
    const first = resolveOverlay(spec, linuxAmd64)
    const second = resolveOverlay(spec, linuxAmd64)

    expect(JSON.stringify(second)).toBe(JSON.stringify(first))
    expect(resolveOverlay(spec, darwinArm64)).toEqual(resolveOverlay(spec, darwinArm64))
  })

  test('ignore leaves are a normal outcome', () => {
    const spec = overlay({ linux: { amd64: { cflags: [] } }, '<others>': { '<others>': 'linux only' } })

    expect(resolveOverlay(spec, darwinArm64)).toEqual({
      kind: 'ignored',
      reason: 'linux only',
      match: { os: '<others>', arch: '<others>' },
    })
  })

  test('wildcard OS combined with an exact arch resolves structurally', () => {
    const spec = overlay({ '<others>': { amd64: { cflags: ['-m64'] } } })

    expect(resolveOverlay(spec, { os: 'windows', arch: 'amd64' })).toEqual({
      kind: 'config',
      config: { cflags: ['-m64'] },
      match: { os: '<others>', arch: 'amd64' },
    })
    const err = resolutionError(() => resolveOverlay(spec, { os: 'windows', arch: 'aarch64' }, 's:n'))
    expect(err.level).toBe('arch')
    expect(err.key).toBe('aarch64')
  })

  test('fails when neither the OS nor a wildcard matches', () => {
    const spec = overlay({ linux: { amd64: { cflags: [] } } })

    const err = resolutionError(() => resolveOverlay(spec, darwinArm64, 's:n'))
    expect(err.level).toBe('os')
    expect(err.key).toBe('darwin')
    expect(err.node).toBe('s:n')
    expect(err.message).toBe(
      'No os_arch entry for os "darwin" in "s:n" (platform darwin-arm64) and no <others> fallback'
    )
  })

  test('an exact OS branch without the arch does not fall back to the wildcard OS', () => {
    const spec = overlay({
      linux: { amd64: { cflags: [] } },
      '<others>': { '<others>': { cflags: ['-x'] } },
    })

    const err = resolutionError(() => resolveOverlay(spec, { os: 'linux', arch: 'riscv64' }))
    expect(err.level).toBe('arch')
  })

  test('OS variants try os-variant, then os', () => {
    const spec = overlay({
      'linux-musl': { amd64: { cflags: ['-static'] } },
      linux: { amd64: { cflags: ['-fPIC'] } },
    })

    const musl = resolveOverlay(spec, { os: 'linux', variant: 'musl', arch: 'amd64' })
    expect(musl.match.os).toBe('linux-musl')
    const glibcVariant = resolveOverlay(spec, { os: 'linux', variant: 'gnu', arch: 'amd64' })
    expect(glibcVariant.match.os).toBe('linux')
  })
})
