import { describe, expect, test } from 'vitest'

import { PathResolver } from './paths.js'

describe('PathResolver', () => {
  const paths = new PathResolver({ outputRoot: '/w/build', cacheDir: '/home/u/.suitecraft/cache' })

  test('node outputs live under platform and suite', () => {
    expect(paths.target({ os: 'linux', arch: 'amd64' })).toBe('/w/build/linux-amd64')
    expect(paths.nodeOutput({ os: 'linux', variant: 'musl', arch: 'amd64' }, 'core:API')).toBe(
      '/w/build/linux-musl-amd64/core/API'
    )
  })

  test('cache entries, metadata and locks', () => {
    expect(paths.cacheEntry('abc')).toBe('/home/u/.suitecraft/cache/abc')
    expect(paths.cacheMetadata('abc')).toBe('/home/u/.suitecraft/cache/abc/.suitecraft-cache.json')
    expect(paths.cacheLock('abc')).toBe('/home/u/.suitecraft/cache/locks/abc.lock')
  })
})
