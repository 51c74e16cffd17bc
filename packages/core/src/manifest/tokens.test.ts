import { describe, expect, test } from 'vitest'

import { parseDependencyRef, parseLayoutEntry, parseModuleExport } from './tokens.js'

describe('parseDependencyRef', () => {
  test('parses bare and suite-qualified names', () => {
    expect(parseDependencyRef('com.acme.util')).toEqual({
      ok: true,
      value: { name: 'com.acme.util', raw: 'com.acme.util' },
    })
    expect(parseDependencyRef('tools:TOOLS_API')).toEqual({
      ok: true,
      value: { suite: 'tools', name: 'TOOLS_API', raw: 'tools:TOOLS_API' },
    })
  })

  test('rejects extra colons and empty parts', () => {
    expect(parseDependencyRef('a:b:c').ok).toBe(false)
    expect(parseDependencyRef(':b').ok).toBe(false)
    expect(parseDependencyRef('has space').ok).toBe(false)
  })
})

describe('parseLayoutEntry', () => {
  test('literal file', () => {
    expect(parseLayoutEntry('file:README.md')).toEqual({
      ok: true,
      value: { kind: 'literal', path: 'README.md', token: 'file:README.md' },
    })
    expect(parseLayoutEntry('file:/etc/passwd').ok).toBe(false)
  })

  test('dependency artifact', () => {
    expect(parseLayoutEntry('dependency:core:API')).toEqual({
      ok: true,
      value: {
        kind: 'dependency',
        ref: { suite: 'core', name: 'API', raw: 'core:API' },
        token: 'dependency:core:API',
      },
    })
  })

  test('whole tree and pattern selectors', () => {
    expect(parseLayoutEntry('dependency:NATIVE/*')).toEqual({
      ok: true,
      value: {
        kind: 'dependency-glob',
        ref: { name: 'NATIVE', raw: 'NATIVE' },
        pattern: '*',
        token: 'dependency:NATIVE/*',
      },
    })
    const nested = parseLayoutEntry('dependency:x:NATIVE/include/*.h')
    expect(nested.ok && nested.value.kind === 'dependency-glob' && nested.value.pattern).toBe(
      'include/*.h'
    )
  })

  test('library selector', () => {
    expect(parseLayoutEntry('dependency:suiteX:nativeLib/<lib:foo>')).toEqual({
      ok: true,
      value: {
        kind: 'library',
        ref: { suite: 'suiteX', name: 'nativeLib', raw: 'suiteX:nativeLib' },
        library: 'foo',
        token: 'dependency:suiteX:nativeLib/<lib:foo>',
      },
    })
  })

  test('inline content', () => {
    expect(parseLayoutEntry({ source_type: 'string', value: 'hello' })).toEqual({
      ok: true,
      value: { kind: 'inline', content: 'hello', token: 'string:hello' },
    })
    expect(parseLayoutEntry({ source_type: 'file', value: 'x' }).ok).toBe(false)
  })

  test('rejects unknown selectors and prefixes', () => {
    expect(parseLayoutEntry('dependency:x:N/<exe:foo>')).toEqual({
      ok: false,
      message: '"dependency:x:N/<exe:foo>" has an unknown selector "<exe:foo>"',
    })
    expect(parseLayoutEntry('dependency:x:N/').ok).toBe(false)
    expect(parseLayoutEntry('link:foo').ok).toBe(false)
    expect(parseLayoutEntry('').ok).toBe(false)
  })
})

describe('parseModuleExport', () => {
  test('plain and qualified exports', () => {
    expect(parseModuleExport('com.acme.api')).toEqual({
      ok: true,
      value: { packages: ['com.acme.api'], to: [], raw: 'com.acme.api' },
    })
    expect(parseModuleExport('a.b,a.c to other.module, third')).toEqual({
      ok: true,
      value: { packages: ['a.b', 'a.c'], to: ['other.module', 'third'], raw: 'a.b,a.c to other.module, third' },
    })
  })

  test('rejects empty clauses', () => {
    expect(parseModuleExport(' to x').ok).toBe(false)
    expect(parseModuleExport('a to b to c').ok).toBe(false)
  })
})
