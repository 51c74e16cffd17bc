import { parseSuite } from '@suitecraft/core'
import { describe, expect, test } from 'vitest'

import { formatGraphDot, toGraphJson } from './graph-format.js'
import { buildGraph } from './graph.js'

const { graph } = buildGraph([
  parseSuite(
    {
      name: 's',
      projects: { a: { subDir: 'a', dependencies: ['b'] }, b: { subDir: 'b' } },
      distributions: { D: { dependencies: ['a'], distDependencies: ['E'] }, E: {} },
    },
    { source: 'suite.toml', root: '/w' }
  ),
])

describe('formatGraphDot', () => {
  test('renders nodes and edges in build order', () => {
    expect(formatGraphDot(graph)).toBe(
      [
        'digraph suites {',
        '  rankdir=LR;',
        '  "s:E" [shape=box];',
        '  "s:b" [shape=ellipse];',
        '  "s:a" [shape=ellipse];',
        '  "s:D" [shape=box];',
        '  "s:a" -> "s:b";',
        '  "s:D" -> "s:a";',
        '  "s:D" -> "s:E" [style=dashed, label="distDependency"];',
        '}',
        '',
      ].join('\n')
    )
  })
})

describe('toGraphJson', () => {
  test('lists nodes with their dependencies', () => {
    const json = toGraphJson(graph)
    expect(json.order).toEqual(['s:E', 's:b', 's:a', 's:D'])
    expect(json.nodes.find((n) => n.id === 's:D')).toEqual({
      id: 's:D',
      kind: 'distribution',
      suite: 's',
      name: 'D',
      platformDependent: false,
      dependencies: [
        { id: 's:a', kind: 'dependency' },
        { id: 's:E', kind: 'distDependency' },
      ],
    })
  })
})
