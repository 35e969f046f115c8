import type { Edge, Node } from '@pagegraph/graph'
import {
  allDownstreamEffects,
  assembleGraph,
  createEdge,
  createNode,
  directDownstreamEffects,
  htmlElementModifications,
  resourcesFromScript,
  rootUrl,
} from '@pagegraph/graph'
import { describe, expect, it } from 'vitest'

const ids = (items: Array<Node | Edge> | undefined) => items?.map(item => item.id)

// A page whose <script src> loads app.js, which fetches data.json and edits a div
function pageLoad() {
  return assembleGraph(
    [
      createNode({ id: 'n1', nodeType: { type: 'dom_root', url: 'https://example.test/' } }),
      createNode({ id: 'n2', nodeType: { type: 'parser' } }),
      createNode({ id: 'n3', nodeType: { type: 'html_element', tagName: 'script' } }),
      createNode({ id: 'n4', nodeType: { type: 'resource', url: 'https://cdn.example.test/app.js' } }),
      createNode({ id: 'n5', nodeType: { type: 'script', scriptType: 'classic' } }),
      createNode({ id: 'n6', nodeType: { type: 'resource', url: 'https://api.example.test/data.json' } }),
      createNode({ id: 'n7', nodeType: { type: 'html_element', tagName: 'div' } }),
      createNode({ id: 'n8', nodeType: { type: 'web_api', method: 'fetch' } }),
    ],
    [
      createEdge({ id: 'e1', source: 'n1', target: 'n3', edgeType: { type: 'structure' } }),
      createEdge({ id: 'e2', source: 'n2', target: 'n3', edgeType: { type: 'create_node' }, timestamp: 5 }),
      createEdge({
        id: 'e3',
        source: 'n3',
        target: 'n4',
        edgeType: { type: 'request_start', requestId: 1 },
        timestamp: 6,
      }),
      createEdge({
        id: 'e4',
        source: 'n4',
        target: 'n3',
        edgeType: { type: 'request_complete', requestId: 1, status: 'complete' },
        timestamp: 7,
      }),
      createEdge({ id: 'e5', source: 'n3', target: 'n5', edgeType: { type: 'execute' }, timestamp: 8 }),
      createEdge({
        id: 'e6',
        source: 'n5',
        target: 'n6',
        edgeType: { type: 'request_start', requestId: 2 },
        timestamp: 9,
      }),
      createEdge({
        id: 'e7',
        source: 'n6',
        target: 'n5',
        edgeType: { type: 'request_complete', requestId: 2, status: 'complete' },
        timestamp: 10,
      }),
      createEdge({ id: 'e8', source: 'n5', target: 'n7', edgeType: { type: 'create_node' }, timestamp: 12 }),
      createEdge({
        id: 'e9',
        source: 'n5',
        target: 'n7',
        edgeType: { type: 'set_attribute', key: 'class', value: 'ready' },
        timestamp: 11,
      }),
      createEdge({ id: 'e10', source: 'n1', target: 'n7', edgeType: { type: 'structure' } }),
      createEdge({ id: 'e11', source: 'n5', target: 'n8', edgeType: { type: 'js_call' }, timestamp: 13 }),
    ],
  )
}

describe('htmlElementModifications', () => {
  it('lists non-structural incoming edges by timestamp', () => {
    const graph = pageLoad()

    expect(ids(htmlElementModifications(graph, 'n7'))).toEqual(['e9', 'e8'])
    expect(ids(htmlElementModifications(graph, 'n3'))).toEqual(['e2', 'e4'])
  })

  it('puts edges without a timestamp last', () => {
    const graph = assembleGraph(
      [
        createNode({ id: 'p', nodeType: { type: 'parser' } }),
        createNode({ id: 'div', nodeType: { type: 'html_element', tagName: 'div' } }),
      ],
      [
        createEdge({ id: 'late', source: 'p', target: 'div', edgeType: { type: 'remove_node' } }),
        createEdge({ id: 'early', source: 'p', target: 'div', edgeType: { type: 'insert_node' }, timestamp: 1 }),
      ],
    )

    expect(ids(htmlElementModifications(graph, 'div'))).toEqual(['early', 'late'])
  })

  it('applies only to HTML elements', () => {
    const graph = pageLoad()

    expect(htmlElementModifications(graph, 'n5')).toBeUndefined()
    expect(htmlElementModifications(graph, 'missing')).toBeUndefined()
  })
})

describe('resourcesFromScript', () => {
  it('returns the resources a script requested', () => {
    expect(ids(resourcesFromScript(pageLoad(), 'n5'))).toEqual(['n6'])
  })

  it('includes resources requested by scripts a script element executed', () => {
    expect(ids(resourcesFromScript(pageLoad(), 'n3'))).toEqual(['n4', 'n6'])
  })

  it('applies only to scripts', () => {
    const graph = pageLoad()

    expect(resourcesFromScript(graph, 'n7')).toBeUndefined()
    expect(resourcesFromScript(graph, 'missing')).toBeUndefined()
  })
})

describe('rootUrl', () => {
  it('returns the URL of the top-level document', () => {
    expect(rootUrl(pageLoad())).toBe('https://example.test/')
  })

  it('returns undefined without a single root', () => {
    const graph = assembleGraph(
      [
        createNode({ id: 'a', nodeType: { type: 'dom_root', url: 'https://a.example.test/' } }),
        createNode({ id: 'b', nodeType: { type: 'dom_root', url: 'https://b.example.test/' } }),
      ],
      [],
    )

    expect(rootUrl(graph)).toBeUndefined()
    expect(rootUrl(assembleGraph([], []))).toBeUndefined()
  })

  it('ignores DOM roots of nested frames', () => {
    const graph = assembleGraph(
      [
        createNode({ id: 'top', nodeType: { type: 'dom_root', url: 'https://example.test/' } }),
        createNode({ id: 'frame', nodeType: { type: 'dom_root', url: 'https://ads.example.test/' } }),
      ],
      [createEdge({ id: 'e1', source: 'top', target: 'frame', edgeType: { type: 'cross_dom' } })],
    )

    expect(rootUrl(graph)).toBe('https://example.test/')
  })
})

describe('directDownstreamEffects', () => {
  it('follows a resource to the scripts it ran', () => {
    expect(ids(directDownstreamEffects(pageLoad(), 'n4'))).toEqual(['n5'])
  })

  it('follows a script element to the resources it requested', () => {
    expect(ids(directDownstreamEffects(pageLoad(), 'n3'))).toEqual(['n4'])
  })

  it('follows a script to the resources it received', () => {
    expect(ids(directDownstreamEffects(pageLoad(), 'n5'))).toEqual(['n6'])
  })

  it('has no effects for other kinds', () => {
    const graph = pageLoad()

    expect(directDownstreamEffects(graph, 'n7')).toEqual([])
    expect(directDownstreamEffects(graph, 'missing')).toBeUndefined()
  })
})

describe('allDownstreamEffects', () => {
  it('collects effects transitively without the starting node', () => {
    expect(ids(allDownstreamEffects(pageLoad(), 'n3'))).toEqual(['n4', 'n5', 'n6'])
  })

  it('returns undefined for an unknown node', () => {
    expect(allDownstreamEffects(pageLoad(), 'missing')).toBeUndefined()
  })
})
