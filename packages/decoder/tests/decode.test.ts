import { join } from 'node:path'
import { Readable } from 'node:stream'
import {
  decodeFromFile,
  decodeFromStream,
  decodeGraph,
  safeDecodeGraph,
} from '@pagegraph/decoder'
import {
  DanglingEdgeReferenceError,
  DuplicateIdentifierError,
  isHtmlElementWithTag,
  MalformedDocumentError,
  rootUrl,
  UnclassifiableElementError,
} from '@pagegraph/graph'
import { describe, expect, it } from 'vitest'

const fixture = (name: string) => join(__dirname, 'fixtures', name)

const PAGE = `<graphml>
  <key id="t" for="node" attr.name="node type"/>
  <key id="g" for="node" attr.name="tag name"/>
  <key id="d" for="node" attr.name="is deleted" attr.type="boolean"/>
  <key id="u" for="node" attr.name="url"/>
  <key id="x" for="node" attr.name="text"/>
  <key id="et" for="edge" attr.name="edge type"/>
  <graph>
    <node id="n1"><data key="t">DOM root</data><data key="u">https://example.test/</data></node>
    <node id="n2"><data key="t">HTML element</data><data key="g">div</data><data key="d">true</data></node>
    <node id="n3"><data key="t">HTML element</data><data key="g">DIV</data></node>
    <node id="n4"><data key="t">HTML element</data><data key="g">div</data><data key="d">true</data></node>
    <node id="n5"><data key="t">text node</data><data key="x">héllo → world</data></node>
    <edge id="e1" source="n1" target="n2"><data key="et">structure</data></edge>
    <edge id="e2" source="n1" target="n3"><data key="et">structure</data></edge>
  </graph>
</graphml>`

// A text node whose data holds the bytes 0xFF 0xFE, which are not UTF-8
function invalidUtf8(): Uint8Array {
  const encoder = new TextEncoder()
  return Buffer.concat([
    encoder.encode('<graphml><key id="t" for="node" attr.name="node type"/><key id="x" for="node" attr.name="text"/><graph><node id="a"><data key="t">text node</data><data key="x">ab'),
    Uint8Array.from([0xFF, 0xFE]),
    encoder.encode('</data></node></graph></graphml>'),
  ])
}

function singleNode(kind: string, id = 'a'): string {
  return `<graphml><key id="t" for="node" attr.name="node type"/><graph><node id="${id}"><data key="t">${kind}</data></node></graph></graphml>`
}

describe('decodeFromFile', () => {
  it('decodes a small page graph', async () => {
    const graph = await decodeFromFile(fixture('simple.graphml'))

    expect(graph.nodeCount).toBe(2)
    expect(graph.edgeCount).toBe(1)
    expect(graph.getNode('n1')).toEqual({
      id: 'n1',
      nodeType: { type: 'html_element', tagName: 'div', isDeleted: true, nodeId: 7, attributes: {} },
      timestamp: 10,
    })
    expect(graph.getNode('n2')).toEqual({
      id: 'n2',
      nodeType: { type: 'text_node', isDeleted: false },
      timestamp: 11,
    })
    expect(graph.getEdge('e1')).toEqual({
      id: 'e1',
      source: 'n1',
      target: 'n2',
      edgeType: { type: 'structure' },
      timestamp: 12,
    })
  })

  it('rejects an edge pointing at a missing node', async () => {
    await expect(decodeFromFile(fixture('dangling.graphml'))).rejects.toThrow(DanglingEdgeReferenceError)
    await expect(decodeFromFile(fixture('dangling.graphml'))).rejects.toThrow(
      'Edge e1 references missing target node n9',
    )
  })
})

describe('decodeGraph', () => {
  it('finds deleted div elements', () => {
    const graph = decodeGraph(PAGE)

    const deleted = graph.filterNodes(nodeType => isHtmlElementWithTag(nodeType, 'div') && nodeType.isDeleted)
    expect(deleted.map(node => node.id)).toEqual(['n2', 'n4'])
    expect(graph.nodesOfHtmlTagName('div').map(node => node.id)).toEqual(['n2', 'n3', 'n4'])
    expect(rootUrl(graph)).toBe('https://example.test/')
  })

  it('decodes UTF-8 bytes', () => {
    const graph = decodeGraph(new TextEncoder().encode(PAGE))

    expect(graph.getNode('n5')?.nodeType).toEqual({ type: 'text_node', text: 'héllo → world', isDeleted: false })
  })

  it('rejects bytes that are not valid UTF-8', () => {
    expect(() => decodeGraph(invalidUtf8())).toThrow(MalformedDocumentError)
    expect(() => decodeGraph(invalidUtf8())).toThrow('Malformed document: input is not valid UTF-8')
  })

  it('fails on an unknown kind in strict mode', () => {
    expect(() => decodeGraph(singleNode('hologram'))).toThrow(UnclassifiableElementError)
  })

  it('keeps an unknown kind in lenient mode', () => {
    const graph = decodeGraph(singleNode('hologram'), { mode: 'lenient' })

    expect(graph.getNode('a')?.nodeType).toEqual({
      type: 'unknown',
      kind: 'hologram',
      attributes: { 'node type': 'hologram' },
    })
  })

  it('rejects duplicate node identifiers', () => {
    const xml = `<graphml><key id="t" for="node" attr.name="node type"/><graph>
      <node id="a"><data key="t">parser</data></node>
      <node id="a"><data key="t">parser</data></node>
    </graph></graphml>`

    expect(() => decodeGraph(xml)).toThrow(DuplicateIdentifierError)
    expect(() => decodeGraph(xml)).toThrow('Duplicate node identifier: a')
  })

  it('reads kinds and timestamps from custom attributes', () => {
    const xml = `<graphml>
      <key id="k" for="node" attr.name="kind"/>
      <key id="a" for="edge" attr.name="action"/>
      <key id="s" attr.name="ts" attr.type="string"/>
      <graph>
        <node id="p"><data key="k">parser</data><data key="s">4</data></node>
        <node id="q"><data key="k">extensions</data></node>
        <edge id="e" source="p" target="q"><data key="a">create node</data><data key="s">4.5</data></edge>
      </graph>
    </graphml>`

    const graph = decodeGraph(xml, { nodeKindKey: 'kind', edgeKindKey: 'action', timestampKey: 'ts' })
    expect(graph.getNode('p')).toEqual({ id: 'p', nodeType: { type: 'parser' }, timestamp: 4 })
    expect(graph.getEdge('e')).toEqual({
      id: 'e',
      source: 'p',
      target: 'q',
      edgeType: { type: 'create_node' },
      timestamp: 4.5,
    })
  })

  it('rejects invalid options', () => {
    expect(() => decodeGraph(PAGE, { nodeKindKey: '' })).toThrow()
  })
})

describe('safeDecodeGraph', () => {
  it('returns the graph on success', () => {
    const result = safeDecodeGraph(PAGE)

    expect(result.success).toBe(true)
    if (result.success)
      expect(result.graph.nodeCount).toBe(5)
  })

  it('returns invalid UTF-8 as a malformed document', () => {
    const result = safeDecodeGraph(invalidUtf8())

    expect(result.success).toBe(false)
    if (!result.success)
      expect(result.error.code).toBe('MALFORMED_DOCUMENT')
  })

  it('returns decode failures', () => {
    const result = safeDecodeGraph('<graphml>')

    expect(result.success).toBe(false)
    if (!result.success)
      expect(result.error.code).toBe('MALFORMED_DOCUMENT')
  })
})

describe('decodeFromStream', () => {
  it('decodes chunks split inside a multi-byte character', async () => {
    const bytes = Buffer.from(PAGE, 'utf8')
    const cut = bytes.indexOf(Buffer.from('→', 'utf8')) + 1

    const graph = await decodeFromStream(Readable.from([bytes.subarray(0, cut), bytes.subarray(cut)]))
    expect(graph.getNode('n5')?.nodeType).toEqual({ type: 'text_node', text: 'héllo → world', isDeleted: false })
    expect(graph.edgeCount).toBe(2)
  })

  it('rejects a stream with invalid UTF-8', async () => {
    const bytes = invalidUtf8()

    await expect(decodeFromStream(Readable.from([bytes.subarray(0, 40), bytes.subarray(40)])))
      .rejects
      .toThrow(MalformedDocumentError)
  })

  it('rejects a stream that ends inside a multi-byte character', async () => {
    const bytes = Buffer.from(PAGE, 'utf8')
    const cut = bytes.indexOf(Buffer.from('→', 'utf8')) + 1

    await expect(decodeFromStream(Readable.from([bytes.subarray(0, cut)])))
      .rejects
      .toThrow('input is not valid UTF-8')
  })

  it('decodes string chunks', async () => {
    async function* chunks() {
      yield PAGE.slice(0, 100)
      yield PAGE.slice(100)
    }

    const graph = await decodeFromStream(chunks())
    expect(graph.nodeCount).toBe(5)
  })
})
