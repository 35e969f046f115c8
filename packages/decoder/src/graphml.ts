import type { SaxesTagPlain } from 'saxes'
import type { RawAttribute } from './attributes'
import type { RawEdgeElement, RawElement } from './classifier'
import type { DecodeOptions } from './options'
import { MalformedDocumentError, PageGraphError } from '@pagegraph/graph/errors'
import { createLogger } from '@pagegraph/utils/logger'
import { SaxesParser } from 'saxes'
import { attributeTypeOf } from './attributes'

const log = createLogger('GraphML')

/**
 * A `<key>` declaration
 */
export interface GraphmlKey {
  readonly id: string
  /** The `for` attribute: node, edge, graph, all... */
  readonly domain: string
  /** The `attr.name` attribute, or the key id when there is none */
  readonly name: string
  /** The `attr.type` attribute as written */
  readonly declaredType: string | undefined
  readonly defaultValue: string | undefined
}

/**
 * Node and edge elements of the document's graph, in document order
 */
export interface GraphmlDocument {
  readonly keys: ReadonlyMap<string, GraphmlKey>
  readonly nodes: RawElement[]
  readonly edges: RawEdgeElement[]
}

interface OpenKey {
  id: string
  domain: string
  name: string
  declaredType: string | undefined
  defaultValue?: string
}

interface OpenElement {
  collection: 'node' | 'edge'
  id: string
  source: string
  target: string
  data: Map<string, RawAttribute>
}

// Text collected for a <data> or <default> element
interface Capture {
  key: string | undefined
  text: string
}

function localName(name: string): string {
  return name.slice(name.indexOf(':') + 1)
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value
}

/**
 * Incremental GraphML reader.
 *
 * Feed the document with `write()` in any number of chunks, then `close()`.
 * Only the first `<graph>` is read. Elements other than keys, nodes, edges and
 * their data are skipped.
 */
export class GraphmlReader {
  private readonly parser = new SaxesParser({ xmlns: false, position: true })
  private readonly keys = new Map<string, GraphmlKey>()
  private readonly nodes: RawElement[] = []
  private readonly edges: RawEdgeElement[] = []
  /** Local names of the open elements, outermost first */
  private readonly stack: string[] = []
  private graphs = 0
  private started = false
  private key: OpenKey | null = null
  private element: OpenElement | null = null
  private capture: Capture | null = null

  constructor(private readonly options: DecodeOptions) {
    this.parser.on('opentag', tag => this.onOpen(tag))
    this.parser.on('closetag', tag => this.onClose(tag))
    this.parser.on('text', text => this.onText(text))
    this.parser.on('cdata', text => this.onText(text))
  }

  write(chunk: string): this {
    const text = !this.started && chunk.charCodeAt(0) === 0xFEFF ? chunk.slice(1) : chunk
    if (text.length > 0)
      this.started = true
    this.guard(() => this.parser.write(text))
    return this
  }

  close(): GraphmlDocument {
    this.guard(() => this.parser.close())
    if (this.graphs === 0)
      this.fail('no <graph> element')
    if (this.graphs > 1)
      log.warn(`Document has ${this.graphs} <graph> elements; only the first is read`)
    return { keys: this.keys, nodes: this.nodes, edges: this.edges }
  }

  private guard(action: () => void): void {
    try {
      action()
    }
    catch (err) {
      if (err instanceof PageGraphError)
        throw err
      const message = err instanceof Error ? err.message.replace(/^\d+:\d+: /, '') : String(err)
      throw new MalformedDocumentError(message, this.parser.line, this.parser.column, { cause: err })
    }
  }

  private fail(message: string): never {
    throw new MalformedDocumentError(message, this.parser.line, this.parser.column)
  }

  private onOpen(tag: SaxesTagPlain): void {
    const name = localName(tag.name)
    const parent = this.stack.at(-1)
    const depth = this.stack.length
    this.stack.push(name)

    if (depth === 0) {
      if (name !== 'graphml')
        this.fail(`expected <graphml> root element, found <${tag.name}>`)
      return
    }

    if (parent === 'graphml' && depth === 1) {
      if (name === 'key')
        this.openKey(tag)
      else if (name === 'graph')
        this.graphs += 1
      return
    }

    if (parent === 'key' && depth === 2 && name === 'default' && this.key) {
      this.capture = { key: undefined, text: '' }
      return
    }

    if (parent === 'graph' && depth === 2 && this.graphs === 1) {
      if (name === 'node' || name === 'edge')
        this.openElement(name, tag)
      return
    }

    if ((parent === 'node' || parent === 'edge') && depth === 3 && name === 'data' && this.element)
      this.capture = { key: nonEmpty(tag.attributes.key), text: '' }
  }

  private onClose(tag: SaxesTagPlain): void {
    const name = localName(tag.name)
    this.stack.pop()
    const depth = this.stack.length

    if (name === 'default' && depth === 2 && this.key && this.capture) {
      this.key.defaultValue = this.capture.text
      this.capture = null
    }
    else if (name === 'key' && depth === 1 && this.key) {
      this.keys.set(this.key.id, { ...this.key, defaultValue: this.key.defaultValue })
      this.key = null
    }
    else if (name === 'data' && depth === 3 && this.element && this.capture) {
      this.closeData(this.element, this.capture)
      this.capture = null
    }
    else if ((name === 'node' || name === 'edge') && depth === 2 && this.element) {
      this.closeElement(this.element)
      this.element = null
    }
  }

  private onText(text: string): void {
    if (this.capture)
      this.capture.text += text
  }

  private openKey(tag: SaxesTagPlain): void {
    const id = nonEmpty(tag.attributes.id)
    if (id === undefined)
      this.fail('<key> element without an id')
    this.key = {
      id,
      domain: nonEmpty(tag.attributes.for) ?? 'all',
      name: nonEmpty(tag.attributes['attr.name']) ?? id,
      declaredType: nonEmpty(tag.attributes['attr.type']),
    }
  }

  private openElement(collection: 'node' | 'edge', tag: SaxesTagPlain): void {
    const position = collection === 'node' ? this.nodes.length : this.edges.length
    const id = nonEmpty(tag.attributes.id)
    if (id === undefined)
      this.fail(`${collection} #${position + 1} has no id`)

    let source = ''
    let target = ''
    if (collection === 'edge') {
      const from = nonEmpty(tag.attributes.source)
      const to = nonEmpty(tag.attributes.target)
      if (from === undefined || to === undefined)
        this.fail(`edge ${id} needs both a source and a target`)
      source = from
      target = to
    }
    this.element = { collection, id, source, target, data: new Map() }
  }

  private attribute(name: string, declaredType: string | undefined, raw: string): RawAttribute {
    return { type: attributeTypeOf(declaredType, name, this.options.timestampKey), raw }
  }

  private closeData(element: OpenElement, capture: Capture): void {
    if (capture.key === undefined)
      this.fail(`<data> without a key on ${element.collection} ${element.id}`)
    const key = this.keys.get(capture.key)
    // Undeclared keys are kept under their own id, as strings
    const name = key?.name ?? capture.key
    element.data.set(name, this.attribute(name, key?.declaredType, capture.text))
  }

  private closeElement(element: OpenElement): void {
    for (const key of this.keys.values()) {
      if (key.defaultValue === undefined || element.data.has(key.name))
        continue
      if (key.domain === element.collection || key.domain === 'all')
        element.data.set(key.name, this.attribute(key.name, key.declaredType, key.defaultValue))
    }

    const kindKey = element.collection === 'node' ? this.options.nodeKindKey : this.options.edgeKindKey
    const raw: RawElement = {
      id: element.id,
      kind: element.data.get(kindKey)?.raw,
      attributes: element.data,
    }
    if (element.collection === 'node')
      this.nodes.push(raw)
    else
      this.edges.push({ ...raw, source: element.source, target: element.target })
  }
}

/**
 * Read a whole GraphML document held in memory
 *
 * @throws MalformedDocumentError when the document is not well-formed GraphML
 */
export function readGraphml(xml: string, options: DecodeOptions): GraphmlDocument {
  return new GraphmlReader(options).write(xml).close()
}
