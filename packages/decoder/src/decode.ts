import type { PageGraph } from '@pagegraph/graph'
import type { GraphmlDocument } from './graphml'
import type { DecodeOptions, DecodeOptionsInput } from './options'
import { readFile } from 'node:fs/promises'
import { TextDecoder } from 'node:util'
import { assembleGraph, MalformedDocumentError, PageGraphError } from '@pagegraph/graph'
import { createLogger } from '@pagegraph/utils/logger'
import { classifyEdge, classifyNode } from './classifier'
import { GraphmlReader } from './graphml'
import { resolveDecodeOptions } from './options'

const log = createLogger('Decoder')

/**
 * Outcome of `safeDecodeGraph`
 */
export type DecodeResult =
  | { success: true, graph: PageGraph }
  | { success: false, error: PageGraphError }

/**
 * Decode UTF-8 bytes, rejecting invalid sequences instead of replacing them
 */
function decodeUtf8(decoder: TextDecoder, bytes?: Uint8Array, stream = false): string {
  try {
    return decoder.decode(bytes, { stream })
  }
  catch (err) {
    throw new MalformedDocumentError('input is not valid UTF-8', undefined, undefined, { cause: err })
  }
}

function utf8Decoder(): TextDecoder {
  return new TextDecoder('utf-8', { fatal: true })
}

function buildGraph(document: GraphmlDocument, options: DecodeOptions): PageGraph {
  log.debug(`Classifying ${document.nodes.length} nodes and ${document.edges.length} edges (${options.mode})`)
  const nodes = document.nodes.map(element => classifyNode(element, options))
  const edges = document.edges.map(element => classifyEdge(element, options))
  return assembleGraph(nodes, edges)
}

/**
 * Decode a GraphML PageGraph document held in memory.
 *
 * Bytes are read as UTF-8; invalid sequences make the document malformed.
 *
 * @throws PageGraphError subclasses for malformed documents, unclassifiable
 * elements, missing required attributes and broken identifiers
 */
export function decodeGraph(input: string | Uint8Array, options?: DecodeOptionsInput): PageGraph {
  const resolved = resolveDecodeOptions(options)
  const xml = typeof input === 'string' ? input : decodeUtf8(utf8Decoder(), input)
  return buildGraph(new GraphmlReader(resolved).write(xml).close(), resolved)
}

/**
 * Like `decodeGraph`, but returns decode failures instead of throwing them
 */
export function safeDecodeGraph(input: string | Uint8Array, options?: DecodeOptionsInput): DecodeResult {
  try {
    return { success: true, graph: decodeGraph(input, options) }
  }
  catch (err) {
    if (err instanceof PageGraphError)
      return { success: false, error: err }
    throw err
  }
}

/**
 * Decode a document from a byte or text stream, such as a Node.js Readable.
 * Chunks are parsed as they arrive.
 */
export async function decodeFromStream(
  stream: AsyncIterable<Uint8Array | string>,
  options?: DecodeOptionsInput,
): Promise<PageGraph> {
  const resolved = resolveDecodeOptions(options)
  const reader = new GraphmlReader(resolved)
  const decoder = utf8Decoder()
  for await (const chunk of stream)
    reader.write(typeof chunk === 'string' ? chunk : decodeUtf8(decoder, chunk, true))
  reader.write(decodeUtf8(decoder))
  return buildGraph(reader.close(), resolved)
}

/**
 * Decode the document at a file path
 */
export async function decodeFromFile(path: string, options?: DecodeOptionsInput): Promise<PageGraph> {
  const resolved = resolveDecodeOptions(options)
  log.debug(`Reading ${path}`)
  return decodeGraph(await readFile(path), resolved)
}
