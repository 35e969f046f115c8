// Attribute decoding
export { attributeTypeOf, decodeAttribute, decodeAttributes } from './attributes'
export type { DecodedAttribute, RawAttribute } from './attributes'

// Classification
export { classifyEdge, classifyEdgeType, classifyNode, classifyNodeType } from './classifier'
export type { RawEdgeElement, RawElement } from './classifier'
export { EDGE_KINDS, NODE_KINDS } from './kinds'
export type { KindSpec } from './kinds'

// GraphML reading
export { GraphmlReader, readGraphml } from './graphml'
export type { GraphmlDocument, GraphmlKey } from './graphml'

// Options
export { DecodeMode, DecodeOptionsSchema, resolveDecodeOptions } from './options'
export type { DecodeOptions, DecodeOptionsInput } from './options'

// Entry points
export { decodeFromFile, decodeFromStream, decodeGraph, safeDecodeGraph } from './decode'
export type { DecodeResult } from './decode'
