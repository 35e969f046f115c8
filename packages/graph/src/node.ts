import { z } from 'zod/v4'
import { AttributeMapSchema, RawAttributeMapSchema } from './scalar'

/**
 * Node variants of a PageGraph
 */
export const NodeKind = {
  HtmlElement: 'html_element',
  TextNode: 'text_node',
  DomRoot: 'dom_root',
  FrameOwner: 'frame_owner',
  RemoteFrame: 'remote_frame',
  Script: 'script',
  Storage: 'storage',
  LocalStorage: 'local_storage',
  SessionStorage: 'session_storage',
  CookieJar: 'cookie_jar',
  WebApi: 'web_api',
  JsBuiltin: 'js_builtin',
  Resource: 'resource',
  Parser: 'parser',
  Extensions: 'extensions',
  AdFilter: 'ad_filter',
  TrackerFilter: 'tracker_filter',
  FingerprintingFilter: 'fingerprinting_filter',
  BraveShields: 'brave_shields',
  AdsShield: 'ads_shield',
  TrackersShield: 'trackers_shield',
  JavascriptShield: 'javascript_shield',
  FingerprintingShield: 'fingerprinting_shield',
  Unknown: 'unknown',
} as const

export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind]

function fieldless<T extends NodeKind>(type: T) {
  return z.object({ type: z.literal(type) })
}

/** Deletion flag; PageGraph omits it for live nodes */
const isDeleted = z.boolean().default(false)

/** Blink's own DOM node id, distinct from the graph identifier */
const blinkNodeId = z.number().int().optional()

/**
 * An element in the page's DOM
 */
export const HtmlElementSchema = z.object({
  type: z.literal(NodeKind.HtmlElement),
  tagName: z.string(),
  isDeleted,
  nodeId: blinkNodeId,
  /** Recorded attributes that no field above consumes */
  attributes: AttributeMapSchema.default({}),
})

export type HtmlElement = z.infer<typeof HtmlElementSchema>

export const TextNodeSchema = z.object({
  type: z.literal(NodeKind.TextNode),
  text: z.string().optional(),
  isDeleted,
  nodeId: blinkNodeId,
})

export type TextNode = z.infer<typeof TextNodeSchema>

/**
 * Root of a document, one per frame
 */
export const DomRootSchema = z.object({
  type: z.literal(NodeKind.DomRoot),
  url: z.string().optional(),
  tagName: z.string().optional(),
  isDeleted,
  nodeId: blinkNodeId,
})

export type DomRoot = z.infer<typeof DomRootSchema>

export const FrameOwnerSchema = z.object({
  type: z.literal(NodeKind.FrameOwner),
  tagName: z.string(),
  isDeleted,
  nodeId: blinkNodeId,
})

export type FrameOwner = z.infer<typeof FrameOwnerSchema>

export const RemoteFrameSchema = z.object({
  type: z.literal(NodeKind.RemoteFrame),
  frameId: z.string(),
})

export type RemoteFrame = z.infer<typeof RemoteFrameSchema>

/**
 * A compiled script, inline or fetched
 */
export const ScriptSchema = z.object({
  type: z.literal(NodeKind.Script),
  /** e.g. "classic", "module", "eval" */
  scriptType: z.string(),
  source: z.string().optional(),
  url: z.string().optional(),
  scriptId: z.number().int().optional(),
})

export type Script = z.infer<typeof ScriptSchema>

export const StorageSchema = fieldless(NodeKind.Storage)
export const LocalStorageSchema = fieldless(NodeKind.LocalStorage)
export const SessionStorageSchema = fieldless(NodeKind.SessionStorage)
export const CookieJarSchema = fieldless(NodeKind.CookieJar)

export const WebApiSchema = z.object({
  type: z.literal(NodeKind.WebApi),
  method: z.string(),
})

export type WebApi = z.infer<typeof WebApiSchema>

export const JsBuiltinSchema = z.object({
  type: z.literal(NodeKind.JsBuiltin),
  method: z.string(),
})

export type JsBuiltin = z.infer<typeof JsBuiltinSchema>

/**
 * A network resource requested during the page load
 */
export const ResourceSchema = z.object({
  type: z.literal(NodeKind.Resource),
  url: z.string(),
})

export type Resource = z.infer<typeof ResourceSchema>

export const ParserSchema = fieldless(NodeKind.Parser)
export const ExtensionsSchema = fieldless(NodeKind.Extensions)

export const AdFilterSchema = z.object({
  type: z.literal(NodeKind.AdFilter),
  rule: z.string(),
})

export type AdFilter = z.infer<typeof AdFilterSchema>

export const TrackerFilterSchema = fieldless(NodeKind.TrackerFilter)
export const FingerprintingFilterSchema = fieldless(NodeKind.FingerprintingFilter)
export const BraveShieldsSchema = fieldless(NodeKind.BraveShields)
export const AdsShieldSchema = fieldless(NodeKind.AdsShield)
export const TrackersShieldSchema = fieldless(NodeKind.TrackersShield)
export const JavascriptShieldSchema = fieldless(NodeKind.JavascriptShield)
export const FingerprintingShieldSchema = fieldless(NodeKind.FingerprintingShield)

/**
 * A node whose kind has no variant. Keeps the source attributes verbatim.
 */
export const UnknownNodeSchema = z.object({
  type: z.literal(NodeKind.Unknown),
  kind: z.string(),
  attributes: RawAttributeMapSchema,
})

export type UnknownNode = z.infer<typeof UnknownNodeSchema>

/**
 * Union of all node variants
 */
export const NodeTypeSchema = z.discriminatedUnion('type', [
  HtmlElementSchema,
  TextNodeSchema,
  DomRootSchema,
  FrameOwnerSchema,
  RemoteFrameSchema,
  ScriptSchema,
  StorageSchema,
  LocalStorageSchema,
  SessionStorageSchema,
  CookieJarSchema,
  WebApiSchema,
  JsBuiltinSchema,
  ResourceSchema,
  ParserSchema,
  ExtensionsSchema,
  AdFilterSchema,
  TrackerFilterSchema,
  FingerprintingFilterSchema,
  BraveShieldsSchema,
  AdsShieldSchema,
  TrackersShieldSchema,
  JavascriptShieldSchema,
  FingerprintingShieldSchema,
  UnknownNodeSchema,
])

export type NodeType = z.infer<typeof NodeTypeSchema>

/** The variant of `NodeType` for a given kind */
export type NodeOfKind<K extends NodeKind> = Extract<NodeType, { type: K }>

/**
 * A node of the graph: a side effect observed during the page load
 */
export const NodeSchema = z.object({
  /** Graph identifier, as written in the document */
  id: z.string(),
  nodeType: NodeTypeSchema,
  timestamp: z.number().optional(),
})

export type Node = z.infer<typeof NodeSchema>

/** A node narrowed to one variant */
export type NodeWithKind<K extends NodeKind> = Node & { nodeType: NodeOfKind<K> }

export type HtmlElementNode = NodeWithKind<typeof NodeKind.HtmlElement>

/**
 * Create a node, applying variant defaults
 */
export function createNode(params: z.input<typeof NodeSchema>): Node {
  return NodeSchema.parse(params)
}

/**
 * Check whether a node type is of the given kind
 */
export function isNodeKind<K extends NodeKind>(nodeType: NodeType, kind: K): nodeType is NodeOfKind<K> {
  return nodeType.type === kind
}

/**
 * Check whether a node's type is of the given kind
 */
export function hasNodeKind<K extends NodeKind>(node: Node, kind: K): node is NodeWithKind<K> {
  return node.nodeType.type === kind
}

export function isHtmlElementNode(node: Node): node is HtmlElementNode {
  return node.nodeType.type === NodeKind.HtmlElement
}

export function isHtmlElement(nodeType: NodeType): nodeType is HtmlElement {
  return nodeType.type === NodeKind.HtmlElement
}

export function isScript(nodeType: NodeType): nodeType is Script {
  return nodeType.type === NodeKind.Script
}

export function isResource(nodeType: NodeType): nodeType is Resource {
  return nodeType.type === NodeKind.Resource
}

export function isUnknownNode(nodeType: NodeType): nodeType is UnknownNode {
  return nodeType.type === NodeKind.Unknown
}

/**
 * Check whether a node is an HTML element with the given tag name
 */
export function isHtmlElementWithTag(nodeType: NodeType, tagName: string, caseSensitive = false): nodeType is HtmlElement {
  if (nodeType.type !== NodeKind.HtmlElement)
    return false
  return caseSensitive
    ? nodeType.tagName === tagName
    : nodeType.tagName.toLowerCase() === tagName.toLowerCase()
}
