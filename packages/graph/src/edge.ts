import { z } from 'zod/v4'
import { RawAttributeMapSchema } from './scalar'

/**
 * Edge variants of a PageGraph
 */
export const EdgeKind = {
  Structure: 'structure',
  CreateNode: 'create_node',
  InsertNode: 'insert_node',
  RemoveNode: 'remove_node',
  DeleteNode: 'delete_node',
  TextChange: 'text_change',
  SetAttribute: 'set_attribute',
  DeleteAttribute: 'delete_attribute',
  RequestStart: 'request_start',
  RequestComplete: 'request_complete',
  RequestError: 'request_error',
  ExecuteFromAttribute: 'execute_from_attribute',
  Execute: 'execute',
  JsCall: 'js_call',
  JsResult: 'js_result',
  AddEventListener: 'add_event_listener',
  RemoveEventListener: 'remove_event_listener',
  EventListener: 'event_listener',
  StorageSet: 'storage_set',
  StorageReadCall: 'storage_read_call',
  StorageReadResult: 'storage_read_result',
  DeleteStorage: 'delete_storage',
  ClearStorage: 'clear_storage',
  StorageBucket: 'storage_bucket',
  CrossDom: 'cross_dom',
  Filter: 'filter',
  Shield: 'shield',
  ResourceBlock: 'resource_block',
  Unknown: 'unknown',
} as const

export type EdgeKind = (typeof EdgeKind)[keyof typeof EdgeKind]

function fieldless<T extends EdgeKind>(type: T) {
  return z.object({ type: z.literal(type) })
}

/** Network request identifier shared by the start/complete/error edges of one request */
const requestId = z.number().int()

const isStyle = z.boolean().default(false)

export const StructureSchema = fieldless(EdgeKind.Structure)
export const CreateNodeSchema = fieldless(EdgeKind.CreateNode)

/**
 * Insertion of a DOM node under `parent`, ahead of `before` when set
 */
export const InsertNodeSchema = z.object({
  type: z.literal(EdgeKind.InsertNode),
  parent: z.number().int().optional(),
  before: z.number().int().optional(),
})

export type InsertNode = z.infer<typeof InsertNodeSchema>

export const RemoveNodeSchema = fieldless(EdgeKind.RemoveNode)
export const DeleteNodeSchema = fieldless(EdgeKind.DeleteNode)
export const TextChangeSchema = fieldless(EdgeKind.TextChange)

export const SetAttributeSchema = z.object({
  type: z.literal(EdgeKind.SetAttribute),
  key: z.string(),
  value: z.string().optional(),
  isStyle,
})

export type SetAttribute = z.infer<typeof SetAttributeSchema>

export const DeleteAttributeSchema = z.object({
  type: z.literal(EdgeKind.DeleteAttribute),
  key: z.string(),
  isStyle,
})

export type DeleteAttribute = z.infer<typeof DeleteAttributeSchema>

export const RequestStartSchema = z.object({
  type: z.literal(EdgeKind.RequestStart),
  requestId,
  /** e.g. "Script", "Image", "XMLHttpRequest" */
  requestType: z.string().optional(),
})

export type RequestStart = z.infer<typeof RequestStartSchema>

export const RequestCompleteSchema = z.object({
  type: z.literal(EdgeKind.RequestComplete),
  requestId,
  status: z.string(),
  resourceType: z.string().optional(),
  size: z.number().int().optional(),
})

export type RequestComplete = z.infer<typeof RequestCompleteSchema>

export const RequestErrorSchema = z.object({
  type: z.literal(EdgeKind.RequestError),
  requestId,
  status: z.string().optional(),
})

export type RequestError = z.infer<typeof RequestErrorSchema>

export const ExecuteFromAttributeSchema = z.object({
  type: z.literal(EdgeKind.ExecuteFromAttribute),
  attrName: z.string().optional(),
})

export type ExecuteFromAttribute = z.infer<typeof ExecuteFromAttributeSchema>

export const ExecuteSchema = fieldless(EdgeKind.Execute)

export const JsCallSchema = z.object({
  type: z.literal(EdgeKind.JsCall),
  method: z.string().optional(),
  args: z.string().optional(),
})

export type JsCall = z.infer<typeof JsCallSchema>

export const JsResultSchema = z.object({
  type: z.literal(EdgeKind.JsResult),
  value: z.string().optional(),
})

export type JsResult = z.infer<typeof JsResultSchema>

function listenerEdge<T extends EdgeKind>(type: T) {
  return z.object({
    type: z.literal(type),
    /** Event name */
    key: z.string(),
    eventListenerId: z.number().int().optional(),
  })
}

export const AddEventListenerSchema = listenerEdge(EdgeKind.AddEventListener)
export const RemoveEventListenerSchema = listenerEdge(EdgeKind.RemoveEventListener)
export const EventListenerSchema = listenerEdge(EdgeKind.EventListener)

export const StorageSetSchema = z.object({
  type: z.literal(EdgeKind.StorageSet),
  key: z.string(),
  value: z.string().optional(),
})

export const StorageReadCallSchema = z.object({
  type: z.literal(EdgeKind.StorageReadCall),
  key: z.string(),
})

export const StorageReadResultSchema = z.object({
  type: z.literal(EdgeKind.StorageReadResult),
  key: z.string(),
  value: z.string().optional(),
})

export const DeleteStorageSchema = z.object({
  type: z.literal(EdgeKind.DeleteStorage),
  key: z.string(),
})

export const ClearStorageSchema = z.object({
  type: z.literal(EdgeKind.ClearStorage),
  key: z.string().optional(),
})

export const StorageBucketSchema = fieldless(EdgeKind.StorageBucket)
export const CrossDomSchema = fieldless(EdgeKind.CrossDom)
export const FilterSchema = fieldless(EdgeKind.Filter)
export const ShieldSchema = fieldless(EdgeKind.Shield)
export const ResourceBlockSchema = fieldless(EdgeKind.ResourceBlock)

/**
 * An edge whose kind has no variant. Keeps the source attributes verbatim.
 */
export const UnknownEdgeSchema = z.object({
  type: z.literal(EdgeKind.Unknown),
  kind: z.string(),
  attributes: RawAttributeMapSchema,
})

export type UnknownEdge = z.infer<typeof UnknownEdgeSchema>

/**
 * Union of all edge variants
 */
export const EdgeTypeSchema = z.discriminatedUnion('type', [
  StructureSchema,
  CreateNodeSchema,
  InsertNodeSchema,
  RemoveNodeSchema,
  DeleteNodeSchema,
  TextChangeSchema,
  SetAttributeSchema,
  DeleteAttributeSchema,
  RequestStartSchema,
  RequestCompleteSchema,
  RequestErrorSchema,
  ExecuteFromAttributeSchema,
  ExecuteSchema,
  JsCallSchema,
  JsResultSchema,
  AddEventListenerSchema,
  RemoveEventListenerSchema,
  EventListenerSchema,
  StorageSetSchema,
  StorageReadCallSchema,
  StorageReadResultSchema,
  DeleteStorageSchema,
  ClearStorageSchema,
  StorageBucketSchema,
  CrossDomSchema,
  FilterSchema,
  ShieldSchema,
  ResourceBlockSchema,
  UnknownEdgeSchema,
])

export type EdgeType = z.infer<typeof EdgeTypeSchema>

/** The variant of `EdgeType` for a given kind */
export type EdgeOfKind<K extends EdgeKind> = Extract<EdgeType, { type: K }>

/**
 * An edge of the graph: an action taken during the page load
 */
export const EdgeSchema = z.object({
  id: z.string(),
  /** Identifier of the acting node */
  source: z.string(),
  /** Identifier of the node acted upon */
  target: z.string(),
  edgeType: EdgeTypeSchema,
  timestamp: z.number().optional(),
})

export type Edge = z.infer<typeof EdgeSchema>

/**
 * Create an edge, applying variant defaults
 */
export function createEdge(params: z.input<typeof EdgeSchema>): Edge {
  return EdgeSchema.parse(params)
}

/**
 * Check whether an edge type is of the given kind
 */
export function isEdgeKind<K extends EdgeKind>(edgeType: EdgeType, kind: K): edgeType is EdgeOfKind<K> {
  return edgeType.type === kind
}

export function isStructureEdge(edgeType: EdgeType): boolean {
  return edgeType.type === EdgeKind.Structure
}

export function isUnknownEdge(edgeType: EdgeType): edgeType is UnknownEdge {
  return edgeType.type === EdgeKind.Unknown
}
