import { EdgeKind } from '@pagegraph/graph/edge'
import { NodeKind } from '@pagegraph/graph/node'

/**
 * How one PageGraph kind maps onto a variant
 */
export interface KindSpec<V extends string = string> {
  readonly variant: V
  /** Variant field → source attribute name */
  readonly fields: Readonly<Record<string, string>>
  /** Collect every attribute no field consumes into an `attributes` field */
  readonly keepsRest?: boolean
}

const DOM_NODE_FIELDS = {
  isDeleted: 'is deleted',
  nodeId: 'node id',
} as const

function kinds<V extends string>(entries: Array<[kind: string, spec: KindSpec<V>]>): ReadonlyMap<string, KindSpec<V>> {
  return new Map(entries)
}

/**
 * Node kinds as written by PageGraph in the `node type` attribute
 */
export const NODE_KINDS = kinds<NodeKind>([
  ['HTML element', {
    variant: NodeKind.HtmlElement,
    fields: { tagName: 'tag name', ...DOM_NODE_FIELDS },
    keepsRest: true,
  }],
  ['text node', { variant: NodeKind.TextNode, fields: { text: 'text', ...DOM_NODE_FIELDS } }],
  ['DOM root', { variant: NodeKind.DomRoot, fields: { url: 'url', tagName: 'tag name', ...DOM_NODE_FIELDS } }],
  ['frame owner', { variant: NodeKind.FrameOwner, fields: { tagName: 'tag name', ...DOM_NODE_FIELDS } }],
  ['remote frame', { variant: NodeKind.RemoteFrame, fields: { frameId: 'frame id' } }],
  ['script', {
    variant: NodeKind.Script,
    fields: { scriptType: 'script type', source: 'source', url: 'url', scriptId: 'script id' },
  }],
  ['storage', { variant: NodeKind.Storage, fields: {} }],
  ['local storage', { variant: NodeKind.LocalStorage, fields: {} }],
  ['session storage', { variant: NodeKind.SessionStorage, fields: {} }],
  ['cookie jar', { variant: NodeKind.CookieJar, fields: {} }],
  ['web API', { variant: NodeKind.WebApi, fields: { method: 'method' } }],
  ['JS builtin', { variant: NodeKind.JsBuiltin, fields: { method: 'method' } }],
  ['resource', { variant: NodeKind.Resource, fields: { url: 'url' } }],
  ['parser', { variant: NodeKind.Parser, fields: {} }],
  ['extensions', { variant: NodeKind.Extensions, fields: {} }],
  ['ad filter', { variant: NodeKind.AdFilter, fields: { rule: 'rule' } }],
  ['tracker filter', { variant: NodeKind.TrackerFilter, fields: {} }],
  ['fingerprinting filter', { variant: NodeKind.FingerprintingFilter, fields: {} }],
  ['Brave Shields', { variant: NodeKind.BraveShields, fields: {} }],
  ['ads shield', { variant: NodeKind.AdsShield, fields: {} }],
  ['trackers shield', { variant: NodeKind.TrackersShield, fields: {} }],
  ['javascript shield', { variant: NodeKind.JavascriptShield, fields: {} }],
  ['fingerprinting shield', { variant: NodeKind.FingerprintingShield, fields: {} }],
])

const LISTENER_FIELDS = {
  key: 'key',
  eventListenerId: 'event listener id',
} as const

/**
 * Edge kinds as written by PageGraph in the `edge type` attribute
 */
export const EDGE_KINDS = kinds<EdgeKind>([
  ['structure', { variant: EdgeKind.Structure, fields: {} }],
  ['create node', { variant: EdgeKind.CreateNode, fields: {} }],
  ['insert node', { variant: EdgeKind.InsertNode, fields: { parent: 'parent', before: 'before' } }],
  ['remove node', { variant: EdgeKind.RemoveNode, fields: {} }],
  ['delete node', { variant: EdgeKind.DeleteNode, fields: {} }],
  ['text change', { variant: EdgeKind.TextChange, fields: {} }],
  ['set attribute', {
    variant: EdgeKind.SetAttribute,
    fields: { key: 'key', value: 'value', isStyle: 'is style' },
  }],
  ['delete attribute', { variant: EdgeKind.DeleteAttribute, fields: { key: 'key', isStyle: 'is style' } }],
  ['request start', {
    variant: EdgeKind.RequestStart,
    fields: { requestId: 'request id', requestType: 'request type' },
  }],
  ['request complete', {
    variant: EdgeKind.RequestComplete,
    fields: { requestId: 'request id', status: 'status', resourceType: 'resource type', size: 'size' },
  }],
  ['request error', { variant: EdgeKind.RequestError, fields: { requestId: 'request id', status: 'status' } }],
  ['execute from attribute', { variant: EdgeKind.ExecuteFromAttribute, fields: { attrName: 'attr name' } }],
  ['execute', { variant: EdgeKind.Execute, fields: {} }],
  ['js call', { variant: EdgeKind.JsCall, fields: { method: 'method', args: 'args' } }],
  ['js result', { variant: EdgeKind.JsResult, fields: { value: 'value' } }],
  ['add event listener', { variant: EdgeKind.AddEventListener, fields: LISTENER_FIELDS }],
  ['remove event listener', { variant: EdgeKind.RemoveEventListener, fields: LISTENER_FIELDS }],
  ['event listener', { variant: EdgeKind.EventListener, fields: LISTENER_FIELDS }],
  ['storage set', { variant: EdgeKind.StorageSet, fields: { key: 'key', value: 'value' } }],
  ['read storage call', { variant: EdgeKind.StorageReadCall, fields: { key: 'key' } }],
  ['storage read result', { variant: EdgeKind.StorageReadResult, fields: { key: 'key', value: 'value' } }],
  ['delete storage', { variant: EdgeKind.DeleteStorage, fields: { key: 'key' } }],
  ['clear storage', { variant: EdgeKind.ClearStorage, fields: { key: 'key' } }],
  ['storage bucket', { variant: EdgeKind.StorageBucket, fields: {} }],
  ['cross DOM', { variant: EdgeKind.CrossDom, fields: {} }],
  ['filter', { variant: EdgeKind.Filter, fields: {} }],
  ['shield', { variant: EdgeKind.Shield, fields: {} }],
  ['resource block', { variant: EdgeKind.ResourceBlock, fields: {} }],
])
