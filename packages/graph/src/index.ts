// Scalar attribute values
export { AttributeMapSchema, AttributeType, RawAttributeMapSchema, ScalarValueSchema } from './scalar'
export type { AttributeMap, RawAttributeMap, ScalarValue } from './scalar'

// Node variants and utilities
export {
  AdFilterSchema,
  AdsShieldSchema,
  BraveShieldsSchema,
  CookieJarSchema,
  createNode,
  DomRootSchema,
  ExtensionsSchema,
  FingerprintingFilterSchema,
  FingerprintingShieldSchema,
  FrameOwnerSchema,
  hasNodeKind,
  HtmlElementSchema,
  isHtmlElement,
  isHtmlElementNode,
  isHtmlElementWithTag,
  isNodeKind,
  isResource,
  isScript,
  isUnknownNode,
  JavascriptShieldSchema,
  JsBuiltinSchema,
  LocalStorageSchema,
  NodeKind,
  NodeSchema,
  NodeTypeSchema,
  ParserSchema,
  RemoteFrameSchema,
  ResourceSchema,
  ScriptSchema,
  SessionStorageSchema,
  StorageSchema,
  TextNodeSchema,
  TrackerFilterSchema,
  TrackersShieldSchema,
  UnknownNodeSchema,
  WebApiSchema,
} from './node'

export type {
  AdFilter,
  DomRoot,
  FrameOwner,
  HtmlElement,
  HtmlElementNode,
  JsBuiltin,
  Node,
  NodeOfKind,
  NodeType,
  NodeWithKind,
  RemoteFrame,
  Resource,
  Script,
  TextNode,
  UnknownNode,
  WebApi,
} from './node'

// Edge variants and utilities
export {
  createEdge,
  EdgeKind,
  EdgeSchema,
  EdgeTypeSchema,
  isEdgeKind,
  isStructureEdge,
  isUnknownEdge,
  UnknownEdgeSchema,
} from './edge'

export type {
  DeleteAttribute,
  Edge,
  EdgeOfKind,
  EdgeType,
  ExecuteFromAttribute,
  InsertNode,
  JsCall,
  JsResult,
  RequestComplete,
  RequestError,
  RequestStart,
  SetAttribute,
  UnknownEdge,
} from './edge'

// Errors
export {
  DanglingEdgeReferenceError,
  DuplicateIdentifierError,
  isPageGraphError,
  MalformedDocumentError,
  MissingRequiredFieldError,
  PageGraphError,
  PageGraphErrorCode,
  UnclassifiableElementError,
} from './errors'

export type { ElementCollection } from './errors'

// Assembly and queries
export { assembleGraph, PageGraph } from './page-graph'
export type { Direction } from './page-graph'

export {
  allDownstreamEffects,
  directDownstreamEffects,
  htmlElementModifications,
  resourcesFromScript,
  rootUrl,
} from './provenance'

export { resourcesMatchingFilter } from './resource-filter'
