import type { Edge, EdgeType } from '@pagegraph/graph/edge'
import type { ElementCollection } from '@pagegraph/graph/errors'
import type { Node, NodeType } from '@pagegraph/graph/node'
import type { RawAttributeMap, ScalarValue } from '@pagegraph/graph/scalar'
import type { DecodedAttribute, RawAttribute } from './attributes'
import type { KindSpec } from './kinds'
import type { DecodeOptions } from './options'
import { EdgeKind, EdgeTypeSchema } from '@pagegraph/graph/edge'
import { MissingRequiredFieldError, UnclassifiableElementError } from '@pagegraph/graph/errors'
import { NodeKind, NodeTypeSchema } from '@pagegraph/graph/node'
import { createLogger } from '@pagegraph/utils/logger'
import { decodeAttribute, decodeAttributes } from './attributes'
import { EDGE_KINDS, NODE_KINDS } from './kinds'
import { DecodeMode } from './options'

const log = createLogger('Classifier')

/**
 * A node or edge element as read from the document
 */
export interface RawElement {
  readonly id: string
  /** Value of the kind attribute, if the element has one */
  readonly kind: string | undefined
  /** Every attribute of the element, kind and timestamp included, in document order */
  readonly attributes: ReadonlyMap<string, RawAttribute>
}

export interface RawEdgeElement extends RawElement {
  readonly source: string
  readonly target: string
}

/**
 * The slice of a zod schema the classifier relies on
 */
interface VariantSchema<T> {
  safeParse: (data: unknown) =>
    | { success: true, data: T }
    | { success: false, error: { issues: ReadonlyArray<{ path: PropertyKey[] }> } }
}

interface Classification<T> {
  collection: ElementCollection
  kindKey: string
  table: ReadonlyMap<string, KindSpec>
  schema: VariantSchema<T>
  unknown: (kind: string) => T
}

// Object.fromEntries defines own properties, so a `__proto__` attribute is kept
function rawAttributes(element: RawElement): RawAttributeMap {
  return Object.fromEntries([...element.attributes].map(([name, attribute]) => [name, attribute.raw]))
}

function buildCandidate(
  spec: KindSpec,
  decoded: ReadonlyMap<string, DecodedAttribute>,
  reserved: readonly string[],
): Record<string, unknown> {
  const candidate: Record<string, unknown> = { type: spec.variant }
  const consumed = new Set(reserved)

  for (const [field, source] of Object.entries(spec.fields)) {
    consumed.add(source)
    const attribute = decoded.get(source)
    // Values that failed to decode count as absent
    if (attribute?.ok)
      candidate[field] = attribute.value
  }

  if (spec.keepsRest) {
    const rest: Array<[string, ScalarValue]> = []
    for (const [name, attribute] of decoded) {
      if (!consumed.has(name))
        rest.push([name, attribute.ok ? attribute.value : attribute.raw])
    }
    candidate.attributes = Object.fromEntries(rest)
  }
  return candidate
}

/**
 * Validate a candidate against the variant schema.
 *
 * A value of the wrong type is dropped and validation retried, so optional
 * fields degrade to absent. A required field that ends up absent fails.
 */
function parseVariant<T>(
  classification: Classification<T>,
  element: RawElement,
  kind: string,
  spec: KindSpec,
  candidate: Record<string, unknown>,
): T {
  for (;;) {
    const result = classification.schema.safeParse(candidate)
    if (result.success)
      return result.data

    const field = result.error.issues[0]?.path[0]
    if (typeof field === 'string' && candidate[field] !== undefined) {
      log.debug(`Dropping ill-typed "${spec.fields[field] ?? field}" on ${classification.collection} ${element.id}`)
      delete candidate[field]
      continue
    }

    const name = typeof field === 'string' ? (spec.fields[field] ?? field) : String(field)
    throw new MissingRequiredFieldError(classification.collection, element.id, kind, name)
  }
}

function classify<T>(
  classification: Classification<T>,
  element: RawElement,
  options: DecodeOptions,
): T {
  const { collection, kindKey } = classification
  const lenient = options.mode === DecodeMode.Lenient

  if (element.kind === undefined) {
    if (!lenient)
      throw new MissingRequiredFieldError(collection, element.id, undefined, kindKey)
    log.warn(`Keeping ${collection} ${element.id} without "${kindKey}" as unknown`)
    return classification.unknown('')
  }

  const spec = classification.table.get(element.kind)
  if (!spec) {
    if (!lenient)
      throw new UnclassifiableElementError(collection, element.id, element.kind)
    log.warn(`Keeping ${collection} ${element.id} of unrecognized kind "${element.kind}" as unknown`)
    return classification.unknown(element.kind)
  }

  const decoded = decodeAttributes(element.attributes)
  const candidate = buildCandidate(spec, decoded, [kindKey, options.timestampKey])
  try {
    return parseVariant(classification, element, element.kind, spec, candidate)
  }
  catch (err) {
    if (!lenient || !(err instanceof MissingRequiredFieldError))
      throw err
    log.warn(`${err.message}; keeping it as unknown`)
    return classification.unknown(element.kind)
  }
}

/**
 * Timestamp of an element, when present and decodable
 */
function timestampOf(element: RawElement, options: DecodeOptions): number | undefined {
  const attribute = element.attributes.get(options.timestampKey)
  if (!attribute)
    return undefined
  const decoded = decodeAttribute(attribute)
  return decoded.ok && typeof decoded.value === 'number' ? decoded.value : undefined
}

/**
 * Classify a node element into its `NodeType` variant
 *
 * @throws UnclassifiableElementError on an unknown kind in strict mode
 * @throws MissingRequiredFieldError on a missing kind or required attribute in strict mode
 */
export function classifyNodeType(element: RawElement, options: DecodeOptions): NodeType {
  return classify<NodeType>({
    collection: 'node',
    kindKey: options.nodeKindKey,
    table: NODE_KINDS,
    schema: NodeTypeSchema,
    unknown: kind => ({ type: NodeKind.Unknown, kind, attributes: rawAttributes(element) }),
  }, element, options)
}

/**
 * Classify an edge element into its `EdgeType` variant
 *
 * @throws UnclassifiableElementError on an unknown kind in strict mode
 * @throws MissingRequiredFieldError on a missing kind or required attribute in strict mode
 */
export function classifyEdgeType(element: RawElement, options: DecodeOptions): EdgeType {
  return classify<EdgeType>({
    collection: 'edge',
    kindKey: options.edgeKindKey,
    table: EDGE_KINDS,
    schema: EdgeTypeSchema,
    unknown: kind => ({ type: EdgeKind.Unknown, kind, attributes: rawAttributes(element) }),
  }, element, options)
}

export function classifyNode(element: RawElement, options: DecodeOptions): Node {
  const nodeType = classifyNodeType(element, options)
  const timestamp = timestampOf(element, options)
  return timestamp === undefined ? { id: element.id, nodeType } : { id: element.id, nodeType, timestamp }
}

export function classifyEdge(element: RawEdgeElement, options: DecodeOptions): Edge {
  const edgeType = classifyEdgeType(element, options)
  const timestamp = timestampOf(element, options)
  const edge = { id: element.id, source: element.source, target: element.target, edgeType }
  return timestamp === undefined ? edge : { ...edge, timestamp }
}
