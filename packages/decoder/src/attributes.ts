import type { ScalarValue } from '@pagegraph/graph/scalar'
import { AttributeType } from '@pagegraph/graph/scalar'

/**
 * An attribute as read from the document, before decoding
 */
export interface RawAttribute {
  readonly type: AttributeType
  readonly raw: string
}

/**
 * Result of decoding one attribute. A failed decode keeps the source text.
 */
export type DecodedAttribute =
  | { readonly ok: true, readonly type: AttributeType, readonly raw: string, readonly value: ScalarValue }
  | { readonly ok: false, readonly type: AttributeType, readonly raw: string }

// GraphML `attr.type` values
const GRAPHML_TYPES: ReadonlyMap<string, AttributeType> = new Map([
  ['boolean', AttributeType.Boolean],
  ['int', AttributeType.Integer],
  ['long', AttributeType.Integer],
  ['float', AttributeType.Float],
  ['double', AttributeType.Float],
  ['string', AttributeType.String],
])

const BOOLEANS: ReadonlyMap<string, boolean> = new Map([
  ['true', true],
  ['false', false],
  ['1', true],
  ['0', false],
])

const INTEGER = /^[+-]?\d+$/

// xsd:double lexical form, without INF and NaN
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i

/**
 * Scalar type of an attribute from its declared GraphML type.
 *
 * Undeclared or unrecognized types are strings. The timestamp attribute is
 * always a timestamp, whatever it is declared as.
 */
export function attributeTypeOf(declared: string | undefined, name: string, timestampKey: string): AttributeType {
  if (name === timestampKey)
    return AttributeType.Timestamp
  if (declared === undefined)
    return AttributeType.String
  return GRAPHML_TYPES.get(declared.trim().toLowerCase()) ?? AttributeType.String
}

function parseScalar(type: AttributeType, raw: string): ScalarValue | undefined {
  switch (type) {
    case AttributeType.String:
      return raw
    case AttributeType.Boolean:
      return BOOLEANS.get(raw.trim().toLowerCase())
    case AttributeType.Integer: {
      const text = raw.trim()
      if (!INTEGER.test(text))
        return undefined
      const value = Number(text)
      return Number.isSafeInteger(value) ? value : undefined
    }
    case AttributeType.Float:
    case AttributeType.Timestamp: {
      const text = raw.trim()
      if (!DECIMAL.test(text))
        return undefined
      const value = Number(text)
      return Number.isFinite(value) ? value : undefined
    }
  }
}

/**
 * Decode one attribute. Never throws: text that does not parse as the
 * declared type comes back with `ok: false`.
 */
export function decodeAttribute(attribute: RawAttribute): DecodedAttribute {
  const value = parseScalar(attribute.type, attribute.raw)
  if (value === undefined)
    return { ok: false, type: attribute.type, raw: attribute.raw }
  return { ok: true, type: attribute.type, raw: attribute.raw, value }
}

/**
 * Decode every attribute of an element, keeping their order
 */
export function decodeAttributes(attributes: ReadonlyMap<string, RawAttribute>): Map<string, DecodedAttribute> {
  const decoded = new Map<string, DecodedAttribute>()
  for (const [name, attribute] of attributes)
    decoded.set(name, decodeAttribute(attribute))
  return decoded
}
