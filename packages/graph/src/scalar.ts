import { z } from 'zod/v4'

/**
 * Scalar types an element attribute can decode to
 */
export const AttributeType = {
  String: 'string',
  Boolean: 'boolean',
  Integer: 'integer',
  Float: 'float',
  Timestamp: 'timestamp',
} as const

export type AttributeType = (typeof AttributeType)[keyof typeof AttributeType]

/**
 * A decoded attribute value. Integers, floats and timestamps are all numbers.
 */
export const ScalarValueSchema = z.union([z.string(), z.number(), z.boolean()])

export type ScalarValue = z.infer<typeof ScalarValueSchema>

function isRecordOf(value: unknown, item: z.ZodType): boolean {
  return typeof value === 'object'
    && value !== null
    && !Array.isArray(value)
    && Object.values(value).every(entry => item.safeParse(entry).success)
}

// z.record rebuilds the object and skips a `__proto__` key, which is a legal
// GraphML attribute name. These schemas check the entries and keep the object.

/**
 * Decoded attributes keyed by their GraphML attribute name
 */
export type AttributeMap = Record<string, ScalarValue>

export const AttributeMapSchema = z.custom<AttributeMap>(
  value => isRecordOf(value, ScalarValueSchema),
  'Expected a map of attribute names to scalar values',
)

/**
 * Attributes exactly as written in the source document
 */
export type RawAttributeMap = Record<string, string>

export const RawAttributeMapSchema = z.custom<RawAttributeMap>(
  value => isRecordOf(value, z.string()),
  'Expected a map of attribute names to strings',
)
