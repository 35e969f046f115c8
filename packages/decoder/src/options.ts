import { z } from 'zod/v4'

/**
 * How the classifier treats elements it cannot type.
 *
 * - `strict`: an unknown kind or a missing required attribute fails the decode
 * - `lenient`: such elements are kept as `unknown` variants and decoding goes on
 */
export const DecodeMode = {
  Strict: 'strict',
  Lenient: 'lenient',
} as const

export type DecodeMode = (typeof DecodeMode)[keyof typeof DecodeMode]

export const DecodeOptionsSchema = z.object({
  mode: z.enum([DecodeMode.Strict, DecodeMode.Lenient]).default(DecodeMode.Strict),
  /** Attribute holding a node's PageGraph kind */
  nodeKindKey: z.string().min(1).default('node type'),
  /** Attribute holding an edge's PageGraph kind */
  edgeKindKey: z.string().min(1).default('edge type'),
  /** Attribute holding an element's timestamp */
  timestampKey: z.string().min(1).default('timestamp'),
})

export type DecodeOptions = z.infer<typeof DecodeOptionsSchema>

export type DecodeOptionsInput = z.input<typeof DecodeOptionsSchema>

/**
 * Fill in defaults and validate caller options
 */
export function resolveDecodeOptions(input: DecodeOptionsInput = {}): DecodeOptions {
  return DecodeOptionsSchema.parse(input)
}
