/**
 * Error codes for PageGraph decoding and assembly
 */
export const PageGraphErrorCode = {
  MALFORMED_DOCUMENT: 'MALFORMED_DOCUMENT',
  UNCLASSIFIABLE_ELEMENT: 'UNCLASSIFIABLE_ELEMENT',
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
  DUPLICATE_IDENTIFIER: 'DUPLICATE_IDENTIFIER',
  DANGLING_EDGE_REFERENCE: 'DANGLING_EDGE_REFERENCE',
} as const

export type PageGraphErrorCode = (typeof PageGraphErrorCode)[keyof typeof PageGraphErrorCode]

/** Which collection of the document an element belongs to */
export type ElementCollection = 'node' | 'edge'

/**
 * Base error for everything that stops a PageGraph from being built
 */
export class PageGraphError extends Error {
  constructor(
    public readonly code: PageGraphErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = 'PageGraphError'
  }
}

/**
 * The input is not well-formed XML, or lacks the GraphML structure
 */
export class MalformedDocumentError extends PageGraphError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    options?: ErrorOptions,
  ) {
    const position = line !== undefined
      ? ` (line ${line}${column !== undefined ? `, column ${column}` : ''})`
      : ''
    super(PageGraphErrorCode.MALFORMED_DOCUMENT, `Malformed document${position}: ${message}`, options)
    this.name = 'MalformedDocumentError'
  }
}

/**
 * An element's kind tag has no matching variant
 */
export class UnclassifiableElementError extends PageGraphError {
  constructor(
    public readonly collection: ElementCollection,
    public readonly elementId: string,
    public readonly kind: string,
  ) {
    super(
      PageGraphErrorCode.UNCLASSIFIABLE_ELEMENT,
      `Unknown ${collection} kind "${kind}" on ${collection} ${elementId}`,
    )
    this.name = 'UnclassifiableElementError'
  }
}

/**
 * An attribute required by the element's kind is absent or could not be decoded
 */
export class MissingRequiredFieldError extends PageGraphError {
  constructor(
    public readonly collection: ElementCollection,
    public readonly elementId: string,
    public readonly kind: string | undefined,
    public readonly field: string,
  ) {
    super(
      PageGraphErrorCode.MISSING_REQUIRED_FIELD,
      kind === undefined
        ? `${collection} ${elementId} has no "${field}" attribute`
        : `${collection} ${elementId} of kind "${kind}" is missing required attribute "${field}"`,
    )
    this.name = 'MissingRequiredFieldError'
  }
}

/**
 * Two nodes, or two edges, share an identifier
 */
export class DuplicateIdentifierError extends PageGraphError {
  constructor(
    public readonly collection: ElementCollection,
    public readonly elementId: string,
  ) {
    super(PageGraphErrorCode.DUPLICATE_IDENTIFIER, `Duplicate ${collection} identifier: ${elementId}`)
    this.name = 'DuplicateIdentifierError'
  }
}

/**
 * An edge endpoint names a node that is not in the graph
 */
export class DanglingEdgeReferenceError extends PageGraphError {
  constructor(
    public readonly edgeId: string,
    public readonly endpoint: 'source' | 'target',
    public readonly nodeId: string,
  ) {
    super(
      PageGraphErrorCode.DANGLING_EDGE_REFERENCE,
      `Edge ${edgeId} references missing ${endpoint} node ${nodeId}`,
    )
    this.name = 'DanglingEdgeReferenceError'
  }
}

export function isPageGraphError(value: unknown): value is PageGraphError {
  return value instanceof PageGraphError
}
