// Typed graph model, assembly and queries
export * from '@pagegraph/graph'

// GraphML decoding
export * from '@pagegraph/decoder'

// Utilities
export * from '@pagegraph/utils'
