import type { Edge } from './edge'
import type { Node } from './node'
import { createLogger } from '@pagegraph/utils/logger'
import { DanglingEdgeReferenceError, DuplicateIdentifierError } from './errors'

const log = createLogger('Assembler')

/**
 * Edges touching one node, each list in document order
 */
export interface Adjacency {
  readonly incoming: readonly Edge[]
  readonly outgoing: readonly Edge[]
  /** Incoming and outgoing together; a self-loop appears once */
  readonly incident: readonly Edge[]
}

/**
 * Identifier tables and adjacency index of an assembled graph
 */
export interface GraphIndex {
  readonly nodes: ReadonlyMap<string, Node>
  readonly edges: ReadonlyMap<string, Edge>
  readonly adjacency: ReadonlyMap<string, Adjacency>
}

interface MutableAdjacency {
  incoming: Edge[]
  outgoing: Edge[]
  incident: Edge[]
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value))
      deepFreeze(child)
  }
  return value
}

/**
 * Validate identifiers and endpoints, then build the lookup tables.
 *
 * Nodes and edges keep the order they are given in. Every entity is frozen.
 *
 * @throws DuplicateIdentifierError when two nodes or two edges share an id
 * @throws DanglingEdgeReferenceError when an edge endpoint is not a node
 */
export function indexGraph(nodes: Iterable<Node>, edges: Iterable<Edge>): GraphIndex {
  const nodeTable = new Map<string, Node>()
  const adjacency = new Map<string, MutableAdjacency>()

  for (const node of nodes) {
    if (nodeTable.has(node.id))
      throw new DuplicateIdentifierError('node', node.id)
    nodeTable.set(node.id, deepFreeze(node))
    adjacency.set(node.id, { incoming: [], outgoing: [], incident: [] })
  }

  const edgeTable = new Map<string, Edge>()
  for (const edge of edges) {
    if (edgeTable.has(edge.id))
      throw new DuplicateIdentifierError('edge', edge.id)
    edgeTable.set(edge.id, deepFreeze(edge))
  }

  for (const edge of edgeTable.values()) {
    const from = adjacency.get(edge.source)
    if (!from)
      throw new DanglingEdgeReferenceError(edge.id, 'source', edge.source)
    const to = adjacency.get(edge.target)
    if (!to)
      throw new DanglingEdgeReferenceError(edge.id, 'target', edge.target)

    from.outgoing.push(edge)
    from.incident.push(edge)
    to.incoming.push(edge)
    if (to !== from)
      to.incident.push(edge)
  }

  log.debug(`Indexed ${nodeTable.size} nodes and ${edgeTable.size} edges`)
  return { nodes: nodeTable, edges: edgeTable, adjacency }
}
