import type { Adjacency } from './assembler'
import type { Edge, EdgeType } from './edge'
import type { HtmlElementNode, Node, NodeType } from './node'
import { indexGraph } from './assembler'
import { isHtmlElementNode, isHtmlElementWithTag } from './node'

/**
 * Which incident edges a traversal follows: `in` edges point at the node,
 * `out` edges leave it
 */
export type Direction = 'in' | 'out' | 'both'

/**
 * PageGraph
 *
 * The typed, immutable graph of one recorded page load:
 * - Nodes: DOM elements, scripts, resources, web APIs, storage, shields...
 * - Edges: the actions that created, modified or connected them
 *
 * Built once from validated nodes and edges, never mutated afterwards.
 * Lookups by identifier return `undefined` for identifiers not in the graph.
 */
export class PageGraph {
  private readonly nodes: ReadonlyMap<string, Node>
  private readonly edges: ReadonlyMap<string, Edge>
  private readonly adjacency: ReadonlyMap<string, Adjacency>

  /**
   * @throws DuplicateIdentifierError when two nodes or two edges share an id
   * @throws DanglingEdgeReferenceError when an edge endpoint is not a node
   */
  constructor(nodes: Iterable<Node>, edges: Iterable<Edge>) {
    const index = indexGraph(nodes, edges)
    this.nodes = index.nodes
    this.edges = index.edges
    this.adjacency = index.adjacency
  }

  get nodeCount(): number {
    return this.nodes.size
  }

  get edgeCount(): number {
    return this.edges.size
  }

  // ==================== Lookups ====================

  getNode(id: string): Node | undefined {
    return this.nodes.get(id)
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id)
  }

  getEdge(id: string): Edge | undefined {
    return this.edges.get(id)
  }

  hasEdge(id: string): boolean {
    return this.edges.has(id)
  }

  /** All nodes in document order */
  getNodes(): Node[] {
    return [...this.nodes.values()]
  }

  /** All edges in document order */
  getEdges(): Edge[] {
    return [...this.edges.values()]
  }

  // ==================== Filters ====================

  /**
   * Every node whose type satisfies the predicate, in document order
   */
  filterNodes(predicate: (nodeType: NodeType, node: Node) => boolean): Node[] {
    const results: Node[] = []
    for (const node of this.nodes.values()) {
      if (predicate(node.nodeType, node))
        results.push(node)
    }
    return results
  }

  /**
   * Every edge whose type satisfies the predicate, in document order
   */
  filterEdges(predicate: (edgeType: EdgeType, edge: Edge) => boolean): Edge[] {
    const results: Edge[] = []
    for (const edge of this.edges.values()) {
      if (predicate(edge.edgeType, edge))
        results.push(edge)
    }
    return results
  }

  /**
   * HTML elements with the given tag name. Case-insensitive unless asked otherwise.
   */
  nodesOfHtmlTagName(tagName: string, opts: { caseSensitive?: boolean } = {}): HtmlElementNode[] {
    const caseSensitive = opts.caseSensitive ?? false
    const results: HtmlElementNode[] = []
    for (const node of this.nodes.values()) {
      if (isHtmlElementNode(node) && isHtmlElementWithTag(node.nodeType, tagName, caseSensitive))
        results.push(node)
    }
    return results
  }

  // ==================== Traversal ====================

  /**
   * Edges touching a node, in document order
   */
  getIncidentEdges(id: string, direction: Direction = 'both'): Edge[] | undefined {
    const entry = this.adjacency.get(id)
    if (!entry)
      return undefined
    switch (direction) {
      case 'in':
        return [...entry.incoming]
      case 'out':
        return [...entry.outgoing]
      case 'both':
        return [...entry.incident]
    }
  }

  /**
   * Nodes across the incident edges of a node, each listed once, in the order
   * of the first edge reaching them
   */
  getNeighbors(id: string, direction: Direction = 'both'): Node[] | undefined {
    const edges = this.getIncidentEdges(id, direction)
    if (!edges)
      return undefined

    const seen = new Set<string>()
    const results: Node[] = []
    for (const edge of edges) {
      const neighborId = this.otherEnd(edge, id, direction)
      if (seen.has(neighborId))
        continue
      seen.add(neighborId)
      const neighbor = this.nodes.get(neighborId)
      if (neighbor)
        results.push(neighbor)
    }
    return results
  }

  private otherEnd(edge: Edge, id: string, direction: Direction): string {
    if (direction === 'in')
      return edge.source
    if (direction === 'out')
      return edge.target
    return edge.source === id ? edge.target : edge.source
  }
}

/**
 * Build an immutable PageGraph from classified nodes and edges
 *
 * @throws DuplicateIdentifierError when two nodes or two edges share an id
 * @throws DanglingEdgeReferenceError when an edge endpoint is not a node
 */
export function assembleGraph(nodes: Iterable<Node>, edges: Iterable<Edge>): PageGraph {
  return new PageGraph(nodes, edges)
}
