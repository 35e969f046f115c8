/**
 * Provenance queries: which actions touched an element, and what a script or
 * resource went on to cause.
 *
 * Every query returns `undefined` when the starting node is not in the graph
 * or is not of a kind the query applies to.
 */
import type { Edge } from './edge'
import type { Node, NodeWithKind } from './node'
import type { PageGraph } from './page-graph'
import { EdgeKind } from './edge'
import { hasNodeKind, isHtmlElementNode, isHtmlElementWithTag, NodeKind } from './node'

function unique(nodes: Node[]): Node[] {
  const seen = new Set<string>()
  return nodes.filter((node) => {
    if (seen.has(node.id))
      return false
    seen.add(node.id)
    return true
  })
}

function outgoingOfKind<K extends NodeKind>(graph: PageGraph, id: string, kind: K): NodeWithKind<K>[] {
  const results: NodeWithKind<K>[] = []
  for (const node of graph.getNeighbors(id, 'out') ?? []) {
    if (hasNodeKind(node, kind))
      results.push(node)
  }
  return results
}

function endpointsVia(graph: PageGraph, id: string, direction: 'in' | 'out', kind: EdgeKind): Node[] {
  const results: Node[] = []
  for (const edge of graph.getIncidentEdges(id, direction) ?? []) {
    if (edge.edgeType.type !== kind)
      continue
    const other = graph.getNode(direction === 'in' ? edge.source : edge.target)
    if (other)
      results.push(other)
  }
  return unique(results)
}

function compareTimestamps(a: Edge, b: Edge): number {
  if (a.timestamp === undefined)
    return b.timestamp === undefined ? 0 : 1
  if (b.timestamp === undefined)
    return -1
  return a.timestamp - b.timestamp
}

/**
 * Every modification of an HTML element: its incoming edges other than
 * `structure`, by timestamp. Edges without a timestamp come last.
 */
export function htmlElementModifications(graph: PageGraph, id: string): Edge[] | undefined {
  const node = graph.getNode(id)
  if (!node || !isHtmlElementNode(node))
    return undefined
  return (graph.getIncidentEdges(id, 'in') ?? [])
    .filter(edge => edge.edgeType.type !== EdgeKind.Structure)
    .sort(compareTimestamps)
}

/**
 * Resources whose requests were initiated by a script.
 *
 * A `script` node requests resources directly. An HTML `script` element
 * requests its `src` directly, and also through any script it executes.
 */
export function resourcesFromScript(graph: PageGraph, id: string): Node[] | undefined {
  const node = graph.getNode(id)
  if (!node)
    return undefined

  if (hasNodeKind(node, NodeKind.Script))
    return outgoingOfKind(graph, id, NodeKind.Resource)

  if (isHtmlElementWithTag(node.nodeType, 'script')) {
    const direct: Node[] = outgoingOfKind(graph, id, NodeKind.Resource)
    const viaScripts = outgoingOfKind(graph, id, NodeKind.Script)
      .flatMap(script => outgoingOfKind(graph, script.id, NodeKind.Resource))
    return unique([...direct, ...viaScripts])
  }

  return undefined
}

/**
 * URL of the page the graph was recorded from: the one DOM root that nothing
 * points at. `undefined` when there is no such root, several, or it has no URL.
 */
export function rootUrl(graph: PageGraph): string | undefined {
  const roots = graph.filterNodes((nodeType, node) =>
    nodeType.type === NodeKind.DomRoot && graph.getIncidentEdges(node.id, 'in')?.length === 0,
  )
  if (roots.length !== 1)
    return undefined
  const root = roots[0]
  return root && hasNodeKind(root, NodeKind.DomRoot) ? root.nodeType.url : undefined
}

/**
 * Nodes directly caused by a node:
 * - resource: scripts executed from the HTML script elements the resource completed to
 * - HTML script element: the resources it requested, or failing that the inline scripts it executed
 * - script: resources whose requests completed to it, then scripts it executed
 *
 * Other kinds have no effects tracked here.
 */
export function directDownstreamEffects(graph: PageGraph, id: string): Node[] | undefined {
  const node = graph.getNode(id)
  if (!node)
    return undefined

  if (hasNodeKind(node, NodeKind.Resource)) {
    return unique(
      endpointsVia(graph, id, 'out', EdgeKind.RequestComplete)
        .filter(target => isHtmlElementWithTag(target.nodeType, 'script'))
        .flatMap(element => outgoingOfKind(graph, element.id, NodeKind.Script)),
    )
  }

  if (isHtmlElementWithTag(node.nodeType, 'script')) {
    const requested = outgoingOfKind(graph, id, NodeKind.Resource)
    return requested.length > 0 ? requested : outgoingOfKind(graph, id, NodeKind.Script)
  }

  if (hasNodeKind(node, NodeKind.Script)) {
    return unique([
      ...endpointsVia(graph, id, 'in', EdgeKind.RequestComplete),
      ...outgoingOfKind(graph, id, NodeKind.Script),
    ])
  }

  return []
}

/**
 * Transitive closure of `directDownstreamEffects`, in discovery order,
 * not including the starting node
 */
export function allDownstreamEffects(graph: PageGraph, id: string): Node[] | undefined {
  if (!graph.hasNode(id))
    return undefined

  const visited = new Set<string>([id])
  const queue: string[] = [id]
  const results: Node[] = []

  for (let i = 0; i < queue.length; i++) {
    for (const effect of directDownstreamEffects(graph, queue[i]) ?? []) {
      if (visited.has(effect.id))
        continue
      visited.add(effect.id)
      results.push(effect)
      queue.push(effect.id)
    }
  }
  return results
}
