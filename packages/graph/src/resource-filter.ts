import type { RequestType } from '@ghostery/adblocker'
import type { Node } from './node'
import type { PageGraph } from './page-graph'
import { NetworkFilter, Request } from '@ghostery/adblocker'
import { createLogger } from '@pagegraph/utils/logger'
import { parse } from 'tldts'
import { EdgeKind } from './edge'
import { isResource } from './node'
import { rootUrl } from './provenance'

const log = createLogger('ResourceFilter')

// PageGraph request types, lowercased, to the request types filters know
const REQUEST_TYPES: ReadonlyMap<string, RequestType> = new Map<string, RequestType>([
  ['image', 'image'],
  ['script', 'script'],
  ['css', 'stylesheet'],
  ['stylesheet', 'stylesheet'],
  ['ajax', 'xhr'],
  ['xhr', 'xhr'],
  ['xmlhttprequest', 'xhr'],
  ['fetch', 'xhr'],
  ['font', 'font'],
  ['media', 'media'],
  ['websocket', 'websocket'],
  ['document', 'main_frame'],
  ['subdocument', 'sub_frame'],
  ['subframe', 'sub_frame'],
  ['ping', 'ping'],
  ['beacon', 'ping'],
])

interface Site {
  url: string
  hostname: string
  domain: string
}

function siteOf(url: string): Site | undefined {
  const { hostname, domain } = parse(url)
  if (!hostname)
    return undefined
  return { url, hostname, domain: domain ?? hostname }
}

/**
 * Distinct request types of the `request start` edges reaching a resource
 */
function requestTypesOf(graph: PageGraph, id: string): RequestType[] {
  const types = new Set<RequestType>()
  for (const edge of graph.getIncidentEdges(id, 'in') ?? []) {
    if (edge.edgeType.type !== EdgeKind.RequestStart)
      continue
    const requestType = edge.edgeType.requestType?.trim().toLowerCase() ?? ''
    types.add(REQUEST_TYPES.get(requestType) ?? 'other')
  }
  return [...types]
}

/**
 * Resources whose requests match an adblock network filter, such as
 * `||tracker.example^$script,third-party`.
 *
 * Requests are judged from the page at `rootUrl`, with the request types of
 * the `request start` edges that fetched each resource. A resource that was
 * never requested does not match.
 *
 * Returns `undefined` when the graph has no usable root URL, and no resources
 * when the pattern is not a network filter.
 */
export function resourcesMatchingFilter(graph: PageGraph, pattern: string): Node[] | undefined {
  const root = rootUrl(graph)
  const source = root === undefined ? undefined : siteOf(root)
  if (!source)
    return undefined

  const filter = NetworkFilter.parse(pattern)
  if (!filter) {
    log.debug(`Not a network filter: ${pattern}`)
    return []
  }

  return graph.filterNodes((nodeType, node) => {
    if (!isResource(nodeType))
      return false
    const target = siteOf(nodeType.url)
    if (!target)
      return false
    return requestTypesOf(graph, node.id).some(type => filter.match(Request.fromRawDetails({
      url: target.url,
      hostname: target.hostname,
      domain: target.domain,
      sourceUrl: source.url,
      sourceHostname: source.hostname,
      sourceDomain: source.domain,
      type,
    })))
  })
}
