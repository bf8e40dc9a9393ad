import type { JsonApiDocument, JsonApiResource } from './json-api'
import { primaryResources, resourceIdentity } from './json-api-document'
import { PartialLinkageError } from './json-api-errors'
import { logger } from './logger'

const log = logger.child({ module: 'linkage' })

interface IncludeNode {
  included: JsonApiResource
  relatedTo: JsonApiResource[]
  visited: boolean
}

function relatedResources(resource: JsonApiResource) {
  return Object.values(resource.relationships ?? {}).flatMap((relationship) => primaryResources(relationship.data))
}

/**
 * Overwrites a relationship placeholder with the body of the included resource it names
 */
function alias(placeholder: JsonApiResource, included: JsonApiResource) {
  if (placeholder === included) return
  placeholder.id = included.id
  placeholder.type = included.type
  placeholder.attributes = included.attributes
  placeholder.relationships = included.relationships
  placeholder.meta = included.meta
  placeholder.links = included.links
}

/**
 * Verifies that a compound document is fully linked: every included resource must be reachable
 * from primary data through a chain of relationships. Cycles between included resources are allowed.
 *
 * When aliasRelationships is set, every relationship placeholder that is reached is replaced
 * in place with the body of its included resource.
 *
 * @throws PartialLinkageError listing the identities of unreachable included resources
 */
export function verifyFullLinkage(doc: JsonApiDocument, aliasRelationships = false) {
  if (doc.included.length === 0) return

  const includeGraph = new Map<string, IncludeNode>()
  for (const included of doc.included)
    includeGraph.set(resourceIdentity(included), { included, relatedTo: relatedResources(included), visited: false })

  // reversed so that resources are visited in document order
  const stack = primaryResources(doc.data).flatMap(relatedResources).reverse()
  for (let placeholder = stack.pop(); placeholder; placeholder = stack.pop()) {
    const node = includeGraph.get(resourceIdentity(placeholder))
    // relationship to a resource outside of the compound document
    if (!node) continue
    if (aliasRelationships) alias(placeholder, node.included)
    // already expanded, which is what ends cycles
    if (node.visited) continue
    node.visited = true
    for (let i = node.relatedTo.length - 1; i >= 0; i--) stack.push(node.relatedTo[i])
  }

  const orphans: string[] = []
  for (const [identity, node] of includeGraph) if (!node.visited) orphans.push(identity)

  log.debug({ included: includeGraph.size, orphans }, 'verified compound document linkage')
  if (orphans.length > 0) throw new PartialLinkageError(orphans)
}
