export interface JsonApiLinkObject {
  href: string
  meta?: unknown
}

export type JsonApiLink = string | JsonApiLinkObject

/**
 * Top-level or resource-level links object.
 * At least one of self and related must be non-empty when encoded.
 */
export interface JsonApiLinks {
  self?: JsonApiLink | null
  related?: JsonApiLink | null

  // Pagination
  first?: string
  last?: string
  next?: string
  previous?: string
}

export interface JsonApiResource {
  /**
   * Omitted on the wire when empty, e.g. for resources that are about to be created
   */
  id?: string
  type: string
  attributes?: Record<string, unknown>
  /**
   * Relation name to relationship document, whose primary data holds the related resource identifiers
   */
  relationships?: Record<string, JsonApiDocument>
  meta?: unknown
  links?: JsonApiLinks
}

export interface JsonApiObject {
  version?: string
  meta?: unknown
}

export interface JsonApiErrorSource {
  pointer?: string
  parameter?: string
  header?: string
}

export interface JsonApiErrorObject {
  id?: string
  links?: { about?: JsonApiLink }
  status?: string
  code?: string
  title?: string
  detail?: string
  source?: JsonApiErrorSource
  meta?: unknown
}

export type PrimaryDataShape = 'none' | 'one' | 'many'

/**
 * Primary data of a document, resolved once from the wire shape of the data member
 */
export type PrimaryData =
  | { shape: 'none' }
  | { shape: 'one'; resource: JsonApiResource }
  | { shape: 'many'; resources: JsonApiResource[] }

export interface JsonApiDocument {
  data: PrimaryData
  meta?: unknown
  jsonapi?: JsonApiObject
  /**
   * When non-empty the data member is left out of the encoded document
   */
  errors: JsonApiErrorObject[]
  links?: JsonApiLinks
  /**
   * Resources of a compound document, only meaningful next to non-empty primary data
   */
  included: JsonApiResource[]
}
