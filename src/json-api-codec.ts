import type { ZodError } from 'zod'
import type {
  JsonApiDocument,
  JsonApiLinks,
  JsonApiObject,
  JsonApiResource,
  PrimaryData,
  PrimaryDataShape,
} from './json-api'
import { createDocument } from './json-api-document'
import { InvalidDataFieldError, MalformedDocumentError, MissingDataFieldError } from './json-api-errors'
import { checkLinks, checkMeta } from './json-api-links'
import {
  type DocumentInput,
  type LinksInput,
  manyDocumentSchema,
  oneDocumentSchema,
  type ResourceInput,
} from './json-api-schema'
import { logger } from './logger'
import { isRecord } from './util'

const log = logger.child({ module: 'codec' })

function describeIssues(error: ZodError) {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

/**
 * Finds the shape of the data member without committing to a typed decode
 */
export function sniffPrimaryDataShape(raw: unknown): PrimaryDataShape {
  if (!isRecord(raw)) throw new MalformedDocumentError('document must be a JSON object')
  if (Object.keys(raw).length === 0) throw new MissingDataFieldError()
  if (!('data' in raw)) return 'none'
  const data = raw.data
  if (data === null) return 'none'
  if (Array.isArray(data)) return 'many'
  if (isRecord(data) && Object.keys(data).length === 0) throw new InvalidDataFieldError()
  // anything that is not an object is rejected by the typed decode
  return 'one'
}

function linksFromJson(input: LinksInput): JsonApiLinks {
  const links: JsonApiLinks = {}
  if (input.self) links.self = input.self
  if (input.related) links.related = input.related
  if (input.first !== undefined) links.first = input.first
  if (input.last !== undefined) links.last = input.last
  if (input.next !== undefined) links.next = input.next
  if (input.previous !== undefined) links.previous = input.previous
  return links
}

function resourceFromJson(input: ResourceInput): JsonApiResource {
  const resource: JsonApiResource = { type: input.type }
  if (input.id !== undefined && input.id !== null) resource.id = input.id
  if (input.attributes) resource.attributes = input.attributes
  if (input.relationships) {
    const relationships: Record<string, JsonApiDocument> = {}
    for (const [name, relationship] of Object.entries(input.relationships))
      relationships[name] = documentFromJson(relationship)
    resource.relationships = relationships
  }
  if (input.meta !== undefined && input.meta !== null) resource.meta = input.meta
  if (input.links) resource.links = linksFromJson(input.links)
  return resource
}

/**
 * Decodes an already parsed JSON value into a document.
 * Relationship documents are decoded the same way.
 */
export function documentFromJson(raw: unknown): JsonApiDocument {
  const shape = sniffPrimaryDataShape(raw)

  let data: PrimaryData = { shape: 'none' }
  let rest: DocumentInput
  if (shape === 'many') {
    const parsed = manyDocumentSchema.safeParse(raw)
    if (!parsed.success) throw new MalformedDocumentError(describeIssues(parsed.error), { cause: parsed.error })
    data = { shape: 'many', resources: parsed.data.data.map(resourceFromJson) }
    rest = parsed.data
  } else {
    const parsed = oneDocumentSchema.safeParse(raw)
    if (!parsed.success) throw new MalformedDocumentError(describeIssues(parsed.error), { cause: parsed.error })
    if (parsed.data.data) data = { shape: 'one', resource: resourceFromJson(parsed.data.data) }
    rest = parsed.data
  }

  const doc = createDocument({ data })
  if (rest.meta !== undefined && rest.meta !== null) doc.meta = rest.meta
  if (rest.jsonapi) doc.jsonapi = rest.jsonapi
  if (rest.errors) doc.errors = rest.errors
  if (rest.links) doc.links = linksFromJson(rest.links)
  if (rest.included) doc.included = rest.included.map(resourceFromJson)
  return doc
}

/**
 * Decodes a JSON:API document from its wire form
 */
export function unmarshalDocument(input: string | Uint8Array): JsonApiDocument {
  const text = typeof input === 'string' ? input : new TextDecoder().decode(input)
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new MalformedDocumentError('document is not valid JSON', { cause: err })
  }
  const doc = documentFromJson(raw)
  log.debug({ shape: doc.data.shape, included: doc.included.length }, 'decoded document')
  return doc
}

function metaToJson(meta: unknown) {
  checkMeta(meta)
  return meta instanceof Map ? Object.fromEntries(meta) : meta
}

function linksToJson(links: JsonApiLinks) {
  checkLinks(links)
  const out: Record<string, unknown> = {}
  for (const key of ['self', 'related'] as const) {
    const link = links[key]
    if (!link) continue
    if (typeof link === 'string') {
      out[key] = link
      continue
    }
    const linkObject: Record<string, unknown> = { href: link.href }
    if (link.meta !== undefined && link.meta !== null) linkObject.meta = metaToJson(link.meta)
    out[key] = linkObject
  }
  for (const key of ['first', 'last', 'next', 'previous'] as const) if (links[key]) out[key] = links[key]
  return out
}

function jsonApiObjectToJson(jsonapi: JsonApiObject) {
  const out: Record<string, unknown> = {}
  if (jsonapi.version !== undefined) out.version = jsonapi.version
  if (jsonapi.meta !== undefined && jsonapi.meta !== null) out.meta = metaToJson(jsonapi.meta)
  return out
}

function resourceToJson(resource: JsonApiResource) {
  const out: Record<string, unknown> = {}
  if (resource.id) out.id = resource.id
  out.type = resource.type
  if (resource.attributes && Object.keys(resource.attributes).length > 0) out.attributes = resource.attributes
  if (resource.relationships && Object.keys(resource.relationships).length > 0) {
    const relationships: Record<string, unknown> = {}
    for (const [name, relationship] of Object.entries(resource.relationships))
      relationships[name] = documentToJson(relationship)
    out.relationships = relationships
  }
  if (resource.meta !== undefined && resource.meta !== null) out.meta = metaToJson(resource.meta)
  if (resource.links) out.links = linksToJson(resource.links)
  return out
}

/**
 * Builds the plain JSON value of a document. Errors and data never appear together.
 */
export function documentToJson(doc: JsonApiDocument): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  if (doc.errors.length === 0) {
    switch (doc.data.shape) {
      case 'none':
        out.data = null
        break
      case 'one':
        out.data = resourceToJson(doc.data.resource)
        break
      case 'many':
        out.data = doc.data.resources.map(resourceToJson)
        break
    }
  }
  if (doc.meta !== undefined && doc.meta !== null) out.meta = metaToJson(doc.meta)
  if (doc.jsonapi) out.jsonapi = jsonApiObjectToJson(doc.jsonapi)
  if (doc.errors.length > 0) out.errors = doc.errors
  if (doc.links) out.links = linksToJson(doc.links)
  if (doc.included.length > 0) out.included = doc.included.map(resourceToJson)
  return out
}

/**
 * Encodes a document to its wire form
 */
export function marshalDocument(doc: JsonApiDocument): string {
  const out = documentToJson(doc)
  log.debug({ shape: doc.data.shape, errors: doc.errors.length }, 'encoded document')
  return JSON.stringify(out)
}
