import type { JsonApiLinkObject, JsonApiLinks } from './json-api'
import { JsonApiTypeError, MissingLinkFieldsError } from './json-api-errors'
import { isRecord, typeName } from './util'

/**
 * Can be implemented by resources to produce their own links object
 */
export interface Linkable {
  link(): JsonApiLinks | undefined
}

/**
 * Can be implemented by resources to produce links for a named relationship
 */
export interface LinkableRelation {
  linkRelation(relation: string): JsonApiLinks | undefined
}

export function isLinkObject(value: unknown): value is JsonApiLinkObject {
  return isRecord(value) && typeof value.href === 'string'
}

export function isLinkable(value: unknown): value is Linkable {
  return isRecord(value) && typeof value.link === 'function'
}

export function isLinkableRelation(value: unknown): value is LinkableRelation {
  return isRecord(value) && typeof value.linkRelation === 'function'
}

function isMetaObject(meta: unknown) {
  if (!isRecord(meta)) return false
  if (meta instanceof Map) return true
  // sets, typed arrays and other sequences
  return !(Symbol.iterator in meta) && !ArrayBuffer.isView(meta)
}

/**
 * Meta must be absent, a plain object or a Map
 */
export function checkMeta(meta: unknown) {
  if (meta === undefined || meta === null) return
  if (isMetaObject(meta)) return
  throw new JsonApiTypeError(typeName(meta), ['object', 'Map'])
}

/**
 * @returns whether the self or related link value is empty
 */
export function checkLinkValue(value: unknown) {
  if (value === undefined || value === null) return true
  if (typeof value === 'string') return value === ''
  if (isLinkObject(value)) {
    checkMeta(value.meta)
    return value.href === ''
  }
  throw new JsonApiTypeError(typeName(value), ['LinkObject', 'string'])
}

/**
 * Validates a links object in place. Fails when both self and related are empty,
 * otherwise an empty one is cleared so it is left out of the encoded document.
 */
export function checkLinks(links: JsonApiLinks) {
  const selfIsEmpty = checkLinkValue(links.self)
  const relatedIsEmpty = checkLinkValue(links.related)
  if (selfIsEmpty && relatedIsEmpty) throw new MissingLinkFieldsError()
  if (selfIsEmpty) links.self = undefined
  if (relatedIsEmpty) links.related = undefined
}

export function resourceLinks(value: unknown) {
  if (!isLinkable(value)) return undefined
  const links = value.link()
  if (links) checkLinks(links)
  return links
}

export function relationLinks(value: unknown, relation: string) {
  if (!isLinkableRelation(value)) return undefined
  const links = value.linkRelation(relation)
  if (links) checkLinks(links)
  return links
}
