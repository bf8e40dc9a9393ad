import { readFileSync } from 'fs'
import type { JsonApiResource } from '../src/json-api'
import { createDocument, one } from '../src/json-api-document'

export function readArticles() {
  return readFileSync('tests/articles.json', 'utf-8')
}

export function identifier(type: string, id: string): JsonApiResource {
  return { type, id }
}

/**
 * Relationship document pointing at a single resource
 */
export function toOne(resource: JsonApiResource) {
  return createDocument({ data: one(resource) })
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('expected function to throw')
}
