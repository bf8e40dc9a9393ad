import type { JsonApiDocument, JsonApiResource, PrimaryData } from './json-api'

export function createDocument(init: Partial<JsonApiDocument> = {}): JsonApiDocument {
  return {
    data: { shape: 'none' },
    errors: [],
    included: [],
    ...init,
  }
}

export function one(resource: JsonApiResource): PrimaryData {
  return { shape: 'one', resource }
}

export function many(resources: JsonApiResource[] = []): PrimaryData {
  return { shape: 'many', resources }
}

/**
 * Primary data as a list, empty when there is none
 */
export function primaryResources(data: PrimaryData): JsonApiResource[] {
  switch (data.shape) {
    case 'none':
      return []
    case 'one':
      return [data.resource]
    case 'many':
      return data.resources
  }
}

/**
 * False for documents whose data is absent, null or []
 */
export function hasPrimaryData(doc: JsonApiDocument) {
  return primaryResources(doc.data).length > 0
}

export function resourceIdentity(resource: JsonApiResource) {
  return `{Type: ${resource.type}, ID: ${resource.id ?? ''}}`
}
