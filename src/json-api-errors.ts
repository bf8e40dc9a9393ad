/**
 * Base class for every failure raised while encoding, decoding or verifying a document
 */
export class JsonApiError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

export class MissingDataFieldError extends JsonApiError {
  constructor() {
    super('document must contain at least one of data, errors, meta, jsonapi or links')
  }
}

export class InvalidDataFieldError extends JsonApiError {
  constructor() {
    super('data member must not be an empty object')
  }
}

export class MissingLinkFieldsError extends JsonApiError {
  constructor() {
    super('at least one of links.self or links.related must be a non-empty string or link object')
  }
}

export class MalformedDocumentError extends JsonApiError {}

export class JsonApiTypeError extends JsonApiError {
  constructor(
    public readonly actual: string,
    public readonly expected: string[],
  ) {
    super(`got type "${actual}", expected one of ${expected.map((e) => `"${e}"`).join(', ')}`)
  }
}

/**
 * Included resources with no chain of relationships leading back to primary data
 */
export class PartialLinkageError extends JsonApiError {
  constructor(public readonly resources: string[]) {
    super(`included resources are not linked to primary data: ${resources.join(', ')}`)
  }
}
