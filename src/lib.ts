export { documentFromJson, documentToJson, marshalDocument, sniffPrimaryDataShape, unmarshalDocument } from './json-api-codec'
export { createDocument, hasPrimaryData, many, one, primaryResources, resourceIdentity } from './json-api-document'
export {
  InvalidDataFieldError,
  JsonApiError,
  JsonApiTypeError,
  MalformedDocumentError,
  MissingDataFieldError,
  MissingLinkFieldsError,
  PartialLinkageError,
} from './json-api-errors'
export {
  isMarshalIdentifier,
  isStringer,
  isUnmarshalIdentifier,
  marshalIdentifier,
  toResourceIdentifier,
  unmarshalIdentifier,
} from './json-api-identifier'
export type { MarshalIdentifier, Stringer, UnmarshalIdentifier } from './json-api-identifier'
export { verifyFullLinkage } from './json-api-linkage'
export {
  checkLinks,
  checkLinkValue,
  checkMeta,
  isLinkable,
  isLinkableRelation,
  isLinkObject,
  relationLinks,
  resourceLinks,
} from './json-api-links'
export type { Linkable, LinkableRelation } from './json-api-links'
export { parseConfig } from './config'
export type { JsonApiCodecConfig } from './config'
export type {
  JsonApiDocument,
  JsonApiErrorObject,
  JsonApiErrorSource,
  JsonApiLink,
  JsonApiLinkObject,
  JsonApiLinks,
  JsonApiObject,
  JsonApiResource,
  PrimaryData,
  PrimaryDataShape,
} from './json-api'
