import type { JsonApiResource } from './json-api'
import { JsonApiTypeError } from './json-api-errors'
import { isRecord, typeName } from './util'

/**
 * Can be implemented by identifier values to control how they are written as a resource id.
 *
 * Marshaling an identifier:
 *  1. use marshalID() if it is implemented
 *  2. use the value itself if it is a string
 *  3. use a custom toString() if the value has one
 *  4. fail with a type error
 */
export interface MarshalIdentifier {
  marshalID(): string
}

/**
 * Can be implemented by identifier values to control how they are read from a resource id.
 * Errors thrown or returned by unmarshalID() are passed on to the caller as they are.
 *
 * Unmarshaling an identifier:
 *  1. use unmarshalID() if it is implemented
 *  2. take the id as is if the target is a string
 *  3. fail with a type error
 */
export interface UnmarshalIdentifier {
  unmarshalID(id: string): void | Error
}

export interface Stringer {
  toString(): string
}

export function isMarshalIdentifier(value: unknown): value is MarshalIdentifier {
  return isRecord(value) && typeof value.marshalID === 'function'
}

export function isUnmarshalIdentifier(value: unknown): value is UnmarshalIdentifier {
  return isRecord(value) && typeof value.unmarshalID === 'function'
}

// Only objects overriding Object.prototype.toString count, "[object Object]" is never an id
export function isStringer(value: unknown): value is Stringer {
  return isRecord(value) && typeof value.toString === 'function' && value.toString !== Object.prototype.toString
}

export function marshalIdentifier(value: unknown): string {
  if (isMarshalIdentifier(value)) return value.marshalID()
  if (typeof value === 'string') return value
  if (isStringer(value)) return value.toString()
  throw new JsonApiTypeError(typeName(value), ['MarshalIdentifier', 'string', 'Stringer'])
}

export function unmarshalIdentifier(id: string, target: string): string
export function unmarshalIdentifier<T extends UnmarshalIdentifier>(id: string, target: T): T
export function unmarshalIdentifier(id: string, target: unknown): unknown
export function unmarshalIdentifier(id: string, target: unknown): unknown {
  if (isUnmarshalIdentifier(target)) {
    const err = target.unmarshalID(id)
    if (err instanceof Error) throw err
    return target
  }
  if (typeof target === 'string') return id
  throw new JsonApiTypeError(typeName(target), ['UnmarshalIdentifier', 'string'])
}

/**
 * Builds a resource identifier from a domain key
 */
export function toResourceIdentifier(type: string, key: unknown): JsonApiResource {
  return { type, id: marshalIdentifier(key) }
}
