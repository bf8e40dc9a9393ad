import { describe, expect, test } from 'vitest'
import type { JsonApiLinks } from '../src/json-api'
import { JsonApiTypeError, MissingLinkFieldsError } from '../src/json-api-errors'
import { checkLinks, checkLinkValue, checkMeta, relationLinks, resourceLinks } from '../src/json-api-links'
import { thrown } from './fixtures'

class Person {
  constructor(public id: string) {}
  link(): JsonApiLinks {
    return { self: `/people/${this.id}`, related: '' }
  }
  linkRelation(relation: string): JsonApiLinks {
    if (relation === 'pets') return {}
    return { related: `/people/${this.id}/${relation}` }
  }
}

describe('checkMeta', () => {
  test('accepts absent, objects and maps', () => {
    expect(() => checkMeta(undefined)).not.toThrow()
    expect(() => checkMeta(null)).not.toThrow()
    expect(() => checkMeta({ count: 1 })).not.toThrow()
    expect(() => checkMeta(new Map())).not.toThrow()
    expect(() => checkMeta(new Person('1'))).not.toThrow()
  })

  test('rejects scalars and arrays', () => {
    const err = thrown(() => checkMeta('meta'))
    expect(err).toBeInstanceOf(JsonApiTypeError)
    expect(err).toMatchObject({ actual: 'string', expected: ['object', 'Map'] })
    expect(thrown(() => checkMeta([1]))).toMatchObject({ actual: 'array' })
    expect(thrown(() => checkMeta(new Set([1, 2])))).toMatchObject({ actual: 'Set', expected: ['object', 'Map'] })
    expect(thrown(() => checkMeta(new Uint8Array([1, 2])))).toMatchObject({ actual: 'Uint8Array' })
  })
})

describe('checkLinkValue', () => {
  test('emptiness', () => {
    expect(checkLinkValue(undefined)).toBe(true)
    expect(checkLinkValue(null)).toBe(true)
    expect(checkLinkValue('')).toBe(true)
    expect(checkLinkValue('/a')).toBe(false)
    expect(checkLinkValue({ href: '' })).toBe(true)
    expect(checkLinkValue({ href: '/a', meta: { count: 1 } })).toBe(false)
  })

  test('rejects other types', () => {
    const err = thrown(() => checkLinkValue(42))
    expect(err).toBeInstanceOf(JsonApiTypeError)
    expect(err).toMatchObject({ actual: 'number', expected: ['LinkObject', 'string'] })
    expect(thrown(() => checkLinkValue({ url: '/a' }))).toMatchObject({ actual: 'Object' })
    const constructorErr = thrown(() => checkLinkValue({ constructor: null }))
    expect(constructorErr).toBeInstanceOf(JsonApiTypeError)
    expect(constructorErr).toMatchObject({ actual: 'Object' })
  })

  test('validates link object meta', () => {
    expect(thrown(() => checkLinkValue({ href: '/a', meta: 3 }))).toMatchObject({ actual: 'number' })
  })
})

describe('checkLinks', () => {
  test('both empty fails', () => {
    expect(() => checkLinks({ self: '', related: '' })).toThrow(MissingLinkFieldsError)
    expect(() => checkLinks({ first: '/page/1' })).toThrow(MissingLinkFieldsError)
  })

  test('empty related is cleared', () => {
    const links: JsonApiLinks = { self: '/a', related: '' }
    checkLinks(links)
    expect(links.self).toBe('/a')
    expect(links.related).toBeUndefined()
  })

  test('empty self link object is cleared', () => {
    const links: JsonApiLinks = { self: { href: '' }, related: { href: '/b' } }
    checkLinks(links)
    expect(links.self).toBeUndefined()
    expect(links.related).toEqual({ href: '/b' })
  })
})

describe('link capabilities', () => {
  test('resource links', () => {
    expect(resourceLinks(new Person('1'))).toEqual({ self: '/people/1' })
    expect(resourceLinks({ id: '1' })).toBeUndefined()
  })

  test('relation links', () => {
    expect(relationLinks(new Person('1'), 'friends')).toEqual({ related: '/people/1/friends' })
    expect(() => relationLinks(new Person('1'), 'pets')).toThrow(MissingLinkFieldsError)
    expect(relationLinks('person', 'friends')).toBeUndefined()
  })
})
