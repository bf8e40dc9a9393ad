/**
 * True for objects that are neither null nor arrays (records, maps, class instances)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Runtime type name used in type errors, e.g. "string", "array" or a class name
 */
export function typeName(value: unknown) {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (typeof value === 'object' && value !== null) {
    // read through the prototype, an own constructor property may be anything
    const proto: unknown = Object.getPrototypeOf(value)
    const ctor = isRecord(proto) ? proto.constructor : undefined
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object'
  }
  return typeof value
}
