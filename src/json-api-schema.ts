import { z } from 'zod'

// Absent and null pagination links both decode to undefined
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined)

export const linkObjectSchema = z.object({
  href: z.string(),
  meta: z.unknown().optional(),
})

export const linkSchema = z.union([z.string(), linkObjectSchema])

export const linksSchema = z.object({
  self: linkSchema.nullish(),
  related: linkSchema.nullish(),
  first: optionalString,
  last: optionalString,
  next: optionalString,
  previous: optionalString,
})

export const jsonApiObjectSchema = z.object({
  version: z.string().optional(),
  meta: z.unknown().optional(),
})

export const errorObjectSchema = z.object({
  id: z.string().optional(),
  links: z.object({ about: linkSchema.optional() }).optional(),
  status: z.string().optional(),
  code: z.string().optional(),
  title: z.string().optional(),
  detail: z.string().optional(),
  source: z
    .object({
      pointer: z.string().optional(),
      parameter: z.string().optional(),
      header: z.string().optional(),
    })
    .optional(),
  meta: z.unknown().optional(),
})

// null members decode as absent

/**
 * Relationship documents are kept untyped here, they go through the same two-pass decode as the top level
 */
export const resourceSchema = z.object({
  id: z.string().nullish(),
  type: z.string().min(1),
  attributes: z.record(z.unknown()).nullish(),
  relationships: z.record(z.unknown()).nullish(),
  meta: z.unknown().optional(),
  links: linksSchema.nullish(),
})

const documentSchema = z.object({
  meta: z.unknown().optional(),
  jsonapi: jsonApiObjectSchema.nullish(),
  errors: z.array(errorObjectSchema).nullish(),
  links: linksSchema.nullish(),
  included: z.array(resourceSchema).nullish(),
})

export const oneDocumentSchema = documentSchema.extend({
  data: resourceSchema.nullish(),
})

export const manyDocumentSchema = documentSchema.extend({
  data: z.array(resourceSchema),
})

export type ResourceInput = z.infer<typeof resourceSchema>
export type LinksInput = z.infer<typeof linksSchema>
export type DocumentInput = z.infer<typeof oneDocumentSchema> | z.infer<typeof manyDocumentSchema>
