import { z } from 'zod'

const emptyToUndefined = (value: unknown) => {
  if (typeof value === 'string' && value.trim().length === 0) return undefined
  return value
}

const schema = z.object({
  JSON_API_LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('silent'),
  ),
})

export interface JsonApiCodecConfig {
  logLevel: z.infer<typeof schema>['JSON_API_LOG_LEVEL']
}

export function parseConfig(env: Record<string, string | undefined>): JsonApiCodecConfig {
  const parsed = schema.safeParse(env)
  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
      .join('; ')
    throw new Error(`Invalid configuration: ${fields}`)
  }
  return { logLevel: parsed.data.JSON_API_LOG_LEVEL }
}

export const config = parseConfig(process.env)
