import type { Context } from 'hono'
import type { z } from 'zod'

/**
 * Parse and validate a JSON request body. Returns the parsed value, or a
 * 400 response listing the offending fields.
 */
export async function parseBody<T>(
  c: Context,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T | Response> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return c.json({ error: 'Invalid JSON body.' }, 400)
  }

  const result = schema.safeParse(body)
  if (!result.success) {
    const { fieldErrors, formErrors } = result.error.flatten()
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }))
    return c.json({ error: 'Validation failed.', fields: fieldErrors, form: formErrors, issues }, 400)
  }

  return result.data
}

/** Check if a parseBody result is a Response (validation error). */
export function isResponse(value: unknown): value is Response {
  return value instanceof Response
}
