import type { Context } from 'hono'
import { describeError, warn } from './logger.ts'

export type RequestFields = Record<string, string>

/**
 * Reads a JSON or form-encoded body and keeps only its string fields.
 * A body that cannot be parsed yields an empty record; other failures propagate.
 */
export const readRequestFields = async (c: Context): Promise<RequestFields> => {
  const fields: RequestFields = {}
  const contentType = c.req.header('Content-Type') ?? ''

  try {
    if (contentType.includes('application/json')) {
      const body: unknown = await c.req.json()
      if (typeof body === 'object' && body !== null && !Array.isArray(body)) {
        for (const [key, value] of Object.entries(body)) {
          if (typeof value === 'string') fields[key] = value
        }
      }
      return fields
    }

    const form = await c.req.parseBody()
    for (const [key, value] of Object.entries(form)) {
      if (typeof value === 'string') fields[key] = value
    }
  } catch (error) {
    // Malformed JSON surfaces as SyntaxError, a malformed form body as TypeError
    if (!(error instanceof SyntaxError || error instanceof TypeError)) {
      throw error
    }
    warn({
      message: 'Unreadable request body treated as empty',
      path: c.req.path,
      error: describeError(error),
    })
  }

  return fields
}
