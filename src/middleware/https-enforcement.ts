import type { Context, Next } from 'hono'
import { isHttps } from '../sessions/cookies.ts'

const LOCAL_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]'])

const isLocalhost = (c: Context): boolean => {
  try {
    return LOCAL_HOSTS.has(new URL(c.req.url).hostname.toLowerCase())
  } catch {
    return false
  }
}

/**
 * In production, session cookies and passwords only travel over HTTPS.
 * Plain-HTTP requests are refused unless they come to localhost.
 */
export const httpsEnforcement = async (
  c: Context,
  next: Next,
): Promise<Response | undefined> => {
  if (process.env.NODE_ENV !== 'production' || isHttps(c) || isLocalhost(c)) {
    await next()
    return undefined
  }

  return c.json(
    {
      error: 'https_required',
      error_description: 'HTTPS is required.',
    },
    403,
  )
}
