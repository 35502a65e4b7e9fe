import type { Context, Next } from 'hono'
import { isHttps } from '../sessions/cookies.ts'

const SECURITY_HEADERS: Record<string, string> = {
  'X-Content-Type-Options': 'nosniff',
  'X-Frame-Options': 'DENY',
  'Referrer-Policy': 'strict-origin-when-cross-origin',
  // Responses carry account data and session cookies
  'Cache-Control': 'no-store',
}

const HSTS_HEADER = 'max-age=31536000; includeSubDomains'

/**
 * Sets standard security headers on every response.
 * HSTS is only sent over HTTPS.
 */
export const securityHeaders = async (
  c: Context,
  next: Next,
): Promise<Response | undefined> => {
  await next()

  for (const [name, value] of Object.entries(SECURITY_HEADERS)) {
    c.header(name, value)
  }
  if (isHttps(c)) {
    c.header('Strict-Transport-Security', HSTS_HEADER)
  }
  return undefined
}
