import type { Context } from 'hono'
import { getAppConfig } from '../config/config.ts'
import { getSessionCookieName } from './session.ts'

/**
 * Returns true if the request is over HTTPS (direct or via x-forwarded-proto).
 */
export const isHttps = (c: Context): boolean => {
  try {
    if (new URL(c.req.url).protocol === 'https:') return true
  } catch {
    // fall through to the proxy header
  }
  return c.req.header('x-forwarded-proto') === 'https'
}

export const readSessionCookie = (c: Context): string | null => {
  const cookieMatch = c.req
    .header('Cookie')
    ?.split(';')
    .map((s) => s.trim())
    .find((s) => s.startsWith(`${getSessionCookieName()}=`))

  const value = cookieMatch
    ? cookieMatch.substring(cookieMatch.indexOf('=') + 1).trim()
    : ''
  return value.length > 0 ? value : null
}

const buildCookie = (c: Context, value: string, maxAgeSeconds: number): string => {
  const secureFlag = isHttps(c) ? '; Secure' : ''
  return `${getSessionCookieName()}=${value}; Path=/; HttpOnly; SameSite=Lax${secureFlag}; Max-Age=${maxAgeSeconds}`
}

export const setSessionCookie = (c: Context, token: string): void => {
  c.header('Set-Cookie', buildCookie(c, token, getAppConfig().sessionMaxAgeSeconds))
}

export const clearSessionCookie = (c: Context): void => {
  c.header('Set-Cookie', buildCookie(c, '', 0))
}
