import crypto from 'node:crypto'
import { getAppConfig } from '../config/config.ts'

const SESSION_COOKIE_NAME = 'account_session'

export interface SessionPayload {
  sub: string
  iat: number
  exp: number
}

const base64UrlEncode = (buffer: Buffer): string => buffer.toString('base64url')

const sign = (encodedPayload: string, secret: string): Buffer =>
  crypto.createHmac('sha256', secret).update(encodedPayload).digest()

const isSessionPayload = (value: unknown): value is SessionPayload => {
  if (typeof value !== 'object' || value === null) {
    return false
  }
  return (
    'sub' in value &&
    typeof value.sub === 'string' &&
    value.sub.length > 0 &&
    'iat' in value &&
    typeof value.iat === 'number' &&
    'exp' in value &&
    typeof value.exp === 'number'
  )
}

/**
 * `<base64url payload>.<base64url HMAC-SHA256>`, signed with SESSION_SECRET.
 */
export const createSessionToken = (sub: string, now: Date = new Date()): string => {
  const { sessionSecret, sessionMaxAgeSeconds } = getAppConfig()
  const issuedAt = Math.floor(now.getTime() / 1000)
  const payload: SessionPayload = {
    sub,
    iat: issuedAt,
    exp: issuedAt + sessionMaxAgeSeconds,
  }

  const encodedPayload = base64UrlEncode(
    Buffer.from(JSON.stringify(payload), 'utf8'),
  )
  const signature = base64UrlEncode(sign(encodedPayload, sessionSecret))

  return `${encodedPayload}.${signature}`
}

export const verifySessionToken = (
  token: string,
  now: Date = new Date(),
): SessionPayload | null => {
  const parts = token.split('.')
  if (parts.length !== 2) {
    return null
  }

  const [encodedPayload, encodedSignature] = parts
  const expected = sign(encodedPayload, getAppConfig().sessionSecret)
  const provided = Buffer.from(encodedSignature, 'base64url')
  if (
    provided.length !== expected.length ||
    !crypto.timingSafeEqual(provided, expected)
  ) {
    return null
  }

  let payload: unknown
  try {
    payload = JSON.parse(Buffer.from(encodedPayload, 'base64url').toString('utf8'))
  } catch {
    return null
  }

  if (!isSessionPayload(payload)) {
    return null
  }

  if (payload.exp <= Math.floor(now.getTime() / 1000)) {
    return null
  }

  return payload
}

export const getSessionCookieName = (): string => SESSION_COOKIE_NAME
