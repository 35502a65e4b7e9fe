import type { Context, Next } from 'hono'
import { checkStaffAccess } from '../access/policy.ts'
import { getAccountById } from '../accounts/service.ts'
import { clearSessionCookie, readSessionCookie } from '../sessions/cookies.ts'
import { verifySessionToken } from '../sessions/session.ts'

/**
 * Hono middleware that resolves the session cookie into the current account.
 * Responds 401 when there is no valid session or the account is gone or inactive.
 *
 * Downstream handlers read the account with c.get('account').
 */
export const requireSession = async (
  c: Context,
  next: Next,
): Promise<Response | undefined> => {
  const token = readSessionCookie(c)
  const session = token ? verifySessionToken(token) : null
  const account = session ? await getAccountById(session.sub) : null

  if (!account || !account.isActive) {
    if (token) {
      clearSessionCookie(c)
    }
    return c.json(
      {
        error: 'unauthenticated',
        error_description: 'Sign in to continue.',
      },
      401,
    )
  }

  c.set('account', account)
  await next()
  return undefined
}

/**
 * Must run after requireSession. Admits active moderators and admins.
 */
export const requireStaff = async (
  c: Context,
  next: Next,
): Promise<Response | undefined> => {
  const decision = checkStaffAccess(c.get('account'))
  if (!decision.isAllowed) {
    return c.json(
      { error: decision.error, error_description: decision.message },
      403,
    )
  }

  await next()
  return undefined
}
