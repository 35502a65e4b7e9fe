import { Hono } from 'hono'
import { requireSession } from '../middleware/require-session.ts'
import { readRequestFields } from '../plumbing/request-body.ts'
import { clearSessionCookie, setSessionCookie } from '../sessions/cookies.ts'
import { createSessionToken } from '../sessions/session.ts'
import { consumeVerificationToken } from '../verification/ledger.ts'
import { loginAccount, registerAccount, resendVerification } from './service.ts'
import { serializeAccount } from './serialize.ts'
import type { LoginError, RegistrationError } from './types/account.ts'

const REGISTRATION_MESSAGES: Record<RegistrationError, string> = {
  invalid_username:
    'Enter a valid username of up to 150 letters, digits and @/./+/-/_ characters.',
  invalid_email: 'Enter a valid email address.',
  password_mismatch: 'The two password fields didn’t match.',
  weak_password:
    'Choose a password of at least 8 characters that is not entirely numeric, too common, or too similar to your username or email.',
  duplicate_username: 'A user with that username already exists.',
  duplicate_email: 'An account with this email already exists.',
}

const LOGIN_MESSAGES: Record<LoginError, string> = {
  bad_credentials: 'Invalid username or password.',
  unverified:
    'Please verify your email before logging in. Check your inbox for the verification link.',
  inactive: 'Your account has been deactivated. Contact support.',
}

const accounts = new Hono()

/**
 * POST /register
 * Create an unverified member account and send the verification link
 */
accounts.post('/register', async (c) => {
  const body = await readRequestFields(c)

  const result = await registerAccount({
    username: body.username ?? '',
    email: body.email ?? '',
    password: body.password ?? '',
    passwordConfirmation: body.passwordConfirmation ?? body.password2 ?? '',
  })

  if (!result.isSuccess) {
    const isConflict = result.error.every(
      (e) => e === 'duplicate_username' || e === 'duplicate_email',
    )
    return c.json(
      {
        error: isConflict ? 'conflict' : 'validation_failed',
        error_description: 'Registration failed.',
        errors: result.error.map((code) => ({
          code,
          message: REGISTRATION_MESSAGES[code],
        })),
      },
      isConflict ? 409 : 400,
    )
  }

  const { account, delivery } = result.data
  return c.json(
    {
      message:
        'Account created! Please check your email for a verification link.',
      account: serializeAccount(account),
      ...(delivery.devVerificationUrl
        ? { devVerificationUrl: delivery.devVerificationUrl }
        : {}),
    },
    201,
  )
})

/**
 * GET /verify?token=...
 * Consume a verification token
 */
accounts.get('/verify', async (c) => {
  const token = c.req.query('token')
  if (!token) {
    return c.json(
      {
        error: 'invalid_token',
        error_description: 'Invalid verification link.',
      },
      400,
    )
  }

  const result = await consumeVerificationToken(token)
  if (!result.isSuccess) {
    return c.json(
      {
        error: 'invalid_token',
        error_description:
          'Verification link is invalid or has already been used.',
      },
      400,
    )
  }

  return c.json({ message: 'Email verified! You can now log in.' })
})

/**
 * POST /verify/resend
 * Reissue the verification link. The response is the same whether or not the account exists.
 */
accounts.post('/verify/resend', async (c) => {
  const body = await readRequestFields(c)
  const report = await resendVerification(body.email ?? '')

  return c.json(
    {
      message:
        'If an unverified account exists for this email, a new verification link has been sent.',
      ...(report?.devVerificationUrl
        ? { devVerificationUrl: report.devVerificationUrl }
        : {}),
    },
    202,
  )
})

/**
 * POST /login
 * Authenticate and start a session
 */
accounts.post('/login', async (c) => {
  const body = await readRequestFields(c)
  const username = body.username?.trim()
  const password = body.password

  if (!username || !password) {
    return c.json(
      {
        error: 'bad_credentials',
        error_description: 'Username and password are required.',
      },
      400,
    )
  }

  const result = await loginAccount({ username, password })
  if (!result.isSuccess) {
    return c.json(
      {
        error: result.error,
        error_description: LOGIN_MESSAGES[result.error],
      },
      result.error === 'bad_credentials' ? 401 : 403,
    )
  }

  const account = result.data
  setSessionCookie(c, createSessionToken(account.id))
  return c.json({
    message: `Welcome back, ${account.username}!`,
    account: serializeAccount(account),
  })
})

/**
 * POST /logout
 */
accounts.post('/logout', (c) => {
  clearSessionCookie(c)
  return c.json({ message: 'You have been logged out.' })
})

/**
 * GET /me
 * The signed-in account
 */
accounts.get('/me', requireSession, (c) => {
  return c.json({ account: serializeAccount(c.get('account')) })
})

export default accounts
