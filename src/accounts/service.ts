import { describeError, log, warn } from '../plumbing/logger.ts'
import { fail, type Outcome, succeed } from '../plumbing/outcome.ts'
import { logSecurityEvent } from '../plumbing/security-log.ts'
import { issueVerificationToken } from '../verification/ledger.ts'
import { type DeliveryReport, sendVerificationEmail } from '../verification/mailer.ts'
import { hashPassword, verifyPassword } from './password.ts'
import { checkPasswordStrength } from './password-policy.ts'
import {
  createAccount,
  findAccountByEmail,
  findAccountById,
  findAccountWithPasswordByUsername,
  updateLastLogin,
} from './storage.ts'
import type {
  Account,
  AccountLoginInput,
  AccountRegistrationInput,
  LoginError,
  RegistrationError,
} from './types/account.ts'

const MAX_USERNAME_LENGTH = 150

export interface RegistrationResult {
  account: Account
  delivery: DeliveryReport
}

/**
 * Validate email format
 */
const isValidEmail = (email: string): boolean => {
  const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/
  return emailRegex.test(email)
}

const isValidUsername = (username: string): boolean =>
  username.length > 0 &&
  username.length <= MAX_USERNAME_LENGTH &&
  /^[\w.@+-]+$/.test(username)

/**
 * Input checks that need no storage access. Every problem is reported, not just the first.
 */
export const validateRegistration = (
  input: AccountRegistrationInput,
): RegistrationError[] => {
  const errors: RegistrationError[] = []

  if (!isValidUsername(input.username)) {
    errors.push('invalid_username')
  }
  if (!isValidEmail(input.email)) {
    errors.push('invalid_email')
  }
  if (input.password !== input.passwordConfirmation) {
    errors.push('password_mismatch')
  } else if (
    checkPasswordStrength(input.password, {
      username: input.username,
      email: input.email,
    }).length > 0
  ) {
    errors.push('weak_password')
  }

  return errors
}

/**
 * Register a new account: unverified, active, member.
 * The verification token is committed before any delivery attempt. Neither a
 * failed token write nor a failed delivery undoes the registration.
 */
export const registerAccount = async (
  input: AccountRegistrationInput,
): Promise<Outcome<RegistrationResult, RegistrationError[]>> => {
  const normalizedInput = {
    ...input,
    username: input.username.trim(),
    email: input.email.trim(),
  }

  const errors = validateRegistration(normalizedInput)
  if (errors.length > 0) {
    return fail(errors)
  }

  const { hash, salt } = await hashPassword(normalizedInput.password)
  const created = await createAccount({
    username: normalizedInput.username,
    email: normalizedInput.email,
    passwordDigest: hash,
    passwordSalt: salt,
  })
  if (!created.isSuccess) {
    return fail(created.error)
  }

  const account = created.data
  log({ message: 'Account registered', accountId: account.id })

  let token: string
  try {
    token = await issueVerificationToken(account.id)
  } catch (error) {
    // The account stands; POST /verify/resend issues a fresh token later
    warn({
      message: 'Verification token not issued at registration',
      accountId: account.id,
      error: describeError(error),
    })
    return succeed({ account, delivery: { isDelivered: false } })
  }

  const delivery = await sendVerificationEmail(account, token)
  return succeed({ account, delivery })
}

/**
 * Authenticate by username and password.
 * Verification and active state are only revealed once the password matches.
 */
export const loginAccount = async (
  input: AccountLoginInput,
): Promise<Outcome<Account, LoginError>> => {
  const candidate = await findAccountWithPasswordByUsername(input.username.trim())

  const isValid =
    candidate !== null &&
    candidate.passwordDigest.length > 0 &&
    (await verifyPassword(
      input.password,
      candidate.passwordDigest,
      candidate.passwordSalt,
    ))

  if (!candidate || !isValid) {
    logSecurityEvent({ event: 'auth_failure', reason: 'bad_credentials' })
    return fail('bad_credentials')
  }

  if (!candidate.isVerified) {
    logSecurityEvent({
      event: 'auth_failure',
      reason: 'unverified',
      account_id: candidate.id,
    })
    return fail('unverified')
  }

  if (!candidate.isActive) {
    logSecurityEvent({
      event: 'auth_failure',
      reason: 'inactive',
      account_id: candidate.id,
    })
    return fail('inactive')
  }

  await updateLastLogin(candidate.id)
  logSecurityEvent({ event: 'auth_success', account_id: candidate.id })

  const { passwordDigest, passwordSalt, ...account } = candidate
  return succeed({ ...account, lastLoginAt: new Date() })
}

/**
 * Reissue and resend the verification link for an unverified account.
 * Returns null when there is nothing to send; callers must not reveal which case applied.
 */
export const resendVerification = async (
  email: string,
): Promise<DeliveryReport | null> => {
  if (!isValidEmail(email.trim())) {
    return null
  }

  const account = await findAccountByEmail(email)
  if (!account || account.isVerified) {
    return null
  }

  const token = await issueVerificationToken(account.id)
  return await sendVerificationEmail(account, token)
}

export const getAccountById = async (id: string): Promise<Account | null> => {
  return await findAccountById(id)
}
