import { randomUUID } from 'node:crypto'
import { findAccountById, markAccountVerified } from '../accounts/storage.ts'
import type { Account } from '../accounts/types/account.ts'
import { log } from '../plumbing/logger.ts'
import { fail, type Outcome, succeed } from '../plumbing/outcome.ts'
import { logSecurityEvent } from '../plumbing/security-log.ts'
import { isUuid } from '../plumbing/uuid.ts'
import {
  claimVerificationToken,
  deleteVerificationTokensForAccount,
  findVerificationToken,
  insertVerificationToken,
} from './storage.ts'
import type { VerificationError } from './types/verification-token.ts'

/**
 * Token values are lower-case UUID strings; anything else cannot exist in the store.
 */
export const normalizeTokenValue = (value: string): string | null => {
  const candidate = value.trim().toLowerCase()
  return isUuid(candidate) ? candidate : null
}

/**
 * Issue a fresh verification token for an account, replacing any previous one.
 */
export const issueVerificationToken = async (
  accountId: string,
): Promise<string> => {
  await deleteVerificationTokensForAccount(accountId)

  const token = randomUUID()
  await insertVerificationToken({
    token,
    accountId,
    createdAt: new Date(),
  })

  log({ message: 'Verification token issued', accountId })
  return token
}

/**
 * Consume a verification token and mark its account verified.
 * The token is removed with a conditional delete before the account is touched,
 * so concurrent presentations of one value cannot both succeed.
 */
export const consumeVerificationToken = async (
  value: string,
): Promise<Outcome<Account, VerificationError>> => {
  const tokenValue = normalizeTokenValue(value)
  if (!tokenValue) {
    return fail('invalid_token')
  }

  const token = await findVerificationToken(tokenValue)
  if (!token) {
    return fail('invalid_token')
  }

  const isClaimed = await claimVerificationToken(token)
  if (!isClaimed) {
    return fail('invalid_token')
  }

  const isMarked = await markAccountVerified(token.accountId)
  const account = isMarked ? await findAccountById(token.accountId) : null
  if (!account) {
    log({
      message: 'Verification token referenced a missing account',
      accountId: token.accountId,
    })
    return fail('invalid_token')
  }

  logSecurityEvent({ event: 'email_verified', account_id: account.id })
  return succeed(account)
}
