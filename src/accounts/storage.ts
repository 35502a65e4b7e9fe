import { randomUUID } from 'node:crypto'
import type { Client, types } from 'cassandra-driver'
import { getDatabaseClient } from '../database/client.ts'
import { getDatabaseConfig } from '../database/config.ts'
import { describeError, warn } from '../plumbing/logger.ts'
import { fail, type Outcome, succeed } from '../plumbing/outcome.ts'
import { isUuid } from '../plumbing/uuid.ts'
import { getRoleCapabilities, isRole, type Role, roleFromLegacyFlags } from './roles.ts'
import type { Account, AccountWithPassword } from './types/account.ts'

const getClient = (): Client => getDatabaseClient()
const getKeyspace = (): string => getDatabaseConfig().keyspace

export type AccountConflict = 'duplicate_username' | 'duplicate_email'

export interface NewAccount {
  username: string
  email: string
  passwordDigest: string
  passwordSalt: string
}

export const normalizeEmail = (email: string): string => email.trim().toLowerCase()

const toAccount = (row: types.Row): Account => {
  const storedRole: unknown = row.role
  const role: Role = isRole(storedRole)
    ? storedRole
    : roleFromLegacyFlags({
        isStaff: row.is_staff === true,
        isSuperuser: row.is_superuser === true,
      })

  return {
    id: String(row.account_id),
    username: row.username as string,
    email: row.email as string,
    isVerified: row.is_verified === true,
    isActive: row.is_active !== false,
    role,
    dateJoined: row.date_joined as Date,
    lastLoginAt: (row.last_login_at as Date | null) ?? undefined,
  }
}

const claimUnique = async (
  table: 'accounts_by_username' | 'accounts_by_email',
  column: 'username' | 'email',
  value: string,
  accountId: string,
): Promise<boolean> => {
  const result = await getClient().execute(
    `INSERT INTO ${getKeyspace()}.${table} (${column}, account_id)
     VALUES (?, ?)
     IF NOT EXISTS`,
    [value, accountId],
    { prepare: true },
  )
  return result.wasApplied()
}

const releaseUnique = async (
  table: 'accounts_by_username' | 'accounts_by_email',
  column: 'username' | 'email',
  value: string,
  accountId: string,
): Promise<void> => {
  // Conditional so a claim owned by another account is never removed
  await getClient().execute(
    `DELETE FROM ${getKeyspace()}.${table} WHERE ${column} = ? IF account_id = ?`,
    [value, accountId],
    { prepare: true },
  )
}

const releaseClaims = async (
  username: string,
  email: string,
  accountId: string,
): Promise<void> => {
  const results = await Promise.allSettled([
    releaseUnique('accounts_by_username', 'username', username, accountId),
    releaseUnique('accounts_by_email', 'email', email, accountId),
  ])
  for (const result of results) {
    if (result.status === 'rejected') {
      warn({
        message: 'Failed to release account claim',
        accountId,
        error: describeError(result.reason),
      })
    }
  }
}

/**
 * Create an account after claiming its username and email (LWT).
 * If either claim fails, whatever was claimed is released and no account row is written.
 * If the row write itself fails, both claims are released and the error is rethrown.
 */
export const createAccount = async (
  input: NewAccount,
): Promise<Outcome<Account, AccountConflict[]>> => {
  const accountId = randomUUID()
  const email = normalizeEmail(input.email)

  const hasUsername = await claimUnique(
    'accounts_by_username',
    'username',
    input.username,
    accountId,
  )
  const hasEmail = await claimUnique('accounts_by_email', 'email', email, accountId)

  if (!hasUsername || !hasEmail) {
    const conflicts: AccountConflict[] = []
    if (hasUsername) {
      await releaseUnique('accounts_by_username', 'username', input.username, accountId)
    } else {
      conflicts.push('duplicate_username')
    }
    if (hasEmail) {
      await releaseUnique('accounts_by_email', 'email', email, accountId)
    } else {
      conflicts.push('duplicate_email')
    }
    return fail(conflicts)
  }

  const role: Role = 'member'
  const { isStaff, isSuperuser } = getRoleCapabilities(role)
  const now = new Date()

  try {
    await getClient().execute(
      `INSERT INTO ${getKeyspace()}.accounts
       (account_id, username, email, password_digest, password_salt, role, is_staff, is_superuser, is_verified, is_active, date_joined)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        accountId,
        input.username,
        email,
        input.passwordDigest,
        input.passwordSalt,
        role,
        isStaff,
        isSuperuser,
        false,
        true,
        now,
      ],
      { prepare: true },
    )
  } catch (error) {
    // Claims must not outlive a row that was never written
    await releaseClaims(input.username, email, accountId)
    throw error
  }

  return succeed({
    id: accountId,
    username: input.username,
    email,
    isVerified: false,
    isActive: true,
    role,
    dateJoined: now,
  })
}

export const findAccountById = async (
  accountId: string,
): Promise<Account | null> => {
  // Ids arrive from URLs and cookies; the driver rejects non-UUID values outright
  if (!isUuid(accountId)) {
    return null
  }

  const result = await getClient().execute(
    `SELECT * FROM ${getKeyspace()}.accounts WHERE account_id = ?`,
    [accountId],
    { prepare: true },
  )

  const row = result.first()
  return row ? toAccount(row) : null
}

const findAccountIdBy = async (
  table: 'accounts_by_username' | 'accounts_by_email',
  column: 'username' | 'email',
  value: string,
): Promise<string | null> => {
  const result = await getClient().execute(
    `SELECT account_id FROM ${getKeyspace()}.${table} WHERE ${column} = ?`,
    [value],
    { prepare: true },
  )
  const row = result.first()
  return row ? String(row.account_id) : null
}

/**
 * Lookup for login. The only reader of the credential columns.
 */
export const findAccountWithPasswordByUsername = async (
  username: string,
): Promise<AccountWithPassword | null> => {
  const accountId = await findAccountIdBy(
    'accounts_by_username',
    'username',
    username,
  )
  if (!accountId) {
    return null
  }

  const result = await getClient().execute(
    `SELECT * FROM ${getKeyspace()}.accounts WHERE account_id = ?`,
    [accountId],
    { prepare: true },
  )
  const row = result.first()
  if (!row) {
    return null
  }

  return {
    ...toAccount(row),
    passwordDigest: (row.password_digest as string | null) ?? '',
    passwordSalt: (row.password_salt as string | null) ?? '',
  }
}

export const findAccountByEmail = async (
  email: string,
): Promise<Account | null> => {
  const accountId = await findAccountIdBy(
    'accounts_by_email',
    'email',
    normalizeEmail(email),
  )
  return accountId ? findAccountById(accountId) : null
}

/**
 * All accounts, oldest first. Full table scan; intended for the staff dashboard.
 */
export const listAccounts = async (): Promise<Account[]> => {
  const result = await getClient().execute(
    `SELECT * FROM ${getKeyspace()}.accounts`,
  )
  return result.rows
    .map(toAccount)
    .sort((a, b) => a.dateJoined.getTime() - b.dateJoined.getTime())
}

export const markAccountVerified = async (accountId: string): Promise<boolean> => {
  const result = await getClient().execute(
    `UPDATE ${getKeyspace()}.accounts SET is_verified = ? WHERE account_id = ? IF EXISTS`,
    [true, accountId],
    { prepare: true },
  )
  return result.wasApplied()
}

/**
 * Compare-and-set on is_active. Returns false when the row no longer holds `expected`.
 */
export const updateAccountActive = async (
  accountId: string,
  expected: boolean,
  isActive: boolean,
): Promise<boolean> => {
  const result = await getClient().execute(
    `UPDATE ${getKeyspace()}.accounts SET is_active = ? WHERE account_id = ? IF is_active = ?`,
    [isActive, accountId, expected],
    { prepare: true },
  )
  return result.wasApplied()
}

/**
 * Compare-and-set on role; the derived flags are written in the same statement.
 */
export const updateAccountRole = async (
  accountId: string,
  expected: Role,
  role: Role,
): Promise<boolean> => {
  const { isStaff, isSuperuser } = getRoleCapabilities(role)
  const result = await getClient().execute(
    `UPDATE ${getKeyspace()}.accounts
     SET role = ?, is_staff = ?, is_superuser = ?
     WHERE account_id = ?
     IF role = ?`,
    [role, isStaff, isSuperuser, accountId, expected],
    { prepare: true },
  )
  return result.wasApplied()
}

export const updateLastLogin = async (accountId: string): Promise<void> => {
  await getClient().execute(
    `UPDATE ${getKeyspace()}.accounts SET last_login_at = ? WHERE account_id = ?`,
    [new Date(), accountId],
    { prepare: true },
  )
}
