import type { Client } from 'cassandra-driver'
import { getDatabaseClient } from '../database/client.ts'
import { getDatabaseConfig } from '../database/config.ts'
import type { VerificationToken } from './types/verification-token.ts'

const getClient = (): Client => getDatabaseClient()
const getKeyspace = (): string => getDatabaseConfig().keyspace

export const insertVerificationToken = async (
  token: VerificationToken,
): Promise<void> => {
  const client = getClient()
  const keyspace = getKeyspace()

  await client.execute(
    `INSERT INTO ${keyspace}.verification_tokens (token, account_id, created_at)
     VALUES (?, ?, ?)`,
    [token.token, token.accountId, token.createdAt],
    { prepare: true },
  )
  await client.execute(
    `INSERT INTO ${keyspace}.verification_tokens_by_account (account_id, token, created_at)
     VALUES (?, ?, ?)`,
    [token.accountId, token.token, token.createdAt],
    { prepare: true },
  )
}

/**
 * Remove every token the account owns, from both tables.
 */
export const deleteVerificationTokensForAccount = async (
  accountId: string,
): Promise<void> => {
  const client = getClient()
  const keyspace = getKeyspace()

  const result = await client.execute(
    `SELECT token FROM ${keyspace}.verification_tokens_by_account WHERE account_id = ?`,
    [accountId],
    { prepare: true },
  )

  for (const row of result.rows) {
    await client.execute(
      `DELETE FROM ${keyspace}.verification_tokens WHERE token = ?`,
      [row.token as string],
      { prepare: true },
    )
  }

  await client.execute(
    `DELETE FROM ${keyspace}.verification_tokens_by_account WHERE account_id = ?`,
    [accountId],
    { prepare: true },
  )
}

export const findVerificationToken = async (
  token: string,
): Promise<VerificationToken | null> => {
  const result = await getClient().execute(
    `SELECT token, account_id, created_at FROM ${getKeyspace()}.verification_tokens WHERE token = ?`,
    [token],
    { prepare: true },
  )

  const row = result.first()
  if (!row) {
    return null
  }

  return {
    token: row.token as string,
    accountId: String(row.account_id),
    createdAt: row.created_at as Date,
  }
}

/**
 * Atomically delete a token (LWT). Of any number of concurrent callers holding
 * the same value, exactly one sees `true`.
 */
export const claimVerificationToken = async (
  token: VerificationToken,
): Promise<boolean> => {
  const client = getClient()
  const keyspace = getKeyspace()

  const result = await client.execute(
    `DELETE FROM ${keyspace}.verification_tokens WHERE token = ? IF EXISTS`,
    [token.token],
    { prepare: true },
  )

  if (!result.wasApplied()) {
    return false
  }

  await client.execute(
    `DELETE FROM ${keyspace}.verification_tokens_by_account WHERE account_id = ? AND token = ?`,
    [token.accountId, token.token],
    { prepare: true },
  )
  return true
}
