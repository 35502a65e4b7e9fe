import type { Account } from './types/account.ts'

export interface SerializedAccount {
  id: string
  username: string
  email: string
  role: Account['role']
  isVerified: boolean
  isActive: boolean
  dateJoined: string
  lastLoginAt?: string
}

export const serializeAccount = (account: Account): SerializedAccount => ({
  id: account.id,
  username: account.username,
  email: account.email,
  role: account.role,
  isVerified: account.isVerified,
  isActive: account.isActive,
  dateJoined: account.dateJoined.toISOString(),
  lastLoginAt: account.lastLoginAt?.toISOString(),
})
