import { beforeEach, describe, expect, it, vi } from 'vitest'
import * as accountStorage from '../../accounts/storage.ts'
import type { Account } from '../../accounts/types/account.ts'
import {
  consumeVerificationToken,
  issueVerificationToken,
  normalizeTokenValue,
} from '../ledger.ts'
import * as storage from '../storage.ts'

vi.mock('../storage.ts', () => ({
  insertVerificationToken: vi.fn(),
  deleteVerificationTokensForAccount: vi.fn(),
  findVerificationToken: vi.fn(),
  claimVerificationToken: vi.fn(),
}))

vi.mock('../../accounts/storage.ts', () => ({
  findAccountById: vi.fn(),
  markAccountVerified: vi.fn(),
}))

vi.mock('../../plumbing/logger.ts', () => ({
  log: vi.fn(),
}))

const ACCOUNT_ID = '0b7e5f3c-2d41-4c8e-9a6b-1f2e3d4c5b6a'
const TOKEN = '6f1c2a9e-8b3d-4e7f-a012-3456789abcde'

const verifiedAccount: Account = {
  id: ACCOUNT_ID,
  username: 'alice',
  email: 'alice@example.com',
  isVerified: true,
  isActive: true,
  role: 'member',
  dateJoined: new Date('2024-03-01T12:00:00Z'),
}

describe('Verification ledger', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  describe('normalizeTokenValue', () => {
    it('should lower-case and trim canonical UUIDs', () => {
      expect(normalizeTokenValue(`  ${TOKEN.toUpperCase()} `)).toBe(TOKEN)
    })

    it('should reject anything that is not a canonical UUID', () => {
      expect(normalizeTokenValue('')).toBeNull()
      expect(normalizeTokenValue('not-a-token')).toBeNull()
      expect(normalizeTokenValue(TOKEN.replace(/-/g, ''))).toBeNull()
      expect(normalizeTokenValue(`${TOKEN}0`)).toBeNull()
    })
  })

  describe('issueVerificationToken', () => {
    it('should delete previous tokens before inserting a new one', async () => {
      const token = await issueVerificationToken(ACCOUNT_ID)

      expect(normalizeTokenValue(token)).toBe(token)
      expect(storage.deleteVerificationTokensForAccount).toHaveBeenCalledWith(ACCOUNT_ID)
      expect(storage.insertVerificationToken).toHaveBeenCalledWith({
        token,
        accountId: ACCOUNT_ID,
        createdAt: expect.any(Date),
      })

      const deleteOrder = vi.mocked(storage.deleteVerificationTokensForAccount).mock
        .invocationCallOrder[0]
      const insertOrder = vi.mocked(storage.insertVerificationToken).mock
        .invocationCallOrder[0]
      expect(deleteOrder).toBeLessThan(insertOrder)
    })

    it('should issue a different token each time', async () => {
      const first = await issueVerificationToken(ACCOUNT_ID)
      const second = await issueVerificationToken(ACCOUNT_ID)

      expect(first).not.toBe(second)
    })
  })

  describe('consumeVerificationToken', () => {
    it('should never query the store for a malformed value', async () => {
      const result = await consumeVerificationToken('abc')

      expect(result).toEqual({ isSuccess: false, error: 'invalid_token' })
      expect(storage.findVerificationToken).not.toHaveBeenCalled()
      expect(storage.claimVerificationToken).not.toHaveBeenCalled()
    })

    it('should fail for an unknown token', async () => {
      vi.mocked(storage.findVerificationToken).mockResolvedValue(null)

      const result = await consumeVerificationToken(TOKEN)

      expect(result).toEqual({ isSuccess: false, error: 'invalid_token' })
      expect(accountStorage.markAccountVerified).not.toHaveBeenCalled()
    })

    it('should claim the token then verify the account', async () => {
      const stored = { token: TOKEN, accountId: ACCOUNT_ID, createdAt: new Date() }
      vi.mocked(storage.findVerificationToken).mockResolvedValue(stored)
      vi.mocked(storage.claimVerificationToken).mockResolvedValue(true)
      vi.mocked(accountStorage.markAccountVerified).mockResolvedValue(true)
      vi.mocked(accountStorage.findAccountById).mockResolvedValue(verifiedAccount)

      const result = await consumeVerificationToken(TOKEN.toUpperCase())

      expect(result).toEqual({ isSuccess: true, data: verifiedAccount })
      expect(storage.findVerificationToken).toHaveBeenCalledWith(TOKEN)
      expect(storage.claimVerificationToken).toHaveBeenCalledWith(stored)
      expect(accountStorage.markAccountVerified).toHaveBeenCalledWith(ACCOUNT_ID)
    })

    it('should fail without touching the account when another request claimed the token', async () => {
      vi.mocked(storage.findVerificationToken).mockResolvedValue({
        token: TOKEN,
        accountId: ACCOUNT_ID,
        createdAt: new Date(),
      })
      vi.mocked(storage.claimVerificationToken).mockResolvedValue(false)

      const result = await consumeVerificationToken(TOKEN)

      expect(result).toEqual({ isSuccess: false, error: 'invalid_token' })
      expect(accountStorage.markAccountVerified).not.toHaveBeenCalled()
    })

    it('should fail when the owning account no longer exists', async () => {
      vi.mocked(storage.findVerificationToken).mockResolvedValue({
        token: TOKEN,
        accountId: ACCOUNT_ID,
        createdAt: new Date(),
      })
      vi.mocked(storage.claimVerificationToken).mockResolvedValue(true)
      vi.mocked(accountStorage.markAccountVerified).mockResolvedValue(false)

      const result = await consumeVerificationToken(TOKEN)

      expect(result).toEqual({ isSuccess: false, error: 'invalid_token' })
      expect(accountStorage.findAccountById).not.toHaveBeenCalled()
    })
  })
})
