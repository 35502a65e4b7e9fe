import nodemailer from 'nodemailer'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { Account } from '../../accounts/types/account.ts'
import { clearAppConfigCache } from '../../config/config.ts'
import { warn } from '../../plumbing/logger.ts'
import {
  buildVerificationUrl,
  resetMailTransport,
  sendVerificationEmail,
} from '../mailer.ts'

vi.mock('nodemailer', () => ({
  default: { createTransport: vi.fn() },
}))

vi.mock('../../plumbing/logger.ts', async () => {
  const actual = await vi.importActual('../../plumbing/logger.ts')
  return {
    ...actual,
    log: vi.fn(),
    warn: vi.fn(),
  }
})

const TOKEN = '6f1c2a9e-8b3d-4e7f-a012-3456789abcde'
const VERIFY_URL = `https://accounts.example.test/verify?token=${TOKEN}`

const account: Account = {
  id: '0b7e5f3c-2d41-4c8e-9a6b-1f2e3d4c5b6a',
  username: 'alice',
  email: 'alice@example.com',
  isVerified: false,
  isActive: true,
  role: 'member',
  dateJoined: new Date('2024-03-01T12:00:00Z'),
}

describe('Verification mailer', () => {
  const originalEnv = process.env
  const sendMail = vi.fn()

  beforeEach(() => {
    vi.clearAllMocks()
    process.env = { ...originalEnv }
    process.env.PUBLIC_BASE_URL = 'https://accounts.example.test/'
    process.env.SMTP_USER = 'mailer@example.com'
    process.env.SMTP_PASSWORD = 'test-secret'
    process.env.MAIL_FROM = 'Accounts <accounts@example.test>'
    delete process.env.APP_DEBUG
    delete process.env.SMTP_HOST
    delete process.env.SMTP_PORT
    delete process.env.SMTP_SECURE
    clearAppConfigCache()
    resetMailTransport()
    vi.mocked(nodemailer.createTransport).mockReturnValue({ sendMail } as never)
  })

  afterEach(() => {
    process.env = originalEnv
    clearAppConfigCache()
    resetMailTransport()
  })

  it('should build the link from the public base URL', () => {
    expect(buildVerificationUrl(TOKEN)).toBe(VERIFY_URL)
  })

  it('should send the link to the account email', async () => {
    sendMail.mockResolvedValue({ messageId: 'message-1' })

    const report = await sendVerificationEmail(account, TOKEN)

    expect(report).toEqual({ isDelivered: true })
    expect(nodemailer.createTransport).toHaveBeenCalledWith({
      host: 'smtp.gmail.com',
      port: 587,
      secure: false,
      auth: { user: 'mailer@example.com', pass: 'test-secret' },
    })
    expect(sendMail).toHaveBeenCalledWith(
      expect.objectContaining({
        from: 'Accounts <accounts@example.test>',
        to: 'alice@example.com',
        subject: 'Verify your account',
      }),
    )
    const [message] = sendMail.mock.calls[0]
    expect(message.text).toContain(VERIFY_URL)
  })

  it('should reuse the transport across messages', async () => {
    sendMail.mockResolvedValue({ messageId: 'message-1' })

    await sendVerificationEmail(account, TOKEN)
    await sendVerificationEmail(account, TOKEN)

    expect(nodemailer.createTransport).toHaveBeenCalledTimes(1)
  })

  it('should hand back the link in debug mode when sending fails', async () => {
    sendMail.mockRejectedValue(new Error('connection refused'))

    const report = await sendVerificationEmail(account, TOKEN)

    expect(report).toEqual({ isDelivered: false, devVerificationUrl: VERIFY_URL })
    expect(warn).toHaveBeenCalledWith({
      message: 'Verification email failed; using fallback',
      accountId: account.id,
      error: 'connection refused',
    })
  })

  it('should withhold the link outside debug mode', async () => {
    process.env.APP_DEBUG = 'false'
    clearAppConfigCache()
    sendMail.mockRejectedValue(new Error('connection refused'))

    const report = await sendVerificationEmail(account, TOKEN)

    expect(report).toEqual({ isDelivered: false })
  })

  it('should not create a transport without SMTP credentials', async () => {
    delete process.env.SMTP_USER
    delete process.env.SMTP_PASSWORD

    const report = await sendVerificationEmail(account, TOKEN)

    expect(report).toEqual({ isDelivered: false, devVerificationUrl: VERIFY_URL })
    expect(nodemailer.createTransport).not.toHaveBeenCalled()
  })
})
