import nodemailer, { type Transporter } from 'nodemailer'
import type { Account } from '../accounts/types/account.ts'
import { getAppConfig } from '../config/config.ts'
import { describeError, log, warn } from '../plumbing/logger.ts'
import { getMailConfig } from './mail-config.ts'

export interface DeliveryReport {
  isDelivered: boolean
  /** Set only in development mode when delivery failed */
  devVerificationUrl?: string
}

let transporter: Transporter | null = null

const getTransporter = (): Transporter | null => {
  const config = getMailConfig()
  if (!config.isConfigured) {
    return null
  }

  if (!transporter) {
    transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.isSecure,
      auth: { user: config.user, pass: config.password },
    })
  }
  return transporter
}

export const resetMailTransport = (): void => {
  transporter = null
}

export const buildVerificationUrl = (token: string): string =>
  `${getAppConfig().publicBaseUrl}/verify?token=${encodeURIComponent(token)}`

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')

const renderMessage = (
  account: Account,
  verificationUrl: string,
): { text: string; html: string } => ({
  text: [
    `Hi ${account.username},`,
    '',
    'Confirm your email address to finish setting up your account:',
    verificationUrl,
    '',
    'The link works once. If you did not create this account, ignore this email.',
  ].join('\n'),
  html: `<p>Hi ${escapeHtml(account.username)},</p>
<p>Confirm your email address to finish setting up your account:</p>
<p><a href="${escapeHtml(verificationUrl)}">Verify my email</a></p>
<p>The link works once. If you did not create this account, ignore this email.</p>`,
})

/**
 * Send the verification link. Never throws: a failed delivery is logged and,
 * in development mode, the link is handed back so the caller can show it.
 */
export const sendVerificationEmail = async (
  account: Account,
  token: string,
): Promise<DeliveryReport> => {
  const verificationUrl = buildVerificationUrl(token)
  const fallback = (): DeliveryReport =>
    getAppConfig().isDebug
      ? { isDelivered: false, devVerificationUrl: verificationUrl }
      : { isDelivered: false }

  const transport = getTransporter()
  if (!transport) {
    warn({
      message: 'Mail transport not configured; verification email not sent',
      accountId: account.id,
    })
    return fallback()
  }

  try {
    const { text, html } = renderMessage(account, verificationUrl)
    await transport.sendMail({
      from: getMailConfig().from,
      to: account.email,
      subject: 'Verify your account',
      text,
      html,
    })
    log({ message: 'Verification email sent', accountId: account.id })
    return { isDelivered: true }
  } catch (error) {
    warn({
      message: 'Verification email failed; using fallback',
      accountId: account.id,
      error: describeError(error),
    })
    return fallback()
  }
}
