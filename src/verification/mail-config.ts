import { parseBoolean, parseNumber } from '../plumbing/parse-env.ts'

export interface MailConfig {
  host: string
  port: number
  isSecure: boolean
  user: string
  password: string
  from: string
  /** SMTP credentials present; otherwise messages are only logged */
  isConfigured: boolean
}

export const getMailConfig = (): MailConfig => {
  const host = process.env.SMTP_HOST?.trim() || 'smtp.gmail.com'
  const user = process.env.SMTP_USER?.trim() ?? ''
  const password = process.env.SMTP_PASSWORD ?? ''
  const port = parseNumber(process.env.SMTP_PORT, 587)

  return {
    host,
    port,
    // Implicit TLS on 465; STARTTLS is negotiated on other ports
    isSecure: parseBoolean(process.env.SMTP_SECURE, port === 465),
    user,
    password,
    from: process.env.MAIL_FROM?.trim() || 'Accounts <noreply@localhost>',
    isConfigured: user.length > 0 && password.length > 0,
  }
}
