import { log } from '../plumbing/logger.ts'
import { parseBoolean, parseNumber } from '../plumbing/parse-env.ts'
import type { AppConfig } from './types/app-config.ts'

// Only ever used outside production; production refuses to start without SESSION_SECRET
const DEVELOPMENT_SESSION_SECRET = 'development-session-secret'

let cachedConfig: AppConfig | null = null

const validateConfig = (config: AppConfig, isProduction: boolean): void => {
  const errors: string[] = []

  if (!config.publicBaseUrl.match(/^https?:\/\//)) {
    errors.push('PUBLIC_BASE_URL must be a valid URL (http:// or https://)')
  }

  if (isProduction && config.sessionSecret === DEVELOPMENT_SESSION_SECRET) {
    errors.push('SESSION_SECRET must be set in production')
  }

  if (config.sessionMaxAgeSeconds <= 0) {
    errors.push('SESSION_MAX_AGE_SECONDS must be positive')
  }

  if (errors.length > 0) {
    throw new Error(`App configuration validation failed:\n${errors.join('\n')}`)
  }
}

export const getAppConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig
  }

  const isProduction = process.env.NODE_ENV === 'production'
  const port = parseNumber(process.env.PORT, 3000)
  const publicBaseUrl = (
    process.env.PUBLIC_BASE_URL?.trim() || `http://localhost:${port}`
  ).replace(/\/+$/, '')

  const config: AppConfig = {
    port,
    publicBaseUrl,
    isDebug: parseBoolean(process.env.APP_DEBUG, !isProduction),
    sessionSecret: process.env.SESSION_SECRET?.trim() || DEVELOPMENT_SESSION_SECRET,
    sessionMaxAgeSeconds: parseNumber(process.env.SESSION_MAX_AGE_SECONDS, 8 * 60 * 60),
  }

  validateConfig(config, isProduction)
  cachedConfig = config

  log('App configuration validated and loaded')

  return config
}

export const clearAppConfigCache = (): void => {
  cachedConfig = null
}
