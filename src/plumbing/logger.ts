import info from '../../package.json' with { type: 'json' }

const { name, version } = info

type LogField = string | number | boolean | object

export type LogInput = string | { message: string; [key: string]: LogField }

interface LogEntry {
  message: string
  level: 'info' | 'warn'
  app: string
  version: string
  [key: string]: LogField
}

const toEntry = (input: LogInput, level: LogEntry['level']): LogEntry => {
  if (typeof input === 'string') {
    return { message: input, level, app: name, version }
  }
  return { ...input, level, app: name, version }
}

export const log = (message: LogInput): void => {
  console.log(toEntry(message, 'info'))
}

/**
 * Recoverable problems the caller has already handled (e.g. a mail transport
 * failure). Goes to stderr so it can be routed separately.
 */
export const warn = (message: LogInput): void => {
  console.warn(toEntry(message, 'warn'))
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
