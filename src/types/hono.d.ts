import type { Account } from '../accounts/types/account.ts'

declare module 'hono' {
  interface ContextVariableMap {
    account: Account
  }
}

export {}
