export interface VerificationToken {
  token: string
  accountId: string
  createdAt: Date
}

export type VerificationError = 'invalid_token'
