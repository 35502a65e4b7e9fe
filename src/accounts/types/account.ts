import type { Role } from '../roles.ts'

export interface Account {
  id: string
  username: string
  email: string
  isVerified: boolean
  isActive: boolean
  role: Role
  dateJoined: Date
  lastLoginAt?: Date
}

export interface AccountWithPassword extends Account {
  passwordDigest: string
  passwordSalt: string
}

export interface AccountRegistrationInput {
  username: string
  email: string
  password: string
  passwordConfirmation: string
}

export interface AccountLoginInput {
  username: string
  password: string
}

export type RegistrationError =
  | 'invalid_username'
  | 'invalid_email'
  | 'password_mismatch'
  | 'weak_password'
  | 'duplicate_username'
  | 'duplicate_email'

export type LoginError = 'bad_credentials' | 'unverified' | 'inactive'
