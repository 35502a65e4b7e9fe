import type { Role } from '../../accounts/roles.ts'

export type AccessError =
  | 'access_denied'
  | 'self_target'
  | 'invalid_role'
  | 'not_found'
  | 'conflict'

/** The parts of an account the policy reads */
export interface Principal {
  id: string
  username: string
  role: Role
  isActive: boolean
}

export interface PolicyRefusal {
  isAllowed: false
  error: Extract<AccessError, 'access_denied' | 'self_target' | 'invalid_role'>
  message: string
}

export type PolicyDecision<T> = { isAllowed: true; value: T } | PolicyRefusal
