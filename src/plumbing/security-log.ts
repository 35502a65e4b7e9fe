/**
 * Security and audit logging.
 * Logs authentication, verification and administrative events.
 * Never logs passwords, tokens, or secrets.
 */

import type { Role } from '../accounts/roles.ts'
import { log } from './logger.ts'

export interface AuthSuccessEvent {
  event: 'auth_success'
  account_id: string
}

export interface AuthFailureEvent {
  event: 'auth_failure'
  reason: 'bad_credentials' | 'unverified' | 'inactive'
  account_id?: string
}

export interface EmailVerifiedEvent {
  event: 'email_verified'
  account_id: string
}

export interface AccountAccessChangedEvent {
  event: 'account_access_changed'
  actor_id: string
  target_id: string
  is_active: boolean
}

export interface AccountRoleChangedEvent {
  event: 'account_role_changed'
  actor_id: string
  target_id: string
  previous_role: Role
  role: Role
}

export interface AccessDeniedEvent {
  event: 'access_denied'
  actor_id: string
  target_id?: string
  operation: 'toggle_active' | 'change_role' | 'list_accounts'
  reason: string
}

export type SecurityEvent =
  | AuthSuccessEvent
  | AuthFailureEvent
  | EmailVerifiedEvent
  | AccountAccessChangedEvent
  | AccountRoleChangedEvent
  | AccessDeniedEvent

export const logSecurityEvent = (event: SecurityEvent): void => {
  log({
    message: 'Security event',
    security_event: event,
  })
}
