import type { Role } from '../accounts/roles.ts'
import {
  findAccountById,
  listAccounts,
  updateAccountActive,
  updateAccountRole,
} from '../accounts/storage.ts'
import type { Account } from '../accounts/types/account.ts'
import { fail, type Outcome, succeed } from '../plumbing/outcome.ts'
import { type AccessDeniedEvent, logSecurityEvent } from '../plumbing/security-log.ts'
import {
  checkChangeRole,
  checkRoleAuthority,
  checkStaffAccess,
  checkToggleActive,
} from './policy.ts'
import type { AccessError, PolicyRefusal } from './types/access.ts'

export interface AccessFailure {
  error: AccessError
  message: string
}

/** The target as written, and the value that changed */
export interface TargetUpdate<T> {
  target: Account
  value: T
}

const NOT_FOUND: AccessFailure = {
  error: 'not_found',
  message: 'Account not found.',
}

const CONFLICT: AccessFailure = {
  error: 'conflict',
  message: 'The account changed while the request was processed. Try again.',
}

const refuse = (
  decision: PolicyRefusal,
  event: Omit<AccessDeniedEvent, 'event' | 'reason'>,
): Outcome<never, AccessFailure> => {
  logSecurityEvent({ event: 'access_denied', reason: decision.error, ...event })
  return fail({ error: decision.error, message: decision.message })
}

const findTarget = async (actor: Account, targetId: string): Promise<Account | null> =>
  actor.id === targetId ? actor : await findAccountById(targetId)

/**
 * Flip another account's active state, subject to the toggle rule table.
 * The actor's own standing is checked before the target is looked up.
 */
export const toggleAccountActive = async (
  actorId: string,
  targetId: string,
): Promise<Outcome<TargetUpdate<boolean>, AccessFailure>> => {
  const actor = await findAccountById(actorId)
  if (!actor) {
    return fail(NOT_FOUND)
  }

  const staff = checkStaffAccess(actor)
  if (!staff.isAllowed) {
    return refuse(staff, {
      actor_id: actor.id,
      target_id: targetId,
      operation: 'toggle_active',
    })
  }

  const target = await findTarget(actor, targetId)
  if (!target) {
    return fail(NOT_FOUND)
  }

  const decision = checkToggleActive(actor, target)
  if (!decision.isAllowed) {
    return refuse(decision, {
      actor_id: actor.id,
      target_id: target.id,
      operation: 'toggle_active',
    })
  }

  const isApplied = await updateAccountActive(target.id, target.isActive, decision.value)
  if (!isApplied) {
    return fail(CONFLICT)
  }

  logSecurityEvent({
    event: 'account_access_changed',
    actor_id: actor.id,
    target_id: target.id,
    is_active: decision.value,
  })
  return succeed({
    target: { ...target, isActive: decision.value },
    value: decision.value,
  })
}

/**
 * Set another account's role, subject to the role rule table.
 * A non-admin actor is refused whatever the target id; the staff and
 * superuser flags are rewritten from the role in the same write.
 */
export const changeAccountRole = async (
  actorId: string,
  targetId: string,
  requestedRole: unknown,
): Promise<Outcome<TargetUpdate<Role>, AccessFailure>> => {
  const actor = await findAccountById(actorId)
  if (!actor) {
    return fail(NOT_FOUND)
  }

  const authority = checkRoleAuthority(actor)
  if (!authority.isAllowed) {
    return refuse(authority, {
      actor_id: actor.id,
      target_id: targetId,
      operation: 'change_role',
    })
  }

  const target = await findTarget(actor, targetId)
  if (!target) {
    return fail(NOT_FOUND)
  }

  const decision = checkChangeRole(actor, target, requestedRole)
  if (!decision.isAllowed) {
    return refuse(decision, {
      actor_id: actor.id,
      target_id: target.id,
      operation: 'change_role',
    })
  }

  const isApplied = await updateAccountRole(target.id, target.role, decision.value)
  if (!isApplied) {
    return fail(CONFLICT)
  }

  logSecurityEvent({
    event: 'account_role_changed',
    actor_id: actor.id,
    target_id: target.id,
    previous_role: target.role,
    role: decision.value,
  })
  return succeed({
    target: { ...target, role: decision.value },
    value: decision.value,
  })
}

/**
 * Every account, oldest first, for the staff dashboard.
 */
export const listAccountsForStaff = async (
  actorId: string,
): Promise<Outcome<Account[], AccessFailure>> => {
  const actor = await findAccountById(actorId)
  if (!actor) {
    return fail(NOT_FOUND)
  }

  const decision = checkStaffAccess(actor)
  if (!decision.isAllowed) {
    return refuse(decision, { actor_id: actor.id, operation: 'list_accounts' })
  }

  return succeed(await listAccounts())
}
