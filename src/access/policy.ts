import { formatRole, getRoleCapabilities, isRole, type Role } from '../accounts/roles.ts'
import type { PolicyDecision, Principal } from './types/access.ts'

const allow = <T>(value: T): PolicyDecision<T> => ({ isAllowed: true, value })

/**
 * Gate for every administrative operation: the actor must be active and hold a staff role.
 */
export const checkStaffAccess = (actor: Principal): PolicyDecision<Principal> => {
  if (!actor.isActive || !getRoleCapabilities(actor.role).isStaff) {
    return {
      isAllowed: false,
      error: 'access_denied',
      message: 'Staff access is required.',
    }
  }
  return allow(actor)
}

/**
 * Rules, in order:
 * 1. nobody acts on their own account
 * 2. moderators only manage members
 * 3. admins cannot deactivate other admins
 * Otherwise the target's active flag flips; the decision carries the new value.
 */
export const checkToggleActive = (
  actor: Principal,
  target: Principal,
): PolicyDecision<boolean> => {
  const staff = checkStaffAccess(actor)
  if (!staff.isAllowed) {
    return staff
  }

  if (target.id === actor.id) {
    return {
      isAllowed: false,
      error: 'self_target',
      message: 'You cannot deactivate your own account.',
    }
  }

  if (actor.role === 'moderator' && target.role !== 'member') {
    return {
      isAllowed: false,
      error: 'access_denied',
      message: `Moderators cannot activate/deactivate ${formatRole(target.role)}s.`,
    }
  }

  if (actor.role === 'admin' && target.role === 'admin') {
    return {
      isAllowed: false,
      error: 'access_denied',
      message: 'Admins cannot deactivate other Admins.',
    }
  }

  return allow(!target.isActive)
}

/**
 * Only active admins change roles. Needs no target, so a refusal here never
 * depends on whether the target exists.
 */
export const checkRoleAuthority = (actor: Principal): PolicyDecision<Principal> => {
  const staff = checkStaffAccess(actor)
  if (!staff.isAllowed) {
    return staff
  }

  if (actor.role !== 'admin') {
    return {
      isAllowed: false,
      error: 'access_denied',
      message: 'Only Admins can change user roles.',
    }
  }

  return allow(actor)
}

/**
 * Rules, in order:
 * 1. only admins change roles
 * 2. nobody changes their own role
 * 3. an admin's role is never changed
 * 4. the requested role must exist
 * Nothing here stops an admin from moving a moderator back to member.
 */
export const checkChangeRole = (
  actor: Principal,
  target: Principal,
  requestedRole: unknown,
): PolicyDecision<Role> => {
  const authority = checkRoleAuthority(actor)
  if (!authority.isAllowed) {
    return authority
  }

  if (target.id === actor.id) {
    return {
      isAllowed: false,
      error: 'self_target',
      message: 'You cannot change your own role.',
    }
  }

  if (target.role === 'admin') {
    return {
      isAllowed: false,
      error: 'access_denied',
      message: `'${target.username}' is an Admin and cannot be modified.`,
    }
  }

  const role = typeof requestedRole === 'string' ? requestedRole.trim() : requestedRole
  if (!isRole(role)) {
    return {
      isAllowed: false,
      error: 'invalid_role',
      message: 'Invalid role selected.',
    }
  }

  return allow(role)
}
