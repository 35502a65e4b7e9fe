import { describe, expect, it } from 'vitest'
import type { Role } from '../../accounts/roles.ts'
import {
  checkChangeRole,
  checkRoleAuthority,
  checkStaffAccess,
  checkToggleActive,
} from '../policy.ts'
import type { Principal } from '../types/access.ts'

const principal = (id: string, role: Role, isActive = true): Principal => ({
  id,
  username: id,
  role,
  isActive,
})

const admin = principal('admin-1', 'admin')
const otherAdmin = principal('admin-2', 'admin')
const moderator = principal('mod-1', 'moderator')
const otherModerator = principal('mod-2', 'moderator')
const member = principal('member-1', 'member')

describe('checkStaffAccess', () => {
  it('should admit active moderators and admins', () => {
    expect(checkStaffAccess(admin).isAllowed).toBe(true)
    expect(checkStaffAccess(moderator).isAllowed).toBe(true)
  })

  it('should deny members', () => {
    expect(checkStaffAccess(member)).toEqual({
      isAllowed: false,
      error: 'access_denied',
      message: 'Staff access is required.',
    })
  })

  it('should deny deactivated staff', () => {
    const decision = checkStaffAccess(principal('mod-3', 'moderator', false))
    expect(decision.isAllowed).toBe(false)
  })
})

describe('checkToggleActive', () => {
  it('should refuse to act on the actor itself', () => {
    expect(checkToggleActive(admin, admin)).toEqual({
      isAllowed: false,
      error: 'self_target',
      message: 'You cannot deactivate your own account.',
    })
  })

  it('should let a moderator deactivate and reactivate a member', () => {
    expect(checkToggleActive(moderator, member)).toEqual({
      isAllowed: true,
      value: false,
    })
    expect(
      checkToggleActive(moderator, principal('member-2', 'member', false)),
    ).toEqual({ isAllowed: true, value: true })
  })

  it('should stop a moderator from touching an admin', () => {
    expect(checkToggleActive(moderator, admin)).toEqual({
      isAllowed: false,
      error: 'access_denied',
      message: 'Moderators cannot activate/deactivate Admins.',
    })
  })

  it('should stop a moderator from touching another moderator', () => {
    expect(checkToggleActive(moderator, otherModerator)).toEqual({
      isAllowed: false,
      error: 'access_denied',
      message: 'Moderators cannot activate/deactivate Moderators.',
    })
  })

  it('should stop an admin from deactivating another admin', () => {
    expect(checkToggleActive(admin, otherAdmin)).toEqual({
      isAllowed: false,
      error: 'access_denied',
      message: 'Admins cannot deactivate other Admins.',
    })
  })

  it('should let an admin toggle moderators and members', () => {
    expect(checkToggleActive(admin, moderator)).toEqual({
      isAllowed: true,
      value: false,
    })
    expect(checkToggleActive(admin, member)).toEqual({
      isAllowed: true,
      value: false,
    })
  })

  it('should deny members and deactivated staff before any other rule', () => {
    expect(checkToggleActive(member, member).isAllowed).toBe(false)
    const inactiveAdmin = principal('admin-3', 'admin', false)
    expect(checkToggleActive(inactiveAdmin, member)).toMatchObject({
      isAllowed: false,
      error: 'access_denied',
    })
  })
})

describe('checkRoleAuthority', () => {
  it('should admit active admins only', () => {
    expect(checkRoleAuthority(admin)).toEqual({ isAllowed: true, value: admin })
    expect(checkRoleAuthority(moderator)).toEqual({
      isAllowed: false,
      error: 'access_denied',
      message: 'Only Admins can change user roles.',
    })
    expect(checkRoleAuthority(member)).toEqual({
      isAllowed: false,
      error: 'access_denied',
      message: 'Staff access is required.',
    })
    expect(checkRoleAuthority(principal('admin-3', 'admin', false)).isAllowed).toBe(
      false,
    )
  })
})

describe('checkChangeRole', () => {
  it('should only let admins change roles', () => {
    expect(checkChangeRole(moderator, member, 'moderator')).toEqual({
      isAllowed: false,
      error: 'access_denied',
      message: 'Only Admins can change user roles.',
    })
  })

  it('should refuse to change the actor own role', () => {
    expect(checkChangeRole(admin, admin, 'member')).toEqual({
      isAllowed: false,
      error: 'self_target',
      message: 'You cannot change your own role.',
    })
  })

  it('should never modify an admin', () => {
    expect(checkChangeRole(admin, otherAdmin, 'member')).toEqual({
      isAllowed: false,
      error: 'access_denied',
      message: "'admin-2' is an Admin and cannot be modified.",
    })
  })

  it('should reject unknown roles', () => {
    for (const requested of ['superuser', '', 'Admin', 42, null]) {
      expect(checkChangeRole(admin, member, requested)).toEqual({
        isAllowed: false,
        error: 'invalid_role',
        message: 'Invalid role selected.',
      })
    }
  })

  it('should allow promotion, demotion and trimmed input', () => {
    expect(checkChangeRole(admin, member, 'moderator')).toEqual({
      isAllowed: true,
      value: 'moderator',
    })
    expect(checkChangeRole(admin, moderator, 'member')).toEqual({
      isAllowed: true,
      value: 'member',
    })
    expect(checkChangeRole(admin, member, ' admin ')).toEqual({
      isAllowed: true,
      value: 'admin',
    })
  })

  it('should check the admin rule before the role value', () => {
    expect(checkChangeRole(moderator, member, 'nonsense')).toMatchObject({
      error: 'access_denied',
    })
    expect(checkChangeRole(admin, otherAdmin, 'nonsense')).toMatchObject({
      error: 'access_denied',
    })
  })
})
