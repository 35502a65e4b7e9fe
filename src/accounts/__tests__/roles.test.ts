import { describe, expect, it } from 'vitest'
import {
  formatRole,
  getRoleCapabilities,
  isRole,
  ROLES,
  roleFromLegacyFlags,
} from '../roles.ts'

describe('Roles', () => {
  it('should derive capabilities from each role', () => {
    expect(getRoleCapabilities('member')).toEqual({ isStaff: false, isSuperuser: false })
    expect(getRoleCapabilities('moderator')).toEqual({ isStaff: true, isSuperuser: false })
    expect(getRoleCapabilities('admin')).toEqual({ isStaff: true, isSuperuser: true })
  })

  it('should round-trip every role through its flags', () => {
    for (const role of ROLES) {
      expect(roleFromLegacyFlags(getRoleCapabilities(role))).toBe(role)
    }
  })

  it('should treat a superuser without staff as admin', () => {
    expect(roleFromLegacyFlags({ isStaff: false, isSuperuser: true })).toBe('admin')
  })

  it('should only accept known role names', () => {
    expect(isRole('moderator')).toBe(true)
    expect(isRole('Moderator')).toBe(false)
    expect(isRole('owner')).toBe(false)
    expect(isRole(undefined)).toBe(false)
  })

  it('should format role names for messages', () => {
    expect(formatRole('admin')).toBe('Admin')
    expect(formatRole('moderator')).toBe('Moderator')
  })
})
