export const ROLES = ['member', 'moderator', 'admin'] as const

export type Role = (typeof ROLES)[number]

export interface RoleCapabilities {
  isStaff: boolean
  isSuperuser: boolean
}

const CAPABILITIES: Record<Role, RoleCapabilities> = {
  member: { isStaff: false, isSuperuser: false },
  moderator: { isStaff: true, isSuperuser: false },
  admin: { isStaff: true, isSuperuser: true },
}

export const isRole = (value: unknown): value is Role =>
  ROLES.some((role) => role === value)

/**
 * Staff and superuser flags are never read for decisions; they are derived
 * here and written next to the role so external readers see a consistent row.
 */
export const getRoleCapabilities = (role: Role): RoleCapabilities => ({
  ...CAPABILITIES[role],
})

/**
 * Role for rows written before roles existed, which only carry the flags.
 */
export const roleFromLegacyFlags = (flags: RoleCapabilities): Role => {
  if (flags.isSuperuser) return 'admin'
  if (flags.isStaff) return 'moderator'
  return 'member'
}

export const formatRole = (role: Role): string =>
  role.charAt(0).toUpperCase() + role.slice(1)
