import { migration as migration001 } from './migrations/001-create-keyspace.ts'
import { migration as migration002 } from './migrations/002-create-migration-history.ts'
import { migration as migration003 } from './migrations/003-create-accounts-table.ts'
import { migration as migration004 } from './migrations/004-create-accounts-by-username-table.ts'
import { migration as migration005 } from './migrations/005-create-accounts-by-email-table.ts'
import { migration as migration006 } from './migrations/006-create-verification-tokens-table.ts'
import { migration as migration007 } from './migrations/007-create-verification-tokens-by-account-table.ts'
import { migration as migration008 } from './migrations/008-backfill-account-roles.ts'
import type { Migration } from './types.ts'

export const loadMigrations = (): Migration[] => {
  return [
    migration001,
    migration002,
    migration003,
    migration004,
    migration005,
    migration006,
    migration007,
    migration008,
  ].sort((a, b) => a.version.localeCompare(b.version))
}
