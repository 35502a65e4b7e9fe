import type { Client } from 'cassandra-driver'
import { roleFromLegacyFlags } from '../../../accounts/roles.ts'
import { getDatabaseConfig } from '../../config.ts'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '008',
  name: 'backfill_account_roles',
  description:
    'Set role on accounts created before roles existed, from their staff and superuser flags',
  up: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    const result = await client.execute(
      `SELECT account_id, role, is_staff, is_superuser FROM ${config.keyspace}.accounts`,
    )

    for (const row of result.rows) {
      if (row.role != null) {
        continue
      }
      const role = roleFromLegacyFlags({
        isStaff: row.is_staff === true,
        isSuperuser: row.is_superuser === true,
      })
      await client.execute(
        `UPDATE ${config.keyspace}.accounts SET role = ? WHERE account_id = ?`,
        [role, row.account_id],
        { prepare: true },
      )
    }
  },
  down: async (client: Client): Promise<void> => {
    // Roles are not cleared; resetting everyone to member matches the pre-role state
    const config = getDatabaseConfig()
    const result = await client.execute(
      `SELECT account_id FROM ${config.keyspace}.accounts`,
    )
    for (const row of result.rows) {
      await client.execute(
        `UPDATE ${config.keyspace}.accounts SET role = ? WHERE account_id = ?`,
        ['member', row.account_id],
        { prepare: true },
      )
    }
  },
}
