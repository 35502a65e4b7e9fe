import type { Client } from 'cassandra-driver'
import { getDatabaseConfig } from '../../config.ts'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '003',
  name: 'create_accounts_table',
  description: 'Create accounts table holding credentials, verification state and role',
  up: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${config.keyspace}.accounts (
        account_id UUID,
        username TEXT,
        email TEXT,
        password_digest TEXT,
        password_salt TEXT,
        role TEXT,
        is_staff BOOLEAN,
        is_superuser BOOLEAN,
        is_verified BOOLEAN,
        is_active BOOLEAN,
        date_joined TIMESTAMP,
        last_login_at TIMESTAMP,
        PRIMARY KEY (account_id)
      )
    `)
  },
  down: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`DROP TABLE IF EXISTS ${config.keyspace}.accounts`)
  },
}
