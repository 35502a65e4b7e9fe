import type { Client } from 'cassandra-driver'
import { getDatabaseConfig } from '../../config.ts'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '005',
  name: 'create_accounts_by_email_table',
  description: 'Create accounts_by_email lookup table used to claim unique email addresses',
  up: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${config.keyspace}.accounts_by_email (
        email TEXT,
        account_id UUID,
        PRIMARY KEY (email)
      )
    `)
  },
  down: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`DROP TABLE IF EXISTS ${config.keyspace}.accounts_by_email`)
  },
}
