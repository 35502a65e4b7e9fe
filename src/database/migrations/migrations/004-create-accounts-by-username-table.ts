import type { Client } from 'cassandra-driver'
import { getDatabaseConfig } from '../../config.ts'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '004',
  name: 'create_accounts_by_username_table',
  description: 'Create accounts_by_username lookup table used to claim unique usernames',
  up: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${config.keyspace}.accounts_by_username (
        username TEXT,
        account_id UUID,
        PRIMARY KEY (username)
      )
    `)
  },
  down: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`DROP TABLE IF EXISTS ${config.keyspace}.accounts_by_username`)
  },
}
