import type { Client } from 'cassandra-driver'
import { getDatabaseConfig } from '../../config.ts'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '007',
  name: 'create_verification_tokens_by_account_table',
  description: 'Create verification_tokens_by_account lookup table so reissue can find the previous token',
  up: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${config.keyspace}.verification_tokens_by_account (
        account_id UUID,
        token TEXT,
        created_at TIMESTAMP,
        PRIMARY KEY (account_id, token)
      )
    `)
  },
  down: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`DROP TABLE IF EXISTS ${config.keyspace}.verification_tokens_by_account`)
  },
}
