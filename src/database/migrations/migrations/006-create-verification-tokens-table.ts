import type { Client } from 'cassandra-driver'
import { getDatabaseConfig } from '../../config.ts'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '006',
  name: 'create_verification_tokens_table',
  description: 'Create verification_tokens table for single-use email verification tokens',
  up: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${config.keyspace}.verification_tokens (
        token TEXT,
        account_id UUID,
        created_at TIMESTAMP,
        PRIMARY KEY (token)
      )
    `)
  },
  down: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`DROP TABLE IF EXISTS ${config.keyspace}.verification_tokens`)
  },
}
