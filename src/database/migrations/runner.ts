import type { Client } from 'cassandra-driver'
import { describeError, log } from '../../plumbing/logger.ts'
import { getDatabaseClient } from '../client.ts'
import { getDatabaseConfig } from '../config.ts'
import type { Migration } from './types.ts'

export const ensureMigrationHistory = async (client: Client): Promise<void> => {
  const config = getDatabaseConfig()

  await client.execute(`
    CREATE KEYSPACE IF NOT EXISTS ${config.keyspace}
    WITH REPLICATION = {
      'class': 'SimpleStrategy',
      'replication_factor': 1
    }
  `)

  await client.execute(`
    CREATE TABLE IF NOT EXISTS ${config.keyspace}.migration_history (
      version TEXT PRIMARY KEY,
      name TEXT,
      description TEXT,
      applied_at TIMESTAMP,
      rolled_back_at TIMESTAMP
    )
  `)
}

export interface MigrationHistoryRow {
  version: string
  appliedAt: Date | null
  rolledBackAt: Date | null
}

export const getMigrationHistory = async (
  client: Client,
): Promise<MigrationHistoryRow[]> => {
  const config = getDatabaseConfig()
  const result = await client.execute(
    `SELECT version, applied_at, rolled_back_at FROM ${config.keyspace}.migration_history`,
  )
  return result.rows.map((row) => ({
    version: row.version as string,
    appliedAt: (row.applied_at as Date | null) ?? null,
    rolledBackAt: (row.rolled_back_at as Date | null) ?? null,
  }))
}

export const getAppliedMigrations = async (
  client: Client,
): Promise<string[]> => {
  // CQL has no IS NULL filter, so rolled-back rows are dropped here
  const history = await getMigrationHistory(client)
  return history
    .filter((row) => row.rolledBackAt == null)
    .map((row) => row.version)
}

export const recordMigration = async (
  client: Client,
  migration: Migration,
  action: 'up' | 'down',
): Promise<void> => {
  const config = getDatabaseConfig()
  const now = new Date()

  if (action === 'up') {
    await client.execute(
      `INSERT INTO ${config.keyspace}.migration_history (version, name, description, applied_at, rolled_back_at)
       VALUES (?, ?, ?, ?, ?)`,
      [migration.version, migration.name, migration.description, now, null],
      { prepare: true },
    )
  } else {
    await client.execute(
      `UPDATE ${config.keyspace}.migration_history
       SET rolled_back_at = ?
       WHERE version = ?`,
      [now, migration.version],
      { prepare: true },
    )
  }
}

const applyMigration = async (
  client: Client,
  migration: Migration,
  direction: 'up' | 'down',
): Promise<void> => {
  log({
    message: direction === 'up' ? 'Running migration' : 'Rolling back migration',
    version: migration.version,
    name: migration.name,
  })

  try {
    await migration[direction](client)
    await recordMigration(client, migration, direction)
    log({
      message:
        direction === 'up' ? 'Migration completed' : 'Migration rolled back',
      version: migration.version,
    })
  } catch (error) {
    log({
      message:
        direction === 'up' ? 'Migration failed' : 'Migration rollback failed',
      version: migration.version,
      error: describeError(error),
    })
    throw error
  }
}

export const runMigrations = async (
  migrations: Migration[],
  direction: 'up' | 'down' = 'up',
): Promise<void> => {
  const client = getDatabaseClient()

  await ensureMigrationHistory(client)
  const appliedMigrations = await getAppliedMigrations(client)

  if (direction === 'up') {
    const pending = migrations
      .filter((m) => !appliedMigrations.includes(m.version))
      .sort((a, b) => a.version.localeCompare(b.version))

    for (const migration of pending) {
      await applyMigration(client, migration, 'up')
    }
    return
  }

  // Rollback only the most recent applied migration
  const [lastMigration] = migrations
    .filter((m) => appliedMigrations.includes(m.version))
    .sort((a, b) => b.version.localeCompare(a.version))

  if (!lastMigration) {
    log('No migrations to rollback')
    return
  }

  await applyMigration(client, lastMigration, 'down')
}
