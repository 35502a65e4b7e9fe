import { getDatabaseClient } from '../client.ts'
import { getMigrationHistory } from './runner.ts'
import type { Migration, MigrationStatus } from './types.ts'

export const getMigrationStatus = async (
  migrations: Migration[],
): Promise<MigrationStatus[]> => {
  const history = await getMigrationHistory(getDatabaseClient())
  const byVersion = new Map(history.map((row) => [row.version, row]))

  return migrations.map((migration) => {
    const row = byVersion.get(migration.version)
    return {
      version: migration.version,
      name: migration.name,
      applied: row !== undefined && row.rolledBackAt == null,
      appliedAt: row?.appliedAt ?? undefined,
      rolledBackAt: row?.rolledBackAt ?? undefined,
    }
  })
}
