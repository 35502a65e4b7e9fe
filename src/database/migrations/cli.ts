#!/usr/bin/env node
import 'dotenv/config'
import { initializeDatabase, shutdownDatabase } from '../client.ts'
import { loadMigrations } from './loader.ts'
import { runMigrations } from './runner.ts'
import { getMigrationStatus } from './status.ts'

const command = process.argv[2]

const main = async (): Promise<number> => {
  try {
    // Connect without keyspace so the first migration can create it
    await initializeDatabase({ skipKeyspace: true })

    const migrations = loadMigrations()

    switch (command) {
      case 'up': {
        await runMigrations(migrations, 'up')
        console.log('Migrations applied successfully')
        return 0
      }
      case 'down': {
        await runMigrations(migrations, 'down')
        console.log('Migration rolled back successfully')
        return 0
      }
      case 'status': {
        const status = await getMigrationStatus(migrations)
        console.table(
          status.map((s) => ({
            version: s.version,
            name: s.name,
            applied: s.applied ? '✓' : '✗',
            appliedAt: s.appliedAt?.toISOString() ?? '-',
            rolledBackAt: s.rolledBackAt?.toISOString() ?? '-',
          })),
        )
        return 0
      }
      default: {
        console.log('Usage: migrate [up|down|status]')
        console.log('  up     - Apply pending migrations')
        console.log('  down   - Rollback last migration')
        console.log('  status - Show migration status')
        return 1
      }
    }
  } catch (error) {
    console.error('Migration error:', error)
    return 1
  } finally {
    await shutdownDatabase()
  }
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error)
    process.exitCode = 1
  })
