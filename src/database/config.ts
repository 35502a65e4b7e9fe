import { parseBoolean, parseNumber } from '../plumbing/parse-env.ts'
import type { DatabaseConfig } from './types/database-config.ts'

export const getDatabaseConfig = (): DatabaseConfig => {
  const rawHosts = process.env.SCYLLA_HOSTS || 'localhost'
  const hosts = rawHosts
    .split(',')
    .map((host) => host.trim())
    .filter((host) => host.length > 0)

  return {
    hosts,
    port: parseNumber(process.env.SCYLLA_PORT, 9042),
    keyspace: process.env.SCYLLA_KEYSPACE || 'account_authority',
    localDataCenter: process.env.SCYLLA_LOCAL_DATACENTER || 'datacenter1',
    username: process.env.SCYLLA_USERNAME,
    password: process.env.SCYLLA_PASSWORD,
    isSslEnabled: parseBoolean(process.env.SCYLLA_SSL, false),
    connectTimeoutMs: parseNumber(process.env.SCYLLA_CONNECT_TIMEOUT_MS, 10_000),
    connectRetries: parseNumber(process.env.SCYLLA_CONNECT_RETRIES, 3),
    connectRetryDelayMs: parseNumber(
      process.env.SCYLLA_CONNECT_RETRY_DELAY_MS,
      1_000,
    ),
  }
}
