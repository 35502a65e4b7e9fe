import 'dotenv/config'
import { serve } from '@hono/node-server'
import { createApp } from './app.ts'
import { getAppConfig } from './config/config.ts'
import { initializeDatabase, shutdownDatabase } from './database/client.ts'
import { describeError, log } from './plumbing/logger.ts'

const start = async (): Promise<void> => {
  const config = getAppConfig()
  await initializeDatabase()

  if (!process.env.PORT) {
    log(`process.env.PORT is undefined - defaulting to ${config.port}`)
  }

  const server = serve({ fetch: createApp().fetch, port: config.port }, (address) => {
    log(`Account service listening at http://localhost:${address.port}`)
  })

  const stop = (signal: string): void => {
    log(`Received ${signal}, shutting down`)
    server.close()
    shutdownDatabase().catch((error: unknown) => {
      log({ message: 'Shutdown failed', error: describeError(error) })
    })
  }
  process.once('SIGINT', () => stop('SIGINT'))
  process.once('SIGTERM', () => stop('SIGTERM'))
}

start().catch((error: unknown) => {
  console.error('Failed to start server:', error)
  process.exitCode = 1
})
