import { Hono } from 'hono'
import info from '../package.json' with { type: 'json' }
import admin from './access/routes.ts'
import accounts from './accounts/routes.ts'
import { checkDatabaseHealth } from './database/health.ts'
import { httpsEnforcement } from './middleware/https-enforcement.ts'
import { securityHeaders } from './middleware/security-headers.ts'
import { describeError, log } from './plumbing/logger.ts'

const { name, version } = info

export const createApp = (): Hono => {
  const app = new Hono()

  app.use('*', securityHeaders)
  app.use('*', httpsEnforcement)

  app.get('/', (c) => c.json({ message: `${name} is running` }))

  app.get('/about', (c) => c.json({ name, version }))

  app.get('/health', async (c) => {
    const database = await checkDatabaseHealth()
    return c.json({ database }, database.isHealthy ? 200 : 503)
  })

  app.route('/', accounts)
  app.route('/admin', admin)

  app.notFound((c) =>
    c.json({ error: 'not_found', error_description: 'Not found.' }, 404),
  )

  app.onError((error, c) => {
    log({
      message: 'Unhandled request error',
      method: c.req.method,
      path: c.req.path,
      error: describeError(error),
    })
    return c.json(
      { error: 'server_error', error_description: 'Something went wrong.' },
      500,
    )
  })

  return app
}
