import { Hono } from 'hono'
import { describe, expect, it } from 'vitest'
import { securityHeaders } from '../security-headers.ts'

const createTestApp = () => {
  const app = new Hono()
  app.use('*', securityHeaders)
  app.get('/test', (c) => c.json({ ok: true }))
  app.get('/fail', (c) => c.json({ error: 'access_denied' }, 403))
  return app
}

describe('securityHeaders', () => {
  it('should set the standard headers on every response', async () => {
    const app = createTestApp()

    for (const path of ['/test', '/fail']) {
      const res = await app.request(path)

      expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff')
      expect(res.headers.get('X-Frame-Options')).toBe('DENY')
      expect(res.headers.get('Referrer-Policy')).toBe(
        'strict-origin-when-cross-origin',
      )
      expect(res.headers.get('Cache-Control')).toBe('no-store')
    }
  })

  it('should not send HSTS over plain HTTP', async () => {
    const res = await createTestApp().request('/test')

    expect(res.headers.get('Strict-Transport-Security')).toBeNull()
  })

  it('should send HSTS over HTTPS, direct or proxied', async () => {
    const app = createTestApp()

    const direct = await app.request('https://accounts.example.test/test')
    const proxied = await app.request('/test', {
      headers: { 'x-forwarded-proto': 'https' },
    })

    expect(direct.headers.get('Strict-Transport-Security')).toBe(
      'max-age=31536000; includeSubDomains',
    )
    expect(proxied.headers.get('Strict-Transport-Security')).toBe(
      'max-age=31536000; includeSubDomains',
    )
  })
})
