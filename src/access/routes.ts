import type { Context } from 'hono'
import { Hono } from 'hono'
import { formatRole } from '../accounts/roles.ts'
import { serializeAccount } from '../accounts/serialize.ts'
import { requireSession, requireStaff } from '../middleware/require-session.ts'
import { readRequestFields } from '../plumbing/request-body.ts'
import {
  type AccessFailure,
  changeAccountRole,
  listAccountsForStaff,
  toggleAccountActive,
} from './service.ts'
import type { AccessError } from './types/access.ts'

const STATUS_BY_ERROR: Record<AccessError, 400 | 403 | 404 | 409> = {
  access_denied: 403,
  self_target: 400,
  invalid_role: 400,
  not_found: 404,
  conflict: 409,
}

const respondWithFailure = (c: Context, failure: AccessFailure) =>
  c.json(
    { error: failure.error, error_description: failure.message },
    STATUS_BY_ERROR[failure.error],
  )

const admin = new Hono()

admin.use('*', requireSession, requireStaff)

/**
 * GET /admin/accounts
 * All accounts, oldest first
 */
admin.get('/accounts', async (c) => {
  const result = await listAccountsForStaff(c.get('account').id)
  if (!result.isSuccess) {
    return respondWithFailure(c, result.error)
  }
  return c.json({ accounts: result.data.map(serializeAccount) })
})

/**
 * POST /admin/accounts/:id/toggle-active
 */
admin.post('/accounts/:id/toggle-active', async (c) => {
  const actor = c.get('account')
  const result = await toggleAccountActive(actor.id, c.req.param('id'))
  if (!result.isSuccess) {
    return respondWithFailure(c, result.error)
  }

  const { target, value: isActive } = result.data
  return c.json({
    id: target.id,
    isActive,
    message: `'${target.username}' has been ${isActive ? 'activated' : 'deactivated'}.`,
  })
})

/**
 * POST /admin/accounts/:id/role
 * Body: { role: 'member' | 'moderator' | 'admin' }
 */
admin.post('/accounts/:id/role', async (c) => {
  const actor = c.get('account')
  const body = await readRequestFields(c)
  const result = await changeAccountRole(actor.id, c.req.param('id'), body.role ?? '')
  if (!result.isSuccess) {
    return respondWithFailure(c, result.error)
  }

  const { target, value: role } = result.data
  return c.json({
    id: target.id,
    role,
    message: `'${target.username}' is now a ${formatRole(role)}.`,
  })
})

export default admin
