/**
 * Authority-facing routes: status changes and the per-authority queue.
 *
 * Callers are trusted; `actor` is whatever identifier they send.
 */

import { Hono } from 'hono'
import { complaintListQuerySchema, statusUpdateRequestSchema } from '@campus-voice/schema'
import type { ApiServices } from '../services/container.js'
import { fail, ok, readJson } from './_api.js'
import { complaintToWire } from './_wire.js'

export function createStatusRoutes(services: Pick<ApiServices, 'workflow' | 'intake'>) {
  const routes = new Hono()

  routes.post('/status/update', async (c) => {
    const parsed = statusUpdateRequestSchema.safeParse(await readJson(c))
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid status update.', 400, parsed.error.flatten())
    }

    const { complaint_id, new_status, actor, reason } = parsed.data
    const result = await services.workflow.updateStatus(complaint_id, new_status, actor, reason)
    return ok(c, result)
  })

  routes.get('/authority/:authorityType/complaints', async (c) => {
    const parsed = complaintListQuerySchema.safeParse(c.req.query())
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid query parameters.', 400, parsed.error.flatten())
    }

    const authorityType = c.req.param('authorityType')
    const { authority, complaints } = await services.intake.listForAuthority(authorityType, parsed.data)
    return ok(c, {
      authority_type: authorityType.trim().toLowerCase(),
      authority: authority.authority,
      authority_email: authority.email,
      department: authority.department,
      complaints: complaints.map(complaintToWire),
      count: complaints.length,
    })
  })

  return routes
}
