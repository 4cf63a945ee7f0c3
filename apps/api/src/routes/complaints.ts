/**
 * Complaint routes: submission, feeds, detail, audit trail and on-demand
 * priority recalculation.
 *
 * Static paths (`/public`, `/mine`) are registered before `/:complaintId`.
 */

import { Hono } from 'hono'
import { z } from 'zod'
import { complaintListQuerySchema, complaintSubmissionSchema } from '@campus-voice/schema'
import type { ApiServices } from '../services/container.js'
import { fail, ok, readJson } from './_api.js'
import { complaintToWire, statusChangeToWire } from './_wire.js'

const mineQuerySchema = complaintListQuerySchema.extend({
  identifier: z.string().trim().min(1).max(40),
})

function clientAddress(forwardedFor: string | undefined, realIp: string | undefined) {
  const first = forwardedFor?.split(',')[0]?.trim()
  return first || realIp || null
}

export function createComplaintRoutes(services: Pick<ApiServices, 'intake' | 'ledger' | 'workflow'>) {
  const routes = new Hono()

  routes.post('/complaints', async (c) => {
    const parsed = complaintSubmissionSchema.safeParse(await readJson(c))
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid complaint submission.', 400, parsed.error.flatten())
    }

    const result = await services.intake.submit(parsed.data, {
      userAgent: c.req.header('user-agent') ?? null,
      clientAddress: clientAddress(c.req.header('x-forwarded-for'), c.req.header('x-real-ip')),
    })
    return ok(c, result, 201)
  })

  routes.get('/complaints/public', async (c) => {
    const parsed = complaintListQuerySchema.safeParse(c.req.query())
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid query parameters.', 400, parsed.error.flatten())
    }

    const complaints = await services.intake.listPublic(parsed.data)
    return ok(c, {
      complaints: complaints.map(complaintToWire),
      count: complaints.length,
      limit: parsed.data.limit,
      offset: parsed.data.offset,
    })
  })

  routes.get('/complaints/mine', async (c) => {
    const parsed = mineQuerySchema.safeParse(c.req.query())
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid query parameters.', 400, parsed.error.flatten())
    }

    const { identifier, ...options } = parsed.data
    const complaints = await services.intake.listMine(identifier, options)
    return ok(c, {
      identifier,
      complaints: complaints.map(complaintToWire),
      count: complaints.length,
    })
  })

  routes.get('/complaints/:complaintId', async (c) => {
    const complaint = await services.intake.getComplaint(c.req.param('complaintId'))
    return ok(c, complaintToWire(complaint))
  })

  routes.get('/complaints/:complaintId/history', async (c) => {
    const complaintId = c.req.param('complaintId')
    const history = await services.workflow.getStatusHistory(complaintId)
    return ok(c, {
      complaint_id: complaintId,
      history: history.map(statusChangeToWire),
    })
  })

  routes.post('/complaints/:complaintId/recalculate-priority', async (c) => {
    const result = await services.ledger.recalculatePriority(c.req.param('complaintId'))
    return ok(c, result)
  })

  return routes
}
