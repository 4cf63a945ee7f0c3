import { Hono } from 'hono'
import { z } from 'zod'
import { voteRequestSchema } from '@campus-voice/schema'
import type { ApiServices } from '../services/container.js'
import { fail, ok, readJson } from './_api.js'
import { voterToWire } from './_wire.js'

const mineQuerySchema = z.object({
  voter_id: z.string().trim().min(1).max(40),
})

export function createVoteRoutes(services: Pick<ApiServices, 'ledger'>) {
  const routes = new Hono()

  /**
   * Casting the same vote twice removes it; casting the opposite one
   * switches it.
   */
  routes.post('/vote', async (c) => {
    const parsed = voteRequestSchema.safeParse(await readJson(c))
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid vote request.', 400, parsed.error.flatten())
    }

    const { complaint_id, voter_id, vote_type } = parsed.data
    const result = await services.ledger.vote(complaint_id, voter_id, vote_type)
    return ok(c, result)
  })

  routes.get('/votes/:complaintId', async (c) => {
    const complaintId = c.req.param('complaintId')
    const stats = await services.ledger.getVoteStats(complaintId)
    return ok(c, { complaint_id: complaintId, ...stats })
  })

  routes.get('/votes/:complaintId/voters', async (c) => {
    const complaintId = c.req.param('complaintId')
    const { upvoters, downvoters } = await services.ledger.listVoters(complaintId)
    return ok(c, {
      complaint_id: complaintId,
      upvoters: upvoters.map(voterToWire),
      downvoters: downvoters.map(voterToWire),
      total_upvoters: upvoters.length,
      total_downvoters: downvoters.length,
    })
  })

  routes.get('/votes/:complaintId/mine', async (c) => {
    const parsed = mineQuerySchema.safeParse(c.req.query())
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid query parameters.', 400, parsed.error.flatten())
    }

    const complaintId = c.req.param('complaintId')
    const voteType = await services.ledger.getVoterVote(complaintId, parsed.data.voter_id)
    return ok(c, {
      complaint_id: complaintId,
      voter_id: parsed.data.voter_id,
      has_voted: voteType !== null,
      vote_type: voteType,
    })
  })

  return routes
}
