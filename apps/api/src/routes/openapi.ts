import { z, type OpenAPIHono } from '@hono/zod-openapi'
import {
  complaintListQuerySchema,
  complaintSubmissionResultSchema,
  complaintSubmissionSchema,
  statusUpdateRequestSchema,
  statusUpdateResultSchema,
  voteRequestSchema,
  voteResultSchema,
  voteStatsSchema,
} from '@campus-voice/schema'
import { SERVICE_VERSION } from './core-api.js'

const metaSchema = z.object({
  requestId: z.string(),
  timestamp: z.string(),
})

const errorEnvelope = z.object({
  success: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
  }),
  meta: metaSchema,
})

function envelope<T extends z.ZodTypeAny>(data: T) {
  return z.object({ success: z.literal(true), data, meta: metaSchema })
}

function json<T extends z.ZodTypeAny>(schema: T) {
  return { 'application/json': { schema } }
}

const complaintParams = z.object({ complaintId: z.string() })

const errorResponses = {
  400: { description: 'Validation failed', content: json(errorEnvelope) },
  404: { description: 'Complaint not found', content: json(errorEnvelope) },
  503: { description: 'Persistence unavailable', content: json(errorEnvelope) },
}

/**
 * Documents the REST surface on `app` and serves it at `/api/openapi.json`.
 * Handlers live in the plain Hono route modules; this only registers paths.
 */
export function registerApiDocs(app: OpenAPIHono) {
  const registry = app.openAPIRegistry

  registry.registerPath({
    method: 'post',
    path: '/api/complaints',
    tags: ['complaints'],
    summary: 'Submit a complaint; it is classified and routed before storage',
    request: { body: { content: json(complaintSubmissionSchema) } },
    responses: {
      201: { description: 'Created', content: json(envelope(complaintSubmissionResultSchema)) },
      400: errorResponses[400],
    },
  })

  registry.registerPath({
    method: 'get',
    path: '/api/complaints/public',
    tags: ['complaints'],
    summary: 'Public feed, newest first',
    request: { query: complaintListQuerySchema },
    responses: { 200: { description: 'Complaints' }, 400: errorResponses[400] },
  })

  registry.registerPath({
    method: 'get',
    path: '/api/complaints/mine',
    tags: ['complaints'],
    summary: "A submitter's complaints",
    request: { query: complaintListQuerySchema.extend({ identifier: z.string() }) },
    responses: { 200: { description: 'Complaints' }, 400: errorResponses[400] },
  })

  registry.registerPath({
    method: 'get',
    path: '/api/complaints/{complaintId}',
    tags: ['complaints'],
    summary: 'Complaint detail',
    request: { params: complaintParams },
    responses: { 200: { description: 'Complaint' }, 404: errorResponses[404] },
  })

  registry.registerPath({
    method: 'get',
    path: '/api/complaints/{complaintId}/history',
    tags: ['complaints'],
    summary: 'Status audit trail, oldest first',
    request: { params: complaintParams },
    responses: { 200: { description: 'Status changes' }, 404: errorResponses[404] },
  })

  registry.registerPath({
    method: 'post',
    path: '/api/complaints/{complaintId}/recalculate-priority',
    tags: ['complaints'],
    summary: 'Recompute the priority score from stored classification and votes',
    request: { params: complaintParams },
    responses: { 200: { description: 'Recalculated' }, 404: errorResponses[404] },
  })

  registry.registerPath({
    method: 'post',
    path: '/api/vote',
    tags: ['votes'],
    summary: 'Cast, toggle off or switch a vote',
    request: { body: { content: json(voteRequestSchema) } },
    responses: {
      200: { description: 'Vote applied', content: json(envelope(voteResultSchema)) },
      ...errorResponses,
    },
  })

  registry.registerPath({
    method: 'get',
    path: '/api/votes/{complaintId}',
    tags: ['votes'],
    summary: 'Vote counters',
    request: { params: complaintParams },
    responses: {
      200: { description: 'Counters', content: json(envelope(voteStatsSchema.extend({ complaint_id: z.string() }))) },
      404: errorResponses[404],
    },
  })

  registry.registerPath({
    method: 'get',
    path: '/api/votes/{complaintId}/voters',
    tags: ['votes'],
    summary: 'Upvoters and downvoters',
    request: { params: complaintParams },
    responses: { 200: { description: 'Voters' }, 404: errorResponses[404] },
  })

  registry.registerPath({
    method: 'get',
    path: '/api/votes/{complaintId}/mine',
    tags: ['votes'],
    summary: "The caller's current vote",
    request: { params: complaintParams, query: z.object({ voter_id: z.string() }) },
    responses: { 200: { description: 'Vote or null' }, 404: errorResponses[404] },
  })

  registry.registerPath({
    method: 'post',
    path: '/api/status/update',
    tags: ['status'],
    summary: 'Change complaint status; every change is audited',
    request: { body: { content: json(statusUpdateRequestSchema) } },
    responses: {
      200: { description: 'Status changed', content: json(envelope(statusUpdateResultSchema)) },
      ...errorResponses,
    },
  })

  registry.registerPath({
    method: 'get',
    path: '/api/authority/{authorityType}/complaints',
    tags: ['status'],
    summary: 'Complaints routed to one authority',
    request: { params: z.object({ authorityType: z.string() }), query: complaintListQuerySchema },
    responses: { 200: { description: 'Complaints' }, 400: errorResponses[400] },
  })

  registry.registerPath({
    method: 'get',
    path: '/api/stats',
    tags: ['stats'],
    summary: 'Totals and breakdowns',
    responses: { 200: { description: 'Statistics' } },
  })

  registry.registerPath({
    method: 'get',
    path: '/api/ws/stats',
    tags: ['stats'],
    summary: 'Realtime registry counters',
    responses: { 200: { description: 'Statistics' } },
  })

  registry.registerPath({
    method: 'get',
    path: '/api/health',
    tags: ['stats'],
    summary: 'Liveness',
    responses: { 200: { description: 'Healthy' } },
  })

  app.doc('/api/openapi.json', {
    openapi: '3.0.0',
    info: {
      title: 'Campus Voice API',
      version: SERVICE_VERSION,
      description:
        'Campus complaints with classification, voting and status tracking. Live updates: WebSocket at /api/ws/votes/{complaintId}.',
    },
  })
}
