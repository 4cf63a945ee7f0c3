/**
 * Canonical API router, mounted under `/api`.
 *
 * Route modules are split by concern and receive the services they need.
 */

import { Hono } from 'hono'
import type { ApiServices } from '../services/container.js'
import { ok } from './_api.js'
import { createComplaintRoutes } from './complaints.js'
import { createStatsRoutes } from './stats.js'
import { createStatusRoutes } from './status.js'
import { createVoteRoutes } from './votes.js'

export const SERVICE_NAME = 'campus-voice-api'
export const SERVICE_VERSION = '0.1.0'

export function createCoreApiRoutes(services: ApiServices) {
  const coreApiRoutes = new Hono()

  coreApiRoutes.route('/', createComplaintRoutes(services))
  coreApiRoutes.route('/', createVoteRoutes(services))
  coreApiRoutes.route('/', createStatusRoutes(services))
  coreApiRoutes.route('/', createStatsRoutes(services))

  coreApiRoutes.get('/health', (c) => {
    return ok(c, {
      service: SERVICE_NAME,
      status: 'healthy',
      version: SERVICE_VERSION,
      realtime_connections: services.registry.getStats().total_active_connections,
    })
  })

  return coreApiRoutes
}
