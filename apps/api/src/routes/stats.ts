import { Hono } from 'hono'
import type { ApiServices } from '../services/container.js'
import { ok } from './_api.js'
import { statsToWire } from './_wire.js'

export function createStatsRoutes(services: Pick<ApiServices, 'intake' | 'registry'>) {
  const routes = new Hono()

  routes.get('/stats', async (c) => {
    const stats = await services.intake.getOverallStats()
    return ok(c, {
      ...statsToWire(stats),
      active_realtime_connections: services.registry.getStats().total_active_connections,
    })
  })

  routes.get('/ws/stats', (c) => ok(c, services.registry.getStats()))

  return routes
}
