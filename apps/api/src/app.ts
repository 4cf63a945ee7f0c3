import { OpenAPIHono } from '@hono/zod-openapi'
import { cors } from 'hono/cors'
import { requestId } from './middleware/request-id.js'
import { fail, handleError } from './routes/_api.js'
import { createCoreApiRoutes } from './routes/core-api.js'
import { registerApiDocs } from './routes/openapi.js'
import type { ApiServices } from './services/container.js'

/** Builds the HTTP app. No listening socket; `server.ts` serves it. */
export function createApp(services: ApiServices) {
  const app = new OpenAPIHono()

  app.use('/*', cors())
  app.use('/*', requestId)

  app.route('/api', createCoreApiRoutes(services))
  registerApiDocs(app)

  app.onError(handleError)
  app.notFound((c) => fail(c, 'NOT_FOUND', `No route for ${c.req.method} ${c.req.path}.`, 404))

  return app
}
