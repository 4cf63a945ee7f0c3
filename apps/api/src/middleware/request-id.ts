import { randomUUID } from 'node:crypto'
import type { Context, Next } from 'hono'

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string
  }
}

/**
 * Ensure each request has a stable request id for tracing.
 */
export async function requestId(c: Context, next: Next) {
  const id = c.req.header('x-request-id') ?? randomUUID()
  c.set('requestId', id)
  c.header('x-request-id', id)
  await next()
}
