import { randomUUID } from 'node:crypto'
import type { Context } from 'hono'
import { HTTPException } from 'hono/http-exception'
import { isDomainError, type ErrorStatus } from '../lib/errors.js'
import { createLogger } from '../lib/logger.js'

const logger = createLogger('http')

type SuccessStatus = 200 | 201

export function requestMeta(c: Context) {
  return {
    requestId: c.get('requestId') ?? randomUUID(),
    timestamp: new Date().toISOString(),
  }
}

export function ok<T>(c: Context, data: T, status: SuccessStatus = 200) {
  return c.json(
    {
      success: true,
      data,
      meta: requestMeta(c),
    },
    status,
  )
}

export function fail(
  c: Context,
  code: string,
  message: string,
  status: ErrorStatus = 400,
  details?: unknown,
) {
  return c.json(
    {
      success: false,
      error: {
        code,
        message,
        ...(details !== undefined ? { details } : {}),
      },
      meta: requestMeta(c),
    },
    status,
  )
}

/**
 * Parses a JSON body. Returns `undefined` when the body is missing or not
 * JSON so the caller's schema reports it as a validation error.
 */
export async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json()
  } catch {
    return undefined
  }
}

/** Single `app.onError` handler: domain errors keep their code and status. */
export function handleError(error: Error, c: Context) {
  if (isDomainError(error)) {
    if (error.status >= 500) logger.error(`${c.req.method} ${c.req.path}: ${error.message}`, error.cause)
    return fail(c, error.code, error.message, error.status, error.details)
  }
  if (error instanceof HTTPException) {
    return error.getResponse()
  }
  logger.error(`${c.req.method} ${c.req.path} failed`, error)
  return fail(c, 'INTERNAL_ERROR', 'Internal server error.', 500)
}
