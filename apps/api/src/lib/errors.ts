/**
 * Error taxonomy shared by services and the HTTP layer.
 *
 * Services throw these; `app.onError` turns them into the `fail()` envelope
 * using `code` and `status`. Anything else becomes INTERNAL_ERROR / 500.
 */

export type ErrorStatus = 400 | 404 | 409 | 500 | 503

export class DomainError extends Error {
  readonly code: string
  readonly status: ErrorStatus
  readonly details?: unknown

  constructor(code: string, message: string, status: ErrorStatus, details?: unknown) {
    super(message)
    this.name = new.target.name
    this.code = code
    this.status = status
    this.details = details
  }
}

export class NotFoundError extends DomainError {
  constructor(message: string, details?: unknown) {
    super('NOT_FOUND', message, 404, details)
  }
}

export class InvalidInputError extends DomainError {
  constructor(code: string, message: string, details?: unknown) {
    super(code, message, 400, details)
  }
}

/** Unique-constraint violation; the vote ledger treats it as a lost race. */
export class ConflictError extends DomainError {
  constructor(message: string, details?: unknown) {
    super('CONFLICT', message, 409, details)
  }
}

/** Serialization failure, deadlock or a dropped connection. Safe to retry. */
export class TransientPersistenceError extends DomainError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_UNAVAILABLE', message, 503)
    if (options?.cause !== undefined) this.cause = options.cause
  }
}

/** Retries are exhausted; nothing was committed. */
export class PersistenceFailureError extends DomainError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_FAILURE', message, 500)
    if (options?.cause !== undefined) this.cause = options.cause
  }
}

/** The classifier could not be reached or answered with garbage. */
export class ExternalServiceError extends Error {
  readonly reason: 'timeout' | 'request_failed' | 'malformed_response'

  constructor(reason: ExternalServiceError['reason'], message: string, options?: { cause?: unknown }) {
    super(message)
    this.name = 'ExternalServiceError'
    this.reason = reason
    if (options?.cause !== undefined) this.cause = options.cause
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error)
}
