/**
 * Error types surfaced through `PostgrestResult.error`
 */

import { z } from 'zod'

export const MISSING_TABLE_OPERATION = 'Missing table operation: select, insert, update or delete'
export const BAD_URL = 'badURL'
export const FAILED_TO_GET_ERROR = 'failed to get error'

/**
 * Shape of a PostgREST error body. Only `message` is required; PostgREST
 * sends `null` for the fields it has nothing to say about.
 */
const serverErrorSchema = z.object({
  message: z.string(),
  details: z.string().nullish(),
  hint: z.string().nullish(),
  code: z.string().nullish(),
})

export interface PostgrestErrorFields {
  details?: string
  hint?: string
  code?: string
  /** HTTP status of the response that carried the error */
  status?: number
}

/**
 * Error reported by the server, or a local failure raised before any request was sent.
 */
export class PostgrestError extends Error {
  readonly details?: string
  readonly hint?: string
  readonly code?: string
  readonly status?: number

  constructor(message: string, fields: PostgrestErrorFields = {}) {
    super(message)
    this.name = 'PostgrestError'
    this.details = fields.details
    this.hint = fields.hint
    this.code = fields.code
    this.status = fields.status
  }

  /**
   * Build an error from a decoded JSON error body.
   * Returns null when the value is not an object with a string `message`.
   */
  static fromBody(body: unknown, status?: number): PostgrestError | null {
    const parsed = serverErrorSchema.safeParse(body)
    if (!parsed.success) {
      return null
    }

    const { message, details, hint, code } = parsed.data
    return new PostgrestError(message, {
      details: details ?? undefined,
      hint: hint ?? undefined,
      code: code ?? undefined,
      status,
    })
  }
}

/**
 * Raised by the transport when a request exceeds the configured timeout.
 */
export class TimeoutError extends Error {
  readonly status = 408
  readonly timeout: number

  constructor(timeout: number) {
    super('Request timeout')
    this.name = 'TimeoutError'
    this.timeout = timeout
  }
}

export function isPostgrestError(error: unknown): error is PostgrestError {
  return error instanceof PostgrestError
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError
}
