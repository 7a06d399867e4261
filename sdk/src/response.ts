/**
 * Response envelope helpers
 */

import { z } from 'zod'
import { PostgrestError } from './errors'
import type { PostgrestResponse, SafeResult } from './types'
import { wrapSync } from './utils/error-handling'

const responseRecordSchema = z.object({
  body: z.unknown().refine((value) => value !== undefined, 'body is required'),
  status: z.number().int().nullish().catch(null),
  count: z.number().int().nullish().catch(null),
  error: z.record(z.string(), z.unknown()).nullish().catch(null),
})

export function createResponse(fields: {
  body: unknown
  status?: number | null
  count?: number | null
  error?: PostgrestError | null
}): PostgrestResponse {
  return Object.freeze({
    body: fields.body,
    status: fields.status ?? null,
    count: fields.count ?? null,
    error: fields.error ?? null,
  })
}

/**
 * Build a response from a plain record such as `{ body, status, count, error }`.
 * Returns null when the record has no `body`. Mistyped optional fields are ignored,
 * and an `error` entry that is not a valid error body is dropped.
 */
export function responseFromRecord(record: unknown): PostgrestResponse | null {
  const parsed = responseRecordSchema.safeParse(record)
  if (!parsed.success) {
    return null
  }

  const { body, status, count, error } = parsed.data
  return createResponse({
    body,
    status,
    count,
    error: error ? PostgrestError.fromBody(error) : null,
  })
}

/**
 * Parse the content-range header to extract the total count
 * Header format: "0-9/42", or "0-9/*" when the total was not requested
 */
export function parseContentRangeCount(headers: Headers): number | null {
  const contentRange = headers.get('content-range')
  if (!contentRange) {
    return null
  }

  const total = contentRange.split('/').pop() ?? ''
  if (total === '*' || !/^[+-]?\d+$/.test(total)) {
    return null
  }
  const count = parseInt(total, 10)
  return Number.isSafeInteger(count) ? count : null
}

/**
 * Decode a UTF-8 JSON payload. Throws on malformed input.
 */
export function decodeJson(payload: Uint8Array): unknown {
  return JSON.parse(new TextDecoder().decode(payload))
}

/**
 * JSON-decode the raw bytes of a response body.
 * Bodies that were already decoded (HEAD responses, records) are returned as they are.
 */
export function decodeBody(response: PostgrestResponse): SafeResult<unknown> {
  const { body } = response
  if (body instanceof Uint8Array) {
    return wrapSync(() => decodeJson(body))
  }
  return { data: body, error: null }
}
