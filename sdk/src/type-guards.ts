/**
 * Type guard utilities
 * Runtime checks that narrow results and responses
 */

import { PostgrestError } from './errors'
import type { PostgrestResponse, PostgrestResult } from './types'

/**
 * Type guard to check if an execution failed
 *
 * @example
 * ```typescript
 * const result = await client.from('users').select('*')
 *
 * if (isPostgrestFailure(result)) {
 *   console.error('Query failed:', result.error.message)
 *   return
 * }
 *
 * console.log('Status:', result.data.status)
 * ```
 */
export function isPostgrestFailure(
  result: PostgrestResult
): result is { data: null; error: Error } {
  return result.error !== null
}

export function isPostgrestSuccess(
  result: PostgrestResult
): result is { data: PostgrestResponse; error: null } {
  return result.error === null
}

/**
 * Check whether a response envelope carries an embedded server error
 * (only responses decoded from records can)
 */
export function hasPostgrestError(
  response: PostgrestResponse
): response is PostgrestResponse & { error: PostgrestError } {
  return response.error instanceof PostgrestError
}

/**
 * Check whether a value is a plain object
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Check whether a value is an array of plain objects (rows)
 */
export function isRowArray(value: unknown): value is Array<Record<string, unknown>> {
  return Array.isArray(value) && value.every(isObject)
}
