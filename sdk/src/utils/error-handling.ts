import type { SafeResult } from '../types'

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Wraps an async operation with try-catch, returning the `{ data, error }` format
 * @param operation The async operation to wrap
 * @returns Promise resolving to { data, error: null } on success or { data: null, error } on failure
 */
export async function wrapAsync<T>(
  operation: () => Promise<T>
): Promise<SafeResult<T>> {
  try {
    const data = await operation()
    return { data, error: null }
  } catch (error) {
    return { data: null, error: toError(error) }
  }
}

/**
 * Wraps synchronous operations (JSON encoding/decoding, URL parsing)
 * @param operation The sync operation to wrap
 * @returns { data, error: null } on success or { data: null, error } on failure
 */
export function wrapSync<T>(
  operation: () => T
): SafeResult<T> {
  try {
    const data = operation()
    return { data, error: null }
  } catch (error) {
    return { data: null, error: toError(error) }
  }
}
