/**
 * Copy-on-write helpers over RequestState
 */

import type { PostgrestFetch } from './fetch'
import type { HttpMethod, RequestBody, RequestState } from './types'
import { wrapSync } from './utils/error-handling'

export function createRequestState(
  url: string,
  headers: Record<string, string> = {},
  schema?: string,
): RequestState {
  return { url, headers: { ...headers }, schema }
}

/**
 * Parse a URL, returning null instead of throwing when it is malformed
 */
export function parseUrl(url: string): URL | null {
  return wrapSync(() => new URL(url)).data
}

/**
 * Append a query parameter after the existing ones.
 * A URL that cannot be parsed leaves the state untouched (the same object is returned);
 * execution later rejects it as a bad URL.
 */
export function appendSearchParam(state: RequestState, name: string, value: string): RequestState {
  const url = parseUrl(state.url)
  if (!url) {
    return state
  }

  url.searchParams.append(name, value)
  return { ...state, url: url.toString() }
}

/**
 * Append a query parameter, logging through the transport when it is dropped
 */
export function appendQueryParam(
  transport: Pick<PostgrestFetch, 'warn'>,
  state: RequestState,
  name: string,
  value: string,
): RequestState {
  const next = appendSearchParam(state, name, value)
  if (next === state) {
    transport.warn(`Dropped query parameter ${name}: cannot parse ${state.url}`)
  }
  return next
}

/**
 * Look up a header by name, ignoring case
 */
export function getHeader(headers: Readonly<Record<string, string>>, name: string): string | undefined {
  const wanted = name.toLowerCase()
  const key = Object.keys(headers).find((candidate) => candidate.toLowerCase() === wanted)
  return key === undefined ? undefined : headers[key]
}

/**
 * Copy of `headers` with `name` set, replacing any entry spelled with another case
 */
export function setHeader(
  headers: Readonly<Record<string, string>>,
  name: string,
  value: string,
): Record<string, string> {
  const wanted = name.toLowerCase()
  const next: Record<string, string> = {}
  for (const [key, existing] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) {
      next[key] = existing
    }
  }
  next[name] = value
  return next
}

export function withHeader(state: RequestState, name: string, value: string): RequestState {
  return { ...state, headers: setHeader(state.headers, name, value) }
}

export function withMethod(state: RequestState, method: HttpMethod): RequestState {
  return { ...state, method }
}

export function withBody(state: RequestState, body: RequestBody | undefined): RequestState {
  return { ...state, body }
}
