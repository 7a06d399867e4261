/**
 * Core types for the PostgREST query builder
 */

import type { PostgrestError } from './errors'

/**
 * Client configuration options
 */
export interface PostgrestClientOptions {
  /**
   * Headers sent with every request (e.g. `Authorization`, `apikey`)
   */
  headers?: Record<string, string>

  /**
   * Database schema to target through the Accept-Profile / Content-Profile headers
   */
  schema?: string

  /**
   * Transport used to issue requests
   * @default globalThis.fetch
   */
  fetch?: FetchLike

  /**
   * Request timeout in milliseconds
   * @default 30000
   */
  timeout?: number

  /**
   * Enable debug logging
   * @default false
   */
  debug?: boolean
}

/**
 * The subset of the `fetch` signature the transport relies on
 */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PATCH' | 'DELETE'

export type JsonObject = Record<string, unknown>

/**
 * Request body: a single row, or several rows for bulk insert/upsert
 */
export type RequestBody = JsonObject | JsonObject[]

/**
 * Everything a builder knows about the request it will send.
 * Builders never mutate it; each step derives a new value.
 */
export interface RequestState {
  readonly url: string
  readonly headers: Readonly<Record<string, string>>
  readonly schema?: string
  readonly method?: HttpMethod
  readonly body?: RequestBody
}

/**
 * Row count algorithm requested through `Prefer: count=<option>`
 */
export type CountOption = 'exact' | 'planned' | 'estimated'

export const FILTER_OPERATORS = [
  'eq',    // equals
  'neq',   // not equals
  'gt',    // greater than
  'gte',   // greater than or equal
  'lt',    // less than
  'lte',   // less than or equal
  'like',  // LIKE operator (case-sensitive)
  'ilike', // ILIKE operator (case-insensitive)
  'is',    // IS operator (for null checks)
  'in',    // IN operator
  'cs',    // contains (array/JSONB/range)
  'cd',    // contained by (array/JSONB/range)
  'sl',    // strictly left of (range)
  'sr',    // strictly right of (range)
  'nxl',   // does not extend to the right of (range)
  'nxr',   // does not extend to the left of (range)
  'adj',   // adjacent to (range)
  'ov',    // overlaps
  'fts',   // full-text search (to_tsquery)
  'plfts', // full-text search (plainto_tsquery)
  'phfts', // full-text search (phraseto_tsquery)
  'wfts',  // full-text search (websearch_to_tsquery)
] as const

export type FilterOperator = (typeof FILTER_OPERATORS)[number]

/**
 * Scalar accepted by the comparison filters
 */
export type FilterValue = string | number | boolean | null

export type TextSearchType = 'plain' | 'phrase' | 'websearch'

export interface TextSearchOptions {
  /** Query parser to use; omitted means `to_tsquery` */
  type?: TextSearchType
  /** Text search configuration, e.g. `english` */
  config?: string
}

export interface OrderOptions {
  /** @default true */
  ascending?: boolean
  /** Place nulls first (`true`) or last (`false`); omitted leaves the server default */
  nullsFirst?: boolean
}

export interface InsertOptions {
  /** Merge rows that conflict on the primary key (or `onConflict` columns) */
  upsert?: boolean
  /** Comma-separated columns forming the conflict target */
  onConflict?: string
}

export type UpsertOptions = Omit<InsertOptions, 'upsert'>

export interface ExecuteOptions {
  /** Send a HEAD request (no rows, headers only) */
  head?: boolean
  /** Ask the server to report the total row count in `content-range` */
  count?: CountOption
  /** Abort the in-flight request */
  signal?: AbortSignal
}

/**
 * Parsed HTTP response. Success bodies stay raw bytes, except JSON-decoded HEAD bodies.
 */
export interface PostgrestResponse {
  readonly body: unknown
  readonly status: number | null
  readonly count: number | null
  readonly error: PostgrestError | null
}

/**
 * Result of executing a builder: the response or the reason it could not be produced
 */
export type PostgrestResult =
  | { data: PostgrestResponse; error: null }
  | { data: null; error: Error }

/**
 * Generic response wrapper used by the error-handling helpers
 */
export type SafeResult<T> =
  | { data: T; error: null }
  | { data: null; error: Error }
