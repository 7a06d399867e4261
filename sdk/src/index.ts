/**
 * PostgREST query builder
 *
 * @packageDocumentation
 */

export { PostgrestClient, createClient } from './client'
export { PostgrestBuilder, parseResponse } from './builder'
export { PostgrestQueryBuilder, cleanColumns } from './query-builder'
export { PostgrestFilterBuilder } from './filter-builder'
export { PostgrestFetch } from './fetch'
export type { PostgrestFetchOptions, TransportRequest, TransportResponse } from './fetch'
export {
  PostgrestError,
  TimeoutError,
  isPostgrestError,
  isTimeoutError,
  MISSING_TABLE_OPERATION,
  BAD_URL,
  FAILED_TO_GET_ERROR,
} from './errors'
export type { PostgrestErrorFields } from './errors'
export { createResponse, responseFromRecord, decodeBody, parseContentRangeCount } from './response'
export { appendSearchParam, createRequestState } from './request-state'
export {
  isPostgrestFailure,
  isPostgrestSuccess,
  hasPostgrestError,
  isObject,
  isRowArray,
} from './type-guards'
export { FILTER_OPERATORS } from './types'
export type {
  CountOption,
  ExecuteOptions,
  FetchLike,
  FilterOperator,
  FilterValue,
  HttpMethod,
  InsertOptions,
  JsonObject,
  OrderOptions,
  PostgrestClientOptions,
  PostgrestResponse,
  PostgrestResult,
  RequestBody,
  RequestState,
  SafeResult,
  TextSearchOptions,
  TextSearchType,
  UpsertOptions,
} from './types'
