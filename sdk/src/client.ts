/**
 * Client for a PostgREST-compatible API.
 *
 * @example
 * ```typescript
 * import { createClient } from 'postgrest-builder'
 *
 * const client = createClient('http://localhost:3000', {
 *   headers: { Authorization: 'Bearer <token>' },
 * })
 *
 * // Query a table
 * const { data, error } = await client
 *   .from('users')
 *   .select('id, name')
 *   .eq('active', true)
 *   .execute({ count: 'exact' })
 *
 * // Tables in another schema
 * await client.schema('audit').from('entries').select()
 * ```
 *
 * @category Client
 */

import { PostgrestFetch } from "./fetch";
import { PostgrestFilterBuilder } from "./filter-builder";
import { PostgrestQueryBuilder } from "./query-builder";
import { createRequestState } from "./request-state";
import type { JsonObject, PostgrestClientOptions } from "./types";

export class PostgrestClient {
  readonly url: string;
  private options: PostgrestClientOptions;
  private fetch: PostgrestFetch;

  /**
   * @param url - Base URL of the PostgREST server, e.g. `http://localhost:3000`
   */
  constructor(url: string, options: PostgrestClientOptions = {}) {
    this.url = url.replace(/\/$/, ""); // Remove trailing slash
    this.options = { ...options, headers: { ...options.headers } };
    this.fetch = new PostgrestFetch({
      fetch: options.fetch,
      timeout: options.timeout,
      debug: options.debug,
    });
  }

  /**
   * Start a query on a table or view
   *
   * @param table - The table name
   * @returns A query builder for picking the table operation
   */
  from(table: string): PostgrestQueryBuilder {
    return new PostgrestQueryBuilder(
      this.fetch,
      createRequestState(`${this.url}/${table}`, this.options.headers, this.options.schema),
    );
  }

  /**
   * Target tables in another database schema
   *
   * @example
   * ```typescript
   * const { data } = await client.schema('logging').from('entries').select()
   * ```
   */
  schema(name: string): PostgrestClient {
    return new PostgrestClient(this.url, { ...this.options, schema: name });
  }

  /**
   * Call a PostgreSQL function exposed under `/rpc`
   *
   * @example
   * ```typescript
   * const { data } = await client.rpc('get_user_orders', { user_id: '123' }).limit(10)
   * ```
   */
  rpc(fn: string, params: JsonObject = {}): PostgrestFilterBuilder {
    const state = createRequestState(
      `${this.url}/rpc/${fn}`,
      this.options.headers,
      this.options.schema,
    );
    return new PostgrestFilterBuilder(this.fetch, { ...state, method: "POST", body: params });
  }
}

/**
 * Create a client
 *
 * @param url - Base URL of the PostgREST server
 * @param options - Headers, schema, transport, timeout and debug settings
 *
 * @category Client
 */
export function createClient(url: string, options?: PostgrestClientOptions): PostgrestClient {
  return new PostgrestClient(url, options);
}
