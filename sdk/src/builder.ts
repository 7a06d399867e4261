/**
 * Executable stage of the query builder chain
 */

import { BAD_URL, FAILED_TO_GET_ERROR, MISSING_TABLE_OPERATION, PostgrestError } from "./errors";
import type { PostgrestFetch } from "./fetch";
import { getHeader, parseUrl, setHeader } from "./request-state";
import { createResponse, decodeJson, parseContentRangeCount } from "./response";
import type {
  ExecuteOptions,
  HttpMethod,
  PostgrestResponse,
  PostgrestResult,
  RequestBody,
  RequestState,
  SafeResult,
} from "./types";
import { wrapAsync, wrapSync } from "./utils/error-handling";

function isReadMethod(method: HttpMethod): boolean {
  return method === "GET" || method === "HEAD";
}

function failure(error: Error): PostgrestResult {
  return { data: null, error };
}

function tryDecode(payload: Uint8Array): SafeResult<unknown> {
  return wrapSync(() => decodeJson(payload));
}

/**
 * Classify a raw HTTP response into a result.
 *
 * 2xx responses succeed. HEAD bodies are JSON-decoded unless the response
 * `Accept` header is `text/csv`; every other body is kept as raw bytes.
 * Other statuses fail with the server's error body, or with a generic error
 * when that body cannot be decoded.
 */
export function parseResponse(
  method: HttpMethod,
  payload: Uint8Array | null,
  status: number,
  headers: Headers,
): PostgrestResult {
  if (status >= 200 && status < 300) {
    let body: unknown = payload;

    if (method === "HEAD" && payload !== null && headers.get("Accept") !== "text/csv") {
      const decoded = tryDecode(payload);
      if (decoded.error) {
        return failure(decoded.error);
      }
      body = decoded.data;
    }

    return {
      data: createResponse({ body, status, count: parseContentRangeCount(headers) }),
      error: null,
    };
  }

  const decoded = payload === null ? null : tryDecode(payload).data;
  return failure(
    PostgrestError.fromBody(decoded, status) ??
      new PostgrestError(FAILED_TO_GET_ERROR, { status }),
  );
}

/**
 * Holds the accumulated request and sends it.
 * Awaiting a builder executes it with default options.
 */
export class PostgrestBuilder implements PromiseLike<PostgrestResult> {
  constructor(
    protected readonly fetch: PostgrestFetch,
    protected readonly state: RequestState,
  ) {}

  get url(): string {
    return this.state.url;
  }

  get method(): HttpMethod | undefined {
    return this.state.method;
  }

  get headers(): Readonly<Record<string, string>> {
    return this.state.headers;
  }

  get body(): RequestBody | undefined {
    return this.state.body;
  }

  get schema(): string | undefined {
    return this.state.schema;
  }

  /**
   * Send the request
   *
   * @example
   * ```typescript
   * const { data, error } = await client
   *   .from('users')
   *   .select('id')
   *   .execute({ count: 'exact' })
   * ```
   */
  async execute(options: ExecuteOptions = {}): Promise<PostgrestResult> {
    const method = options.head ? "HEAD" : this.state.method;
    let headers = this.state.headers;

    if (options.count) {
      const prefer = getHeader(headers, "Prefer");
      headers = setHeader(
        headers,
        "Prefer",
        prefer ? `${prefer},count=${options.count}` : `count=${options.count}`,
      );
    }

    if (!method) {
      return failure(new PostgrestError(MISSING_TABLE_OPERATION));
    }

    const sendsBody = !isReadMethod(method) && this.state.body !== undefined;
    if (isReadMethod(method) || (sendsBody && !getHeader(headers, "Content-Type"))) {
      headers = setHeader(headers, "Content-Type", "application/json");
    }

    if (this.state.schema !== undefined) {
      headers = setHeader(
        headers,
        isReadMethod(method) ? "Accept-Profile" : "Content-Profile",
        this.state.schema,
      );
    }

    if (!parseUrl(this.state.url)) {
      return failure(new PostgrestError(BAD_URL));
    }

    const response = await wrapAsync(() =>
      this.fetch.request(this.state.url, {
        method,
        headers: { ...headers },
        body: sendsBody ? this.state.body : undefined,
        signal: options.signal,
      }),
    );
    if (response.error) {
      return failure(response.error);
    }

    const { payload, status, headers: responseHeaders } = response.data;
    return parseResponse(method, payload, status, responseHeaders);
  }

  /**
   * Execute and resolve with the response, rejecting with the error instead of returning it
   *
   * @example
   * ```typescript
   * try {
   *   const response = await client.from('users').delete().eq('id', 1).throwOnError()
   * } catch (error) {
   *   console.error('Delete failed:', error)
   * }
   * ```
   */
  async throwOnError(options: ExecuteOptions = {}): Promise<PostgrestResponse> {
    const result = await this.execute(options);
    if (result.error) {
      throw result.error;
    }
    return result.data;
  }

  then<TResult1 = PostgrestResult, TResult2 = never>(
    onfulfilled?:
      | ((value: PostgrestResult) => TResult1 | PromiseLike<TResult1>)
      | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): PromiseLike<TResult1 | TResult2> {
    return this.execute().then(onfulfilled, onrejected);
  }
}
