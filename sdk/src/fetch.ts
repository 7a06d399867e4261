/**
 * HTTP transport for the query builder
 */

import { TimeoutError } from './errors'
import type { FetchLike, HttpMethod } from './types'

export interface TransportRequest {
  method: HttpMethod
  headers: Record<string, string>
  body?: unknown
  signal?: AbortSignal
}

/**
 * Raw response handed to the executor. `payload` is null when the response had no body at all.
 */
export interface TransportResponse {
  status: number
  headers: Headers
  payload: Uint8Array | null
}

export interface PostgrestFetchOptions {
  fetch?: FetchLike
  timeout?: number
  debug?: boolean
}

export class PostgrestFetch {
  private fetchImpl: FetchLike
  private timeout: number
  private debug: boolean

  constructor(options: PostgrestFetchOptions = {}) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
    this.timeout = options.timeout ?? 30000
    this.debug = options.debug ?? false
  }

  /**
   * Issue a single request. Transport failures propagate as thrown errors;
   * an exceeded timeout becomes a TimeoutError.
   */
  async request(url: string, options: TransportRequest): Promise<TransportResponse> {
    const controller = new AbortController()
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, this.timeout)

    const abortFromCaller = () => controller.abort(options.signal?.reason)
    if (options.signal?.aborted) {
      abortFromCaller()
    } else {
      options.signal?.addEventListener('abort', abortFromCaller, { once: true })
    }

    this.log(`${options.method} ${url}`, options.body)

    try {
      const response = await this.fetchImpl(url, {
        method: options.method,
        headers: options.headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      })

      const payload = response.body === null ? null : new Uint8Array(await response.arrayBuffer())

      this.log('Response:', response.status, payload?.byteLength ?? 0)

      return {
        status: response.status,
        headers: response.headers,
        payload,
      }
    } catch (err) {
      if (timedOut) {
        throw new TimeoutError(this.timeout)
      }
      throw err
    } finally {
      clearTimeout(timeoutId)
      options.signal?.removeEventListener('abort', abortFromCaller)
    }
  }

  /**
   * Debug log, only when the client was created with `debug: true`
   */
  log(message: string, ...args: unknown[]): void {
    if (this.debug) {
      console.log(`[postgrest] ${message}`, ...args)
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.debug) {
      console.warn(`[postgrest] ${message}`, ...args)
    }
  }
}
