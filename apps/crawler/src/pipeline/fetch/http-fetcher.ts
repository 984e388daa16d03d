/**
 * HTTP Fetcher
 *
 * GET with a per-attempt timeout, a body size limit and bounded retries.
 * Every failure (transport error, timeout, non-2xx status, unreadable body)
 * is retried; once attempts run out the caller gets a failure result.
 */

import type { ILogger } from '@papercode/logger'
import { silentLogger } from '@papercode/logger'
import type { Fetcher, FetchOptions, FetchResult, RetryPolicy, Sleep } from '../types.js'
import {
  DEFAULT_FETCH_HEADERS,
  DEFAULT_FETCH_OPTIONS,
  DEFAULT_RETRY_POLICY,
  DEFAULT_USER_AGENT,
  sleep as defaultSleep,
} from '../types.js'

export interface HttpFetcherOptions {
  retryPolicy?: RetryPolicy

  /** Defaults applied to every request */
  fetchOptions?: FetchOptions

  userAgent?: string

  logger?: ILogger

  /** Pause between attempts (replaced in tests) */
  sleep?: Sleep
}

type AttemptOutcome =
  | { ok: true; statusCode: number; html: string }
  | { ok: false; timedOut: boolean; statusCode?: number; error: string }

class ResponseTooLargeError extends Error {
  constructor(limit: number) {
    super(`Response exceeded size limit of ${limit} bytes`)
    this.name = 'ResponseTooLargeError'
  }
}

export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly defaults: FetchOptions
  private readonly userAgent: string
  private readonly logger: ILogger
  private readonly sleep: Sleep

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.defaults = { ...DEFAULT_FETCH_OPTIONS, ...options.fetchOptions }
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
    this.logger = options.logger ?? silentLogger
    this.sleep = options.sleep ?? defaultSleep
  }

  async fetch(url: string, options?: FetchOptions): Promise<FetchResult> {
    const startTime = Date.now()
    const opts = { ...this.defaults, ...options }
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      ...DEFAULT_FETCH_HEADERS,
      ...(opts.headers ?? {}),
    }

    const maxAttempts = Math.max(1, this.retryPolicy.maxAttempts)
    let last: Extract<AttemptOutcome, { ok: false }> = { ok: false, timedOut: false, error: 'No attempt made' }

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const outcome = await this.fetchOnce(url, headers, opts)

      if (outcome.ok) {
        this.logger.debug('Fetched', { url, attempt, statusCode: outcome.statusCode })
        return {
          status: 'ok',
          statusCode: outcome.statusCode,
          html: outcome.html,
          attempts: attempt,
          durationMs: Date.now() - startTime,
        }
      }

      last = outcome
      this.logger.warn('Fetch attempt failed', {
        url,
        attempt,
        maxAttempts,
        statusCode: outcome.statusCode,
        error: outcome.error,
      })

      if (attempt < maxAttempts) {
        await this.sleep(this.delayForAttempt(attempt))
      }
    }

    return {
      status: last.timedOut ? 'timeout' : 'error',
      statusCode: last.statusCode,
      error: last.error,
      attempts: maxAttempts,
      durationMs: Date.now() - startTime,
    }
  }

  private delayForAttempt(attempt: number): number {
    return Math.min(
      this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, attempt - 1),
      this.retryPolicy.maxDelayMs
    )
  }

  /**
   * Single attempt. Converts every failure into an outcome value.
   */
  private async fetchOnce(
    url: string,
    headers: Record<string, string>,
    opts: FetchOptions
  ): Promise<AttemptOutcome> {
    const timeoutMs = opts.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs
    const maxBytes = opts.maxSizeBytes ?? DEFAULT_FETCH_OPTIONS.maxSizeBytes
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        await response.body?.cancel()
        return {
          ok: false,
          timedOut: false,
          statusCode: response.status,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && Number.parseInt(contentLength, 10) > maxBytes) {
        await response.body?.cancel()
        return {
          ok: false,
          timedOut: false,
          statusCode: response.status,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const html = await this.readBodyWithLimit(response, maxBytes)
      return { ok: true, statusCode: response.status, html }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return { ok: false, timedOut: true, error: `Request timed out after ${timeoutMs}ms` }
      }
      return {
        ok: false,
        timedOut: false,
        error: error instanceof Error ? error.message : String(error),
      }
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Read the body as UTF-8, replacing invalid byte sequences.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          throw new ResponseTooLargeError(maxBytes)
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }
}
