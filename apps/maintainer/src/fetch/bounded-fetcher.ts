/**
 * Bounded Fetcher
 *
 * Every outbound request runs through one shared capacity limiter, so the
 * same code serves a handful of probes or tens of thousands without opening
 * more than `maxConcurrent` sockets. Tasks beyond the cap wait at the
 * limiter, not in the transport.
 *
 * No retries: a timeout or transport error is terminal for that probe within
 * the run. Failures are returned as data and never thrown.
 */

import pLimit from 'p-limit'
import type { LimitFunction } from 'p-limit'
import { loggers } from '../config/logger.js'
import { DEFAULT_USER_AGENT } from '../config/settings.js'
import { sanitizeUrl } from '../config/structured-log.js'
import type { PageResult, ProbeResult, UnreachableReason } from '../types.js'

export interface BoundedFetcherOptions {
  /** Maximum in-flight network operations */
  maxConcurrent: number

  /** Per-request wall-clock timeout */
  timeoutMs: number

  userAgent?: string

  /** Share a limiter between fetchers so they draw from one budget */
  limiter?: LimitFunction
}

/** Reachability check used by the validator and by candidate acceptance. */
export interface Prober {
  probe(url: string): Promise<ProbeResult>
}

/** Page retrieval used by the extractors. */
export interface PageFetcher {
  fetchPage(url: string): Promise<PageResult>
  /** Body of a 200 response, or an empty string */
  fetchBody(url: string): Promise<string>
}

const MAX_ERROR_LENGTH = 100

const log = loggers.fetch

class RequestFailure extends Error {
  constructor(
    readonly reason: UnreachableReason,
    message: string
  ) {
    super(message)
    this.name = 'RequestFailure'
  }
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 400
}

export class BoundedFetcher implements Prober, PageFetcher {
  private readonly limit: LimitFunction
  private readonly timeoutMs: number
  private readonly headers: Record<string, string>

  constructor(options: BoundedFetcherOptions) {
    this.limit = options.limiter ?? pLimit(options.maxConcurrent)
    this.timeoutMs = options.timeoutMs
    this.headers = {
      'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    }
  }

  /**
   * HEAD first; if the status is outside [200, 400), fall back to GET since
   * some servers reject HEAD. Both attempts share one limiter slot.
   */
  probe(url: string): Promise<ProbeResult> {
    return this.limit(() => this.probeOnce(url))
  }

  /**
   * Fetch a page for extraction. Only a 200 response yields a body.
   */
  fetchPage(url: string): Promise<PageResult> {
    return this.limit(() => this.fetchPageOnce(url))
  }

  async fetchBody(url: string): Promise<string> {
    const page = await this.fetchPage(url)
    return page.status === 'ok' ? page.body : ''
  }

  private async probeOnce(url: string): Promise<ProbeResult> {
    const startTime = Date.now()

    try {
      assertFetchableUrl(url)

      const head = await this.request('HEAD', url, false)
      if (isSuccessStatus(head.statusCode)) {
        return { reachable: true, url, statusCode: head.statusCode, durationMs: Date.now() - startTime }
      }

      const get = await this.request('GET', url, false)
      if (isSuccessStatus(get.statusCode)) {
        return { reachable: true, url, statusCode: get.statusCode, durationMs: Date.now() - startTime }
      }

      return {
        reachable: false,
        url,
        reason: 'http_status',
        statusCode: get.statusCode,
        error: `HTTP ${get.statusCode}`,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      const failure = classifyFailure(error, this.timeoutMs)
      log.debug('Probe failed', { reason: failure.reason, error: failure.message, ...sanitizeUrl(url) })
      return {
        reachable: false,
        url,
        reason: failure.reason,
        error: failure.message,
        durationMs: Date.now() - startTime,
      }
    }
  }

  private async fetchPageOnce(url: string): Promise<PageResult> {
    try {
      assertFetchableUrl(url)

      const response = await this.request('GET', url, true)
      if (response.statusCode !== 200) {
        return {
          status: 'empty',
          url,
          reason: 'http_status',
          statusCode: response.statusCode,
          error: `HTTP ${response.statusCode}`,
        }
      }
      return { status: 'ok', url, statusCode: response.statusCode, body: response.body }
    } catch (error) {
      const failure = classifyFailure(error, this.timeoutMs)
      return { status: 'empty', url, reason: failure.reason, error: failure.message }
    }
  }

  /**
   * Single request with its own timeout. The timeout also covers reading the
   * body when one is requested; otherwise the body is discarded unread.
   */
  private async request(
    method: 'HEAD' | 'GET',
    url: string,
    readBody: boolean
  ): Promise<{ statusCode: number; body: string }> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const response = await fetch(url, {
        method,
        headers: this.headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!readBody) {
        await response.body?.cancel()
        return { statusCode: response.status, body: '' }
      }

      const body = await response.text()
      return { statusCode: response.status, body }
    } finally {
      clearTimeout(timeoutId)
    }
  }
}

function assertFetchableUrl(url: string): void {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    throw new RequestFailure('invalid_url', `Invalid URL: ${truncate(url)}`)
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new RequestFailure('invalid_url', `Unsupported protocol: ${parsed.protocol}`)
  }
}

function classifyFailure(error: unknown, timeoutMs: number): RequestFailure {
  if (error instanceof RequestFailure) {
    return error
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new RequestFailure('timeout', `Timeout after ${timeoutMs}ms`)
    }

    // undici reports transport failures as TypeError('fetch failed') with the cause attached
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : ''
    return new RequestFailure('network', `Connection error: ${truncate(`${error.message}${cause}`)}`)
  }

  return new RequestFailure('network', `Unknown error: ${truncate(String(error))}`)
}

function truncate(value: string): string {
  return value.length > MAX_ERROR_LENGTH ? value.slice(0, MAX_ERROR_LENGTH) : value
}
