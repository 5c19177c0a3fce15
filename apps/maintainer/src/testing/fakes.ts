/**
 * In-process stand-ins for the network and the log sink, shared by tests.
 */

import { createLogger } from '@certwatch/logger'
import type { ILogger, LogEntry } from '@certwatch/logger'
import type { PageFetcher, Prober } from '../fetch/bounded-fetcher.js'
import type { PageResult, ProbeResult } from '../types.js'

/** Serves fixed page bodies and answers probes from a set of live URLs. */
export class FakeFetcher implements Prober, PageFetcher {
  readonly pages = new Map<string, string>()
  readonly live = new Set<string>()
  readonly probed: string[] = []
  readonly fetched: string[] = []

  async fetchPage(url: string): Promise<PageResult> {
    this.fetched.push(url)
    const body = this.pages.get(url)
    if (body === undefined) {
      return { status: 'empty', url, reason: 'http_status', statusCode: 404, error: 'HTTP 404' }
    }
    return { status: 'ok', url, statusCode: 200, body }
  }

  async fetchBody(url: string): Promise<string> {
    const page = await this.fetchPage(url)
    return page.status === 'ok' ? page.body : ''
  }

  async probe(url: string): Promise<ProbeResult> {
    this.probed.push(url)
    if (this.live.has(url)) {
      return { reachable: true, url, statusCode: 200, durationMs: 1 }
    }
    return { reachable: false, url, reason: 'http_status', statusCode: 404, error: 'HTTP 404', durationMs: 1 }
  }
}

/** Logger that records entries instead of printing them. */
export function createCapturingLogger(): { logger: ILogger; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const logger = createLogger('test', { sink: entry => entries.push(entry) })
  return { logger, entries }
}
