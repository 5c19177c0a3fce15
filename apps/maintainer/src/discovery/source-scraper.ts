/**
 * Source Scraper
 *
 * Extracts candidate listings from a provider's catalog page. Which anchors
 * count as listings is configuration (the source's link selector); this
 * module only knows how to turn anchors into candidates.
 */

import type { ILogger } from '@certwatch/logger'
import { loggers } from '../config/logger.js'
import { sanitizeUrl } from '../config/structured-log.js'
import type { PageFetcher } from '../fetch/bounded-fetcher.js'
import type { CandidateDefaults, CandidateRecord, KeywordRule, SourceDescriptor } from '../types.js'
import { buildCandidate } from './candidate.js'
import { anchorTitle, loadHtml } from './html.js'

export interface ExtractedLink {
  url: string
  title: string
}

export interface SourceScraperOptions {
  providerRules: readonly KeywordRule[]
  candidateDefaults: CandidateDefaults
  maxLinksPerSource: number
  logger?: ILogger
  now?: () => Date
}

const ABSOLUTE_HTTP = /^https?:\/\//i

/**
 * Resolve an href against the page it was found on. Root-relative hrefs are
 * joined to the page's scheme and host; anything else that is not absolute
 * http(s) is discarded.
 */
export function resolveHref(href: string, pageUrl: string): string | null {
  const value = href.trim()
  if (!value) {
    return null
  }
  if (ABSOLUTE_HTTP.test(value)) {
    return value
  }
  if (!value.startsWith('/')) {
    return null
  }

  try {
    const page = new URL(pageUrl)
    const resolved = new URL(value, `${page.protocol}//${page.host}`)
    return ABSOLUTE_HTTP.test(resolved.href) ? resolved.href : null
  } catch {
    return null
  }
}

/**
 * Pull (url, title) pairs out of a listing page. At most `maxLinks` anchors
 * are considered, before any filtering.
 */
export function extractLinks(html: string, source: SourceDescriptor, maxLinks: number): ExtractedLink[] {
  const $ = loadHtml(html)
  const selector = source.selectors.links ?? 'a[href]'
  const anchors = $(selector).slice(0, maxLinks)

  const links: ExtractedLink[] = []
  anchors.each((_, element) => {
    const anchor = $(element)
    const href = anchor.attr('href')
    if (!href) return

    const url = resolveHref(href, source.url)
    if (!url) return

    links.push({ url, title: anchorTitle(anchor) })
  })

  return links
}

export class SourceScraper {
  private readonly fetcher: PageFetcher
  private readonly options: SourceScraperOptions
  private readonly log: ILogger
  private readonly now: () => Date

  constructor(fetcher: PageFetcher, options: SourceScraperOptions) {
    this.fetcher = fetcher
    this.options = options
    this.log = options.logger ?? loggers.discovery.child('source')
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Candidates from one source. An unreachable or unparseable page yields
   * an empty list.
   */
  async scrape(source: SourceDescriptor): Promise<CandidateRecord[]> {
    const page = await this.fetcher.fetchPage(source.url)
    if (page.status !== 'ok') {
      this.log.warn('Source page unavailable', {
        source: source.name,
        reason: page.reason,
        error: page.error,
        ...sanitizeUrl(source.url),
      })
      return []
    }

    let links: ExtractedLink[]
    try {
      links = extractLinks(page.body, source, this.options.maxLinksPerSource)
    } catch (error) {
      this.log.warn('Source page could not be parsed', { source: source.name }, error)
      return []
    }

    const now = this.now()
    const candidates: CandidateRecord[] = []
    for (const link of links) {
      const result = buildCandidate(
        {
          url: link.url,
          title: link.title,
          category: source.category,
          provider: source.provider,
          source: source.name,
        },
        { providerRules: this.options.providerRules, defaults: this.options.candidateDefaults, now }
      )
      if (result.ok) {
        candidates.push(result.candidate)
      }
    }

    this.log.info('Source scraped', { source: source.name, links: links.length, candidates: candidates.length })
    return candidates
  }
}
