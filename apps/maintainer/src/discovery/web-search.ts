/**
 * Web Search Discoverer
 *
 * One request per query against the DuckDuckGo HTML endpoint. Result links
 * are wrapped in a redirect (`/l/?uddg=<target>`); the real destination is
 * read from that parameter.
 */

import type { ILogger } from '@certwatch/logger'
import { loggers } from '../config/logger.js'
import type { PageFetcher } from '../fetch/bounded-fetcher.js'
import type { CandidateDefaults, CandidateRecord, KeywordRule } from '../types.js'
import { buildCandidate } from './candidate.js'
import { inferCategory, looksLikeCertification } from './classify.js'
import { firstText, loadHtml } from './html.js'

export const SEARCH_SOURCE = 'web_search'

const REDIRECT_PARAM = 'uddg'

export const RESULT_SELECTORS = {
  result: '.result',
  link: '.result__a',
  snippet: '.result__snippet',
} as const

export interface SearchResult {
  title: string
  url: string
  snippet: string
}

export interface WebSearchOptions {
  endpoint: string
  resultLimit: number
  certificationKeywords: readonly string[]
  providerRules: readonly KeywordRule[]
  categoryRules: readonly KeywordRule[]
  defaultCategory: string
  candidateDefaults: CandidateDefaults
  logger?: ILogger
  now?: () => Date
}

export function buildSearchUrl(endpoint: string, query: string): string {
  const url = new URL(endpoint)
  url.searchParams.set('q', query)
  return url.toString()
}

/**
 * Undo the search engine's redirect wrapper. Hrefs without the redirect
 * parameter are returned unchanged.
 */
export function unwrapRedirect(href: string, endpoint: string): string {
  if (!href.includes(`${REDIRECT_PARAM}=`)) {
    return href
  }
  try {
    return new URL(href, endpoint).searchParams.get(REDIRECT_PARAM) ?? ''
  } catch {
    return ''
  }
}

export function parseSearchResults(html: string, endpoint: string, limit: number): SearchResult[] {
  const $ = loadHtml(html)
  const results: SearchResult[] = []

  $(RESULT_SELECTORS.result)
    .slice(0, limit)
    .each((_, element) => {
      const entry = $(element)
      const link = entry.find(RESULT_SELECTORS.link).first()
      if (link.length === 0) return

      const url = unwrapRedirect(link.attr('href') ?? '', endpoint)
      if (!/^https?:\/\//i.test(url)) return

      results.push({
        title: link.text().trim(),
        url,
        snippet: firstText(entry, RESULT_SELECTORS.snippet),
      })
    })

  return results
}

export class WebSearchDiscoverer {
  private readonly fetcher: PageFetcher
  private readonly options: WebSearchOptions
  private readonly log: ILogger
  private readonly now: () => Date

  constructor(fetcher: PageFetcher, options: WebSearchOptions) {
    this.fetcher = fetcher
    this.options = options
    this.log = options.logger ?? loggers.discovery.child('search')
    this.now = options.now ?? (() => new Date())
  }

  async search(query: string): Promise<CandidateRecord[]> {
    const page = await this.fetcher.fetchPage(buildSearchUrl(this.options.endpoint, query))
    if (page.status !== 'ok') {
      this.log.warn('Search request failed', { query, reason: page.reason, error: page.error })
      return []
    }

    let results: SearchResult[]
    try {
      results = parseSearchResults(page.body, this.options.endpoint, this.options.resultLimit)
    } catch (error) {
      this.log.warn('Search results could not be parsed', { query }, error)
      return []
    }

    const now = this.now()
    const candidates: CandidateRecord[] = []
    for (const result of results) {
      if (!looksLikeCertification(this.options.certificationKeywords, result.title, result.url)) {
        continue
      }

      const built = buildCandidate(
        {
          url: result.url,
          title: result.title,
          category: inferCategory(
            this.options.categoryRules,
            this.options.defaultCategory,
            result.title,
            result.snippet
          ),
          provider: '',
          description: result.snippet,
          source: SEARCH_SOURCE,
        },
        { providerRules: this.options.providerRules, defaults: this.options.candidateDefaults, now }
      )
      if (built.ok) {
        candidates.push(built.candidate)
      }
    }

    this.log.info('Search complete', { query, results: results.length, candidates: candidates.length })
    return candidates
  }
}
