/**
 * Discovery run: scrape known sources, run web searches, and gate every
 * batch through the frontier.
 *
 * Phases run one after another. Each scrape or search completes and its new
 * candidates are checked for reachability before the reachable ones are
 * folded into the frontier, so an unreachable candidate never claims a URL
 * or name that a later, live listing could take.
 */

import type { Prober, PageFetcher } from '../fetch/bounded-fetcher.js'
import type { CandidateRecord, DiscoveryConfig } from '../types.js'
import { UrlValidator } from '../validator/url-validator.js'
import { admitCandidates, isDuplicate } from './dedupe.js'
import type { Frontier } from './dedupe.js'
import { SourceScraper } from './source-scraper.js'
import { WebSearchDiscoverer } from './web-search.js'
import type { WorkflowLogger } from '../config/structured-log.js'

export interface DiscoveryDependencies {
  fetcher: Prober & PageFetcher
  config: DiscoveryConfig
  log: WorkflowLogger
  sourceDelayMs: number
  searchDelayMs: number
  now?: () => Date
  sleep?: (ms: number) => Promise<void>
}

export interface DiscoveryOutcome {
  /** Reachable, deduplicated candidates in discovery order */
  accepted: CandidateRecord[]
  /** New candidates that failed the reachability check; they never enter the frontier */
  unreachable: CandidateRecord[]
  /** Extracted candidates rejected as duplicates of the frontier */
  duplicates: number
  /** Frontier including every accepted candidate */
  frontier: Frontier
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export async function discoverCandidates(
  initial: Frontier,
  deps: DiscoveryDependencies
): Promise<DiscoveryOutcome> {
  const { config, log } = deps
  const sleep = deps.sleep ?? defaultSleep
  const now = deps.now ?? (() => new Date())

  const scraper = new SourceScraper(deps.fetcher, {
    providerRules: config.providerRules,
    candidateDefaults: config.candidateDefaults,
    maxLinksPerSource: config.maxLinksPerSource,
    now,
  })
  const searcher = new WebSearchDiscoverer(deps.fetcher, {
    endpoint: config.searchEndpoint,
    resultLimit: config.searchResultLimit,
    certificationKeywords: config.certificationKeywords,
    providerRules: config.providerRules,
    categoryRules: config.categoryRules,
    defaultCategory: config.defaultCategory,
    candidateDefaults: config.candidateDefaults,
    now,
  })

  const validator = new UrlValidator(deps.fetcher, { now })
  let frontier = initial
  let duplicates = 0
  const accepted: CandidateRecord[] = []
  const unreachable: CandidateRecord[] = []

  const settle = async (candidates: CandidateRecord[]): Promise<{ admitted: number; unreachable: number }> => {
    const fresh = candidates.filter(candidate => !isDuplicate(frontier, candidate))
    const validation = await validator.validate(fresh)
    // Only reachable candidates join the frontier, first one wins per URL and name
    const gate = admitCandidates(frontier, validation.valid)
    frontier = gate.frontier
    duplicates += candidates.length - fresh.length + gate.rejected.length
    accepted.push(...gate.admitted)
    unreachable.push(...validation.invalid)
    return { admitted: gate.admitted.length, unreachable: validation.invalid.length }
  }

  const sourceLog = log.child({ stage: 'scrape_sources' })
  for (const [index, source] of config.sources.entries()) {
    if (index > 0) await sleep(deps.sourceDelayMs)
    const counts = await settle(await scraper.scrape(source))
    sourceLog.info('SOURCE_SCRAPED', { source: source.name, ...counts })
  }

  const searchLog = log.child({ stage: 'web_search' })
  for (const [index, query] of config.searchQueries.entries()) {
    if (index > 0) await sleep(deps.searchDelayMs)
    const counts = await settle(await searcher.search(query))
    searchLog.info('QUERY_SEARCHED', { query, ...counts })
  }

  return { accepted, unreachable, duplicates, frontier }
}
