/**
 * URL Fixer
 *
 * Looks for a reachable replacement for each broken listing: first the known
 * replacement table, then the URL shapes configured for the listing's
 * provider domain. The first candidate that answers wins.
 */

import type { ILogger } from '@certwatch/logger'
import { loggers } from '../config/logger.js'
import { sanitizeUrl } from '../config/structured-log.js'
import type { Prober } from '../fetch/bounded-fetcher.js'
import type { Listing, RepairPattern, SlugStyle, UrlRepairConfig } from '../types.js'

export interface UrlFix {
  name: string
  url: string
  /** Null when no candidate was reachable */
  replacement: string | null
}

export interface UrlFixerOptions {
  logger?: ILogger
}

export function slugify(name: string, style: SlugStyle): string {
  const hyphenated = name.toLowerCase().replace(/ /g, '-')
  if (style === 'hyphenated') return hyphenated

  const alphanumeric = hyphenated.replace(/[^a-z0-9-]/g, '')
  if (style === 'alphanumeric') return alphanumeric

  return alphanumeric.replace(/-+/g, '-').replace(/^-+|-+$/g, '')
}

function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase()
  } catch {
    return null
  }
}

function matchPattern(url: string, patterns: readonly RepairPattern[]): RepairPattern | undefined {
  const host = hostOf(url)
  if (host === null) return undefined
  return patterns.find(pattern => host.includes(pattern.domain.toLowerCase()))
}

/**
 * Every URL worth trying for a broken listing, in order, without repeats and
 * without the broken URL itself.
 */
export function replacementCandidates(listing: Listing, config: UrlRepairConfig): string[] {
  const candidates: string[] = []
  const known = config.replacements[listing.url]
  if (known !== undefined) candidates.push(known)

  const pattern = matchPattern(listing.url, config.patterns)
  if (pattern) {
    const slug = slugify(listing.name, pattern.slug)
    if (slug !== '') {
      candidates.push(...pattern.templates.map(template => template.split('{slug}').join(slug)))
    }
  }

  return [...new Set(candidates)].filter(candidate => candidate !== listing.url)
}

export class UrlFixer {
  private readonly prober: Prober
  private readonly config: UrlRepairConfig
  private readonly log: ILogger

  constructor(prober: Prober, config: UrlRepairConfig, options: UrlFixerOptions = {}) {
    this.prober = prober
    this.config = config
    this.log = options.logger ?? loggers.repair
  }

  /** Candidates are tried one at a time so a hit stops further requests. */
  async findReplacement(listing: Listing): Promise<string | null> {
    for (const candidate of replacementCandidates(listing, this.config)) {
      const probe = await this.prober.probe(candidate)
      if (probe.reachable) {
        this.log.debug('Replacement found', { name: listing.name, ...sanitizeUrl(candidate) })
        return candidate
      }
    }
    return null
  }

  async repair(listings: readonly Listing[]): Promise<UrlFix[]> {
    if (listings.length === 0) {
      return []
    }

    this.log.info('Repairing URLs', { count: listings.length })
    const replacements = await Promise.all(listings.map(listing => this.findReplacement(listing)))
    const fixes = listings.map((listing, index) => ({
      name: listing.name,
      url: listing.url,
      replacement: replacements[index] ?? null,
    }))

    this.log.info('Repair complete', {
      fixed: fixes.filter(fix => fix.replacement !== null).length,
      unresolved: fixes.filter(fix => fix.replacement === null).length,
    })
    return fixes
  }
}
