import type { CandidateDefaults, CandidateRecord, KeywordRule } from '../types.js'
import { inferProvider } from './classify.js'

export const MIN_TITLE_LENGTH = 5
export const MAX_TITLE_LENGTH = 200

export type CandidateRejection = 'MISSING_FIELD' | 'TITLE_TOO_SHORT' | 'TITLE_TOO_LONG'

export type CandidateResult =
  | { ok: true; candidate: CandidateRecord }
  | { ok: false; reason: CandidateRejection }

export interface RawCandidate {
  url: string
  title: string
  category: string
  /** Empty when the provider should be inferred from the URL */
  provider: string
  /** Used instead of the description template when present */
  description?: string
  /** Source name, or 'web_search' */
  source: string
}

export interface CandidateContext {
  providerRules: readonly KeywordRule[]
  defaults: CandidateDefaults
  now: Date
}

export function normalizeTitle(title: string): string {
  return title.replace(/\s+/g, ' ').trim()
}

/**
 * Turn a raw (url, title) pair into a candidate record, or say why not.
 * Title length is counted in code points after whitespace normalization.
 */
export function buildCandidate(raw: RawCandidate, context: CandidateContext): CandidateResult {
  const url = raw.url.trim()
  const title = normalizeTitle(raw.title)
  if (!url || !title) {
    return { ok: false, reason: 'MISSING_FIELD' }
  }

  const length = [...title].length
  if (length < MIN_TITLE_LENGTH) {
    return { ok: false, reason: 'TITLE_TOO_SHORT' }
  }
  if (length > MAX_TITLE_LENGTH) {
    return { ok: false, reason: 'TITLE_TOO_LONG' }
  }

  const provider = raw.provider.trim() || inferProvider(url, context.providerRules)
  const description =
    raw.description?.trim() || context.defaults.descriptionTemplate.replace('{provider}', provider)

  return {
    ok: true,
    candidate: {
      category: raw.category,
      name: title,
      provider,
      url,
      description,
      duration: context.defaults.duration,
      level: context.defaults.level,
      prerequisites: '',
      expiration: '',
      discovered_at: context.now.toISOString(),
      source: raw.source,
    },
  }
}
