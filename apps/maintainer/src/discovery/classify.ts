/**
 * Keyword classification as ordered rule tables: the first rule whose
 * `match` occurs in the haystack wins.
 */

import type { KeywordRule } from '../types.js'

export function firstMatchingRule(rules: readonly KeywordRule[], ...haystacks: string[]): string | undefined {
  const lowered = haystacks.map(value => value.toLowerCase())
  for (const rule of rules) {
    const needle = rule.match.toLowerCase()
    if (lowered.some(value => value.includes(needle))) {
      return rule.value
    }
  }
  return undefined
}

/**
 * Provider from the URL's host: the rule table first, then the first host
 * label (without "www.") title-cased, then "Unknown".
 */
export function inferProvider(url: string, rules: readonly KeywordRule[]): string {
  let host: string
  try {
    host = new URL(url).hostname.toLowerCase()
  } catch {
    return 'Unknown'
  }

  const matched = firstMatchingRule(rules, host)
  if (matched) {
    return matched
  }

  const label = host.replace(/^www\./, '').split('.')[0]
  return label ? titleCase(label) : 'Unknown'
}

export function inferCategory(
  rules: readonly KeywordRule[],
  fallback: string,
  ...texts: string[]
): string {
  return firstMatchingRule(rules, ...texts) ?? fallback
}

/** Upper-cases the first letter of every letter run and lower-cases the rest. */
export function titleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) => {
    return `${boundary}${letter.toUpperCase()}`
  })
}

/**
 * True when the title or URL looks like certification or training content.
 */
export function looksLikeCertification(keywords: readonly string[], title: string, url: string): boolean {
  const lowerTitle = title.toLowerCase()
  const lowerUrl = url.toLowerCase()
  return keywords.some(keyword => {
    const needle = keyword.toLowerCase()
    return lowerTitle.includes(needle) || lowerUrl.includes(needle)
  })
}
