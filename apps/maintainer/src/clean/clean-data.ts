/**
 * Tabular import: turns raw CSV rows into candidate records ready for
 * reconciliation.
 */

import { titleCase } from '../discovery/classify.js'
import type { CsvRow } from '../store/csv.js'
import { KNOWN_LEVELS } from '../types.js'
import type { CandidateRecord, KnownLevel } from '../types.js'

const LEVEL_ALIASES = new Map<string, KnownLevel>([
  ...KNOWN_LEVELS.map(level => [level.toLowerCase(), level] as const),
  ['', 'Not Specified'],
])

export interface CleanResult {
  records: CandidateRecord[]
  /** Rows whose cleaned URL was already seen */
  duplicates: number
  /** Rows without a name or URL */
  incomplete: number
}

export function cleanUrl(url: string): string {
  const value = url.trim()
  if (value && !value.startsWith('http://') && !value.startsWith('https://')) {
    return `https://${value}`
  }
  return value
}

/** Maps known levels onto the vocabulary; anything else is title-cased. */
export function normalizeLevel(level: string): string {
  const key = level.trim().toLowerCase()
  return LEVEL_ALIASES.get(key) ?? titleCase(key)
}

function cell(row: CsvRow, column: keyof CsvRow): string {
  return (row[column] ?? '').trim()
}

export function cleanRow(row: CsvRow): CandidateRecord {
  return {
    category: cell(row, 'Category'),
    name: cell(row, 'Certification_Name'),
    provider: cell(row, 'Provider'),
    url: cleanUrl(row.URL ?? ''),
    description: cell(row, 'Description'),
    duration: cell(row, 'Duration'),
    level: normalizeLevel(row.Level ?? ''),
    prerequisites: cell(row, 'Prerequisites'),
    expiration: cell(row, 'Expiration'),
    validated: null,
    last_checked: null,
  }
}

/**
 * Clean rows in order. A URL is claimed by the first row that carries it,
 * even when that row is later dropped as incomplete.
 */
export function cleanRows(rows: readonly CsvRow[]): CleanResult {
  const seen = new Set<string>()
  const records: CandidateRecord[] = []
  let duplicates = 0
  let incomplete = 0

  for (const row of rows) {
    const record = cleanRow(row)
    if (seen.has(record.url)) {
      duplicates++
      continue
    }
    seen.add(record.url)

    if (!record.name || !record.url) {
      incomplete++
      continue
    }
    records.push(record)
  }

  return { records, duplicates, incomplete }
}
