/**
 * Reconciler
 *
 * Merges validation survivors with accepted discoveries into the next
 * canonical dataset and an audit report. Pure: the same inputs always give
 * the same ordering, ids and metadata, so running it over its own output is
 * a no-op apart from timestamps.
 */

import { loggers } from '../config/logger.js'
import { normalizeName, normalizeUrl } from '../discovery/dedupe.js'
import type {
  CandidateRecord,
  CertificationRecord,
  DatasetDocument,
  DatasetMetadata,
  Listing,
  MaintenanceReport,
} from '../types.js'

const log = loggers.reconcile

export interface ReconcileContext {
  /** Records in the dataset before this run */
  previousCount: number
  /** Records the validator found unreachable */
  removed: readonly Listing[]
  now: Date
  /** Stamped into the metadata by maintain runs */
  validationRun?: string
}

export interface ReconcileResult {
  dataset: DatasetDocument
  report: MaintenanceReport
}

type Entry = { record: CandidateRecord; discovered: boolean }

/** Unicode code point order, independent of locale and of UTF-16 surrogates. */
export function compareText(a: string, b: string): number {
  const left = Array.from(a, char => char.codePointAt(0) ?? 0)
  const right = Array.from(b, char => char.codePointAt(0) ?? 0)
  const length = Math.min(left.length, right.length)
  for (let index = 0; index < length; index++) {
    const diff = (left[index] ?? 0) - (right[index] ?? 0)
    if (diff !== 0) return diff < 0 ? -1 : 1
  }
  return Math.sign(left.length - right.length)
}

/** Stable order by (category, name). Array.prototype.sort is stable. */
export function sortRecords<T extends Pick<CandidateRecord, 'category' | 'name'>>(records: readonly T[]): T[] {
  return [...records].sort((a, b) => compareText(a.category, b.category) || compareText(a.name, b.name))
}

/**
 * Rebuild a record with a fixed key order so serialized output does not
 * depend on where the record came from.
 */
export function withId(record: CandidateRecord, id: number): CertificationRecord {
  const next: CertificationRecord = {
    id,
    category: record.category,
    name: record.name,
    provider: record.provider,
    url: record.url,
    description: record.description,
    duration: record.duration,
    level: record.level,
    prerequisites: record.prerequisites,
    expiration: record.expiration,
  }
  if (record.discovered_at !== undefined) next.discovered_at = record.discovered_at
  if (record.source !== undefined) next.source = record.source
  if (record.validated !== undefined) next.validated = record.validated
  if (record.last_checked !== undefined) next.last_checked = record.last_checked
  return next
}

function distinctSorted(values: readonly string[]): string[] {
  return [...new Set(values.filter(value => value !== ''))].sort(compareText)
}

export function buildMetadata(
  records: readonly CertificationRecord[],
  now: Date,
  validationRun?: string
): DatasetMetadata {
  const metadata: DatasetMetadata = {
    total_certifications: records.length,
    last_updated: now.toISOString(),
    categories: distinctSorted(records.map(record => record.category)),
    providers: distinctSorted(records.map(record => record.provider)),
    levels: distinctSorted(records.map(record => record.level)),
  }
  if (validationRun) {
    metadata.validation_run = validationRun
  }
  return metadata
}

function toListing(record: Listing): Listing {
  return { name: record.name, url: record.url }
}

export function reconcile(
  survivors: readonly CandidateRecord[],
  accepted: readonly CandidateRecord[],
  context: ReconcileContext
): ReconcileResult {
  const entries: Entry[] = [
    ...survivors.map(record => ({ record, discovered: false })),
    ...accepted.map(record => ({ record, discovered: true })),
  ]

  const urls = new Set<string>()
  const names = new Set<string>()
  const kept: Entry[] = []
  const duplicates: Listing[] = []
  const incomplete: Listing[] = []

  for (const entry of entries) {
    const { name, url } = entry.record
    if (!name.trim() || !url.trim()) {
      incomplete.push(toListing(entry.record))
      continue
    }

    const urlKey = normalizeUrl(url)
    const nameKey = normalizeName(name)
    if (urls.has(urlKey) || names.has(nameKey)) {
      duplicates.push(toListing(entry.record))
      continue
    }

    urls.add(urlKey)
    names.add(nameKey)
    kept.push(entry)
  }

  const ordered = sortRecords(kept.map(entry => entry.record))
  const certifications = ordered.map((record, index) => withId(record, index + 1))
  const added = kept.filter(entry => entry.discovered).map(entry => toListing(entry.record))

  if (incomplete.length > 0 || duplicates.length > 0) {
    log.warn('Dropped records during merge', { incomplete: incomplete.length, duplicates: duplicates.length })
  }

  const timestamp = context.now.toISOString()
  return {
    dataset: {
      metadata: buildMetadata(certifications, context.now, context.validationRun),
      certifications,
    },
    report: {
      timestamp,
      previous_count: context.previousCount,
      removed_invalid: context.removed.length,
      discovered_new: added.length,
      duplicates_dropped: duplicates.length,
      final_count: certifications.length,
      invalid_removed: context.removed.map(toListing),
      new_added: added,
      duplicates,
      incomplete,
    },
  }
}
