/**
 * URL repair run: take the broken listings from the last validation report,
 * swap in reachable replacements where one can be found, drop the rest, and
 * re-reconcile the dataset.
 */

import { reconcile } from '../reconcile/reconciler.js'
import { UrlFixer } from '../repair/url-fixer.js'
import { formatCsv } from '../store/csv.js'
import { loadDataset, loadInvalidListings, saveDataset, writeJsonFile, writeTextFile } from '../store/dataset-store.js'
import type { CertificationRecord, DatasetDocument, Listing, UrlFixReport, UrlRepairConfig } from '../types.js'
import type { PipelineContext } from './context.js'

export interface UrlRepairOptions {
  config: UrlRepairConfig
  /** Write the fix report only; leave the dataset and CSV untouched */
  dryRun?: boolean
}

export interface UrlRepairOutcome {
  report: UrlFixReport
  dataset: DatasetDocument
}

/** Null when no validation report exists yet. */
export async function runUrlRepair(context: PipelineContext, options: UrlRepairOptions): Promise<UrlRepairOutcome | null> {
  const { paths, log } = context
  const broken = await loadInvalidListings(paths.validationReport)
  if (broken === null) {
    log.warn('URL_REPAIR_SKIPPED_NO_REPORT', { stage: 'load', path: paths.validationReport })
    return null
  }

  const dataset = await loadDataset(paths.dataset)
  const brokenUrls = new Set(broken.map(listing => listing.url))
  const targets = new Map<string, Listing>()
  for (const record of dataset.certifications) {
    if (brokenUrls.has(record.url) && !targets.has(record.url)) {
      targets.set(record.url, { name: record.name, url: record.url })
    }
  }

  const repairLog = log.child({ stage: 'repair' })
  repairLog.info('URL_REPAIR_STARTED', { reported: broken.length, matched: targets.size })
  const fixes = await new UrlFixer(context.fetcher, options.config).repair([...targets.values()])

  const replacements = new Map<string, string>()
  const removals: string[] = []
  for (const fix of fixes) {
    if (fix.replacement === null) {
      removals.push(fix.url)
    } else {
      replacements.set(fix.url, fix.replacement)
    }
  }

  const kept: CertificationRecord[] = []
  const removed: Listing[] = []
  for (const record of dataset.certifications) {
    const replacement = replacements.get(record.url)
    if (replacement !== undefined) {
      kept.push({ ...record, url: replacement })
    } else if (targets.has(record.url)) {
      removed.push({ name: record.name, url: record.url })
    } else {
      kept.push(record)
    }
  }

  const now = context.now()
  const result = reconcile(kept, [], {
    previousCount: dataset.certifications.length,
    removed,
    now,
    validationRun: dataset.metadata.validation_run,
  })

  const report: UrlFixReport = {
    generated_at: now.toISOString(),
    fixes: Object.fromEntries(replacements),
    removals,
    summary: {
      fixed: replacements.size,
      removed: removals.length,
      remaining: result.dataset.certifications.length,
    },
  }

  const writeLog = log.child({ stage: 'write' })
  if (!options.dryRun) {
    await saveDataset(paths.dataset, result.dataset)
    await writeTextFile(paths.csv, formatCsv(result.dataset.certifications))
  }
  await writeJsonFile(paths.urlFixes, report)

  writeLog.info('URL_REPAIR_COMPLETED', {
    dryRun: options.dryRun === true,
    ...report.summary,
    duplicates: result.report.duplicates_dropped,
  })
  return { report, dataset: result.dataset }
}
