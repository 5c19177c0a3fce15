/**
 * Full maintenance run: validate the dataset, discover new listings against
 * the surviving records, then reconcile and persist.
 *
 * Nothing is written until every phase has finished.
 */

import { createFrontier } from '../discovery/dedupe.js'
import { discoverCandidates } from '../discovery/discoverer.js'
import { reconcile } from '../reconcile/reconciler.js'
import type { ReconcileResult } from '../reconcile/reconciler.js'
import { renderMaintenanceSummary } from '../reports/maintenance-report.js'
import { formatCsv } from '../store/csv.js'
import { loadDataset, saveDataset, writeJsonFile, writeTextFile } from '../store/dataset-store.js'
import type { CandidateRecord, DiscoveryConfig } from '../types.js'
import { UrlValidator } from '../validator/url-validator.js'
import type { PipelineContext } from './context.js'

export interface MaintenanceOptions {
  config: DiscoveryConfig
  sourceDelayMs: number
  searchDelayMs: number
  skipDiscovery?: boolean
  /** Write the audit report only; leave the dataset and CSV untouched */
  dryRun?: boolean
  sleep?: (ms: number) => Promise<void>
}

export async function runMaintenance(context: PipelineContext, options: MaintenanceOptions): Promise<ReconcileResult> {
  const { paths, log } = context
  const current = await loadDataset(paths.dataset)

  const validateLog = log.child({ stage: 'validate_existing' })
  validateLog.info('VALIDATION_STARTED', { records: current.certifications.length })
  const validation = await new UrlValidator(context.fetcher, { now: context.now }).validate(current.certifications)
  validateLog.info('VALIDATION_COMPLETED', {
    valid: validation.valid.length,
    invalid: validation.invalid.length,
  })

  let accepted: CandidateRecord[] = []
  if (options.skipDiscovery) {
    log.info('DISCOVERY_SKIPPED', { stage: 'discover' })
  } else {
    const discovery = await discoverCandidates(createFrontier(validation.valid), {
      fetcher: context.fetcher,
      config: options.config,
      log,
      sourceDelayMs: options.sourceDelayMs,
      searchDelayMs: options.searchDelayMs,
      now: context.now,
      sleep: options.sleep,
    })
    accepted = discovery.accepted
  }

  const timestamp = context.now()
  const result = reconcile(validation.valid, accepted, {
    previousCount: current.certifications.length,
    removed: validation.invalid,
    now: timestamp,
    validationRun: timestamp.toISOString(),
  })

  const writeLog = log.child({ stage: 'write' })
  if (!options.dryRun) {
    await saveDataset(paths.dataset, result.dataset)
    await writeTextFile(paths.csv, formatCsv(result.dataset.certifications))
  }
  await writeJsonFile(paths.maintenanceReport, result.report)
  await writeTextFile(paths.maintenanceSummary, renderMaintenanceSummary(result.report, { dryRun: options.dryRun }))

  writeLog.info('MAINTENANCE_COMPLETED', {
    dryRun: options.dryRun === true,
    previous: result.report.previous_count,
    removed: result.report.removed_invalid,
    added: result.report.discovered_new,
    duplicates: result.report.duplicates_dropped,
    incomplete: result.report.incomplete.length,
    final: result.report.final_count,
    changed: result.report.removed_invalid > 0 || result.report.discovered_new > 0,
  })
  return result
}
