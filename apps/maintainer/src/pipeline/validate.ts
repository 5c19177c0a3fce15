import { loadDataset, writeJsonFile, writeTextFile } from '../store/dataset-store.js'
import { renderValidationStatus, buildValidationReport } from '../reports/validation-report.js'
import type { ValidationReport } from '../types.js'
import { UrlValidator, passesThreshold } from '../validator/url-validator.js'
import type { PipelineContext } from './context.js'

export interface ValidationRunOutcome {
  /** Null when there was nothing to check */
  report: ValidationReport | null
  passed: boolean
}

/**
 * Check every dataset URL and write the validation report. The run passes
 * when the valid share reaches `minValidPercentage`; an empty dataset fails.
 */
export async function runValidation(
  context: PipelineContext,
  options: { minValidPercentage: number }
): Promise<ValidationRunOutcome> {
  const { paths, log } = context
  const dataset = await loadDataset(paths.dataset)
  const records = dataset.certifications.filter(record => record.url !== '')

  if (records.length === 0) {
    log.warn('VALIDATION_SKIPPED_EMPTY_DATASET', { stage: 'load', path: paths.dataset })
    return { report: null, passed: false }
  }

  const checkLog = log.child({ stage: 'check_urls' })
  checkLog.info('VALIDATION_STARTED', { records: records.length })
  const outcome = await new UrlValidator(context.fetcher, { now: context.now }).validate(records)

  const report = buildValidationReport(outcome.results, context.now())
  await writeJsonFile(paths.validationReport, report)
  await writeTextFile(paths.validationStatus, renderValidationStatus(report))

  const passed = passesThreshold(report.summary, options.minValidPercentage)
  const summaryMeta = {
    valid: report.summary.valid,
    invalid: report.summary.invalid,
    validPercentage: report.summary.valid_percentage,
    threshold: options.minValidPercentage,
  }
  if (passed) {
    checkLog.info('VALIDATION_COMPLETED', summaryMeta)
  } else {
    checkLog.warn('VALIDATION_BELOW_THRESHOLD', summaryMeta)
  }

  return { report, passed }
}
