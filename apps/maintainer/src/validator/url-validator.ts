/**
 * URL Validator
 *
 * Partitions records by reachability. Probes fan out through the shared
 * bounded fetcher; results are paired with their records by index, so the
 * order probes complete in never matters.
 */

import type { ILogger } from '@certwatch/logger'
import { loggers } from '../config/logger.js'
import type { Prober } from '../fetch/bounded-fetcher.js'
import type { Listing, ProbeResult, ValidationResult, ValidationSummary } from '../types.js'

export interface ValidationOutcome<T extends Listing> {
  valid: T[]
  invalid: T[]
  /** One result per input record, in input order */
  results: ValidationResult[]
}

export interface UrlValidatorOptions {
  logger?: ILogger
  now?: () => Date
}

export class UrlValidator {
  private readonly prober: Prober
  private readonly log: ILogger
  private readonly now: () => Date

  constructor(prober: Prober, options: UrlValidatorOptions = {}) {
    this.prober = prober
    this.log = options.logger ?? loggers.validator
    this.now = options.now ?? (() => new Date())
  }

  async validate<T extends Listing>(records: readonly T[]): Promise<ValidationOutcome<T>> {
    if (records.length === 0) {
      return { valid: [], invalid: [], results: [] }
    }

    this.log.info('Validating URLs', { count: records.length })

    const probes = await Promise.all(records.map(record => this.prober.probe(record.url)))

    const valid: T[] = []
    const invalid: T[] = []
    const results: ValidationResult[] = []

    records.forEach((record, index) => {
      const probe = probes[index]
      results.push(toValidationResult(record, probe, this.now()))
      if (probe.reachable) {
        valid.push(record)
      } else {
        invalid.push(record)
      }
    })

    this.log.info('Validation complete', { valid: valid.length, invalid: invalid.length })
    return { valid, invalid, results }
  }
}

export function toValidationResult(record: Listing, probe: ProbeResult, checkedAt: Date): ValidationResult {
  return {
    url: record.url,
    name: record.name,
    status: probe.statusCode ?? null,
    valid: probe.reachable,
    error: probe.reachable ? null : probe.reason === 'http_status' ? null : probe.error,
    checked_at: checkedAt.toISOString(),
  }
}

export function summarizeValidation(results: readonly ValidationResult[], generatedAt: Date): ValidationSummary {
  const valid = results.filter(result => result.valid).length
  return {
    total_checked: results.length,
    valid,
    invalid: results.length - valid,
    valid_percentage: results.length > 0 ? Math.round((valid / results.length) * 100 * 100) / 100 : 0,
    generated_at: generatedAt.toISOString(),
  }
}

/**
 * Run-level policy for the standalone validator: the run fails when the share
 * of valid URLs is below the threshold.
 */
export function passesThreshold(summary: ValidationSummary, minValidPercentage: number): boolean {
  return summary.valid_percentage >= minValidPercentage
}
