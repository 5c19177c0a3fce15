import type { ValidationReport, ValidationResult } from '../types.js'
import { summarizeValidation } from '../validator/url-validator.js'
import { MAX_NAME_LENGTH, MAX_TABLE_ROWS, overflowNote, table, truncate } from './markdown.js'

const MAX_ERROR_LENGTH = 30

export function buildValidationReport(results: readonly ValidationResult[], generatedAt: Date): ValidationReport {
  return {
    summary: summarizeValidation(results, generatedAt),
    invalid_urls: results.filter(result => !result.valid),
    all_results: [...results],
  }
}

export function renderValidationStatus(report: ValidationReport): string {
  const { summary, invalid_urls: invalid } = report
  const lines = [
    '# URL Validation Report',
    '',
    `**Generated:** ${summary.generated_at}`,
    '',
    '## Summary',
    '',
    ...table(
      ['Metric', 'Value'],
      [
        ['Total URLs', summary.total_checked],
        ['Valid', summary.valid],
        ['Invalid', summary.invalid],
        ['Success Rate', `${summary.valid_percentage}%`],
      ]
    ),
  ]

  if (invalid.length > 0) {
    const rows = invalid
      .slice(0, MAX_TABLE_ROWS)
      .map(item => [
        truncate(item.name, MAX_NAME_LENGTH),
        item.status ?? 'N/A',
        (item.error ?? 'HTTP Error').slice(0, MAX_ERROR_LENGTH),
      ])
    lines.push(
      '',
      `## Invalid URLs (${invalid.length})`,
      '',
      ...table(['Certification', 'Status', 'Error'], rows),
      ...overflowNote(invalid.length, MAX_TABLE_ROWS)
    )
  }

  return `${lines.join('\n')}\n`
}
