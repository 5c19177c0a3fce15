import type { Listing, MaintenanceReport } from '../types.js'
import { MAX_NAME_LENGTH, MAX_TABLE_ROWS, overflowNote, table, truncate } from './markdown.js'

function listingSection(title: string, listings: readonly Listing[]): string[] {
  if (listings.length === 0) {
    return []
  }
  const rows = listings.slice(0, MAX_TABLE_ROWS).map(item => [truncate(item.name, MAX_NAME_LENGTH), item.url])
  return [
    '',
    `## ${title} (${listings.length})`,
    '',
    ...table(['Certification', 'URL'], rows),
    ...overflowNote(listings.length, MAX_TABLE_ROWS),
  ]
}

export function renderMaintenanceSummary(report: MaintenanceReport, options: { dryRun?: boolean } = {}): string {
  const lines = [
    '# Maintenance Summary',
    '',
    `**Run:** ${report.timestamp}${options.dryRun ? ' (dry run, dataset not written)' : ''}`,
    '',
    ...table(
      ['Metric', 'Count'],
      [
        ['Previous count', report.previous_count],
        ['Removed (invalid)', report.removed_invalid],
        ['Added (new)', report.discovered_new],
        ['Duplicates dropped', report.duplicates_dropped],
        ['Final count', report.final_count],
      ]
    ),
    ...listingSection('Removed', report.invalid_removed),
    ...listingSection('Added', report.new_added),
    ...listingSection('Duplicates', report.duplicates),
    ...listingSection('Incomplete', report.incomplete),
  ]

  return `${lines.join('\n')}\n`
}
