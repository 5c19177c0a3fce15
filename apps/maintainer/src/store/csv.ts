/**
 * Tabular mirror of the dataset: one row per record, fixed column order.
 */

import { readFile } from 'node:fs/promises'
import { parse as csvParse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import { z } from 'zod'
import { DatasetCorruptError, DatasetReadError } from '../errors.js'
import type { CertificationRecord } from '../types.js'

export const CSV_COLUMNS = [
  'Category',
  'Certification_Name',
  'Provider',
  'URL',
  'Description',
  'Duration',
  'Level',
  'Prerequisites',
  'Expiration',
] as const

export type CsvColumn = (typeof CSV_COLUMNS)[number]

export type CsvRow = Partial<Record<CsvColumn, string>>

const rowsSchema = z.array(z.record(z.string()))

export function toCsvRow(record: CertificationRecord): Record<CsvColumn, string> {
  return {
    Category: record.category,
    Certification_Name: record.name,
    Provider: record.provider,
    URL: record.url,
    Description: record.description,
    Duration: record.duration,
    Level: record.level,
    Prerequisites: record.prerequisites,
    Expiration: record.expiration,
  }
}

export function formatCsv(records: readonly CertificationRecord[]): string {
  return stringify(records.map(toCsvRow), {
    header: true,
    columns: [...CSV_COLUMNS],
  })
}

/**
 * Parse CSV text with a header row. Unknown columns are kept so callers can
 * decide what to ignore; missing cells come back as absent keys.
 */
export function parseCsv(content: string): CsvRow[] {
  const records: unknown = csvParse(content, {
    columns: true,
    skip_empty_lines: true,
    bom: true,
    relax_column_count: true,
  })
  return rowsSchema.parse(records)
}

export async function readCsvFile(path: string): Promise<CsvRow[]> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    throw new DatasetReadError(path, error)
  }

  try {
    return parseCsv(content)
  } catch (error) {
    throw new DatasetCorruptError(path, error)
  }
}
