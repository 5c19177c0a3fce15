import { cleanRows } from '../clean/clean-data.js'
import { reconcile } from '../reconcile/reconciler.js'
import type { ReconcileResult } from '../reconcile/reconciler.js'
import { formatCsv, readCsvFile } from '../store/csv.js'
import { saveDataset, writeTextFile } from '../store/dataset-store.js'
import type { PipelineContext } from './context.js'

/**
 * Rebuild the canonical dataset from a raw CSV export. The cleaned table is
 * written back to the canonical CSV path.
 */
export async function runCsvImport(
  context: Pick<PipelineContext, 'paths' | 'log' | 'now'>,
  options: { input?: string } = {}
): Promise<ReconcileResult> {
  const { paths, log } = context
  const input = options.input ?? paths.csv

  const rows = await readCsvFile(input)
  const cleaned = cleanRows(rows)
  const result = reconcile(cleaned.records, [], { previousCount: rows.length, removed: [], now: context.now() })

  await saveDataset(paths.dataset, result.dataset)
  await writeTextFile(paths.csv, formatCsv(result.dataset.certifications))

  log.info('CSV_IMPORTED', {
    stage: 'write',
    rows: rows.length,
    duplicateUrls: cleaned.duplicates,
    incomplete: cleaned.incomplete,
    duplicateNames: result.report.duplicates_dropped,
    records: result.dataset.certifications.length,
    categories: result.dataset.metadata.categories.length,
    providers: result.dataset.metadata.providers.length,
  })
  return result
}
