import { resolve } from 'node:path'
import { logger } from '../../config/logger.js'
import { loadSettings } from '../../config/settings.js'
import { createRunId, createWorkflowLogger } from '../../config/structured-log.js'
import { runCsvImport } from '../../pipeline/import-csv.js'
import { resolvePaths } from '../../store/paths.js'

interface ImportCsvCommandArgs {
  input: string
}

export async function runImportCsvCommand(args: ImportCsvCommandArgs): Promise<number> {
  const settings = loadSettings()
  const paths = resolvePaths(settings.projectRoot)
  const now = () => new Date()

  const { dataset } = await runCsvImport(
    {
      paths,
      log: createWorkflowLogger(logger.child('import-csv'), {
        workflow: 'import-csv',
        stage: 'start',
        runId: createRunId(now()),
      }),
      now,
    },
    { input: args.input ? resolve(settings.projectRoot, args.input) : undefined }
  )

  console.log(`Processed ${dataset.certifications.length} certifications`)
  console.log(`Categories: ${dataset.metadata.categories.length}`)
  console.log(`Providers: ${dataset.metadata.providers.length}`)
  console.log(`Output: ${paths.csv}, ${paths.dataset}`)
  return 0
}
