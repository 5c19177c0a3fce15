import { loadSettings } from '../../config/settings.js'
import { loadUrlRepairConfig } from '../../config/url-repair.js'
import { createPipelineContext } from '../../pipeline/context.js'
import { runUrlRepair } from '../../pipeline/fix-urls.js'

interface FixUrlsCommandArgs {
  dryRun: boolean
}

export async function runFixUrlsCommand(args: FixUrlsCommandArgs): Promise<number> {
  const settings = loadSettings()
  const config = await loadUrlRepairConfig(settings.urlRepairConfigPath)
  const context = createPipelineContext(settings, 'fix-urls')

  const outcome = await runUrlRepair(context, { config, dryRun: args.dryRun })
  if (!outcome) {
    console.error('No validation report found; run validate first')
    return 1
  }

  const { summary } = outcome.report
  console.log(`Fixed:     ${summary.fixed}`)
  console.log(`Removed:   ${summary.removed}`)
  console.log(`Remaining: ${summary.remaining}`)
  console.log(`Report:    ${context.paths.urlFixes}`)
  return 0
}
