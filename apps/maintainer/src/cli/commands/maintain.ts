import { createPipelineContext } from '../../pipeline/context.js'
import { runMaintenance } from '../../pipeline/maintain.js'
import { loadCommandEnvironment } from './shared.js'

interface MaintainCommandArgs {
  skipDiscovery: boolean
  dryRun: boolean
}

export async function runMaintainCommand(args: MaintainCommandArgs): Promise<number> {
  const { settings, config } = await loadCommandEnvironment()
  const context = createPipelineContext(settings, 'maintain')

  const { report } = await runMaintenance(context, {
    config,
    sourceDelayMs: settings.sourceDelayMs,
    searchDelayMs: settings.searchDelayMs,
    skipDiscovery: args.skipDiscovery,
    dryRun: args.dryRun,
  })

  console.log(`Previous count:    ${report.previous_count}`)
  console.log(`Removed (invalid): ${report.removed_invalid}`)
  console.log(`Added (new):       ${report.discovered_new}`)
  console.log(`Final count:       ${report.final_count}`)
  console.log(report.removed_invalid > 0 || report.discovered_new > 0 ? 'Changes detected' : 'No changes')
  return 0
}
