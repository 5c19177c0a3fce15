import { createPipelineContext } from '../../pipeline/context.js'
import { runDiscovery } from '../../pipeline/discover.js'
import { loadCommandEnvironment } from './shared.js'

export async function runDiscoverCommand(): Promise<number> {
  const { settings, config } = await loadCommandEnvironment()
  const context = createPipelineContext(settings, 'discover')

  const outcome = await runDiscovery(context, {
    config,
    sourceDelayMs: settings.sourceDelayMs,
    searchDelayMs: settings.searchDelayMs,
  })

  console.log(`Discovered ${outcome.accepted.length} potential new certifications`)
  console.log(`Discoveries saved to ${context.paths.discoveries}`)
  return 0
}
