import { createFrontier } from '../discovery/dedupe.js'
import { discoverCandidates } from '../discovery/discoverer.js'
import type { DiscoveryOutcome } from '../discovery/discoverer.js'
import { buildDiscoveriesDocument, renderDiscoveriesDigest } from '../reports/discoveries-report.js'
import { loadDataset, writeJsonFile, writeTextFile } from '../store/dataset-store.js'
import type { DiscoveryConfig } from '../types.js'
import type { PipelineContext } from './context.js'

export interface DiscoveryRunOptions {
  config: DiscoveryConfig
  sourceDelayMs: number
  searchDelayMs: number
  sleep?: (ms: number) => Promise<void>
}

/**
 * Discovery without merging: candidates new to the dataset are written to
 * the discoveries document for review. The dataset itself is not touched.
 */
export async function runDiscovery(context: PipelineContext, options: DiscoveryRunOptions): Promise<DiscoveryOutcome> {
  const { paths, log } = context
  const dataset = await loadDataset(paths.dataset)

  const outcome = await discoverCandidates(createFrontier(dataset.certifications), {
    fetcher: context.fetcher,
    config: options.config,
    log,
    sourceDelayMs: options.sourceDelayMs,
    searchDelayMs: options.searchDelayMs,
    now: context.now,
    sleep: options.sleep,
  })

  const document = buildDiscoveriesDocument(outcome.accepted, context.now())
  await writeJsonFile(paths.discoveries, document)
  if (document.count > 0) {
    await writeTextFile(paths.discoveriesDigest, renderDiscoveriesDigest(document))
  }

  log.info('DISCOVERY_COMPLETED', {
    stage: 'write',
    existing: dataset.certifications.length,
    discovered: document.count,
    unreachable: outcome.unreachable.length,
    duplicates: outcome.duplicates,
  })
  return outcome
}
