import { logger } from '../config/logger.js'
import type { Settings } from '../config/settings.js'
import { createRunId, createWorkflowLogger } from '../config/structured-log.js'
import type { WorkflowLogger, WorkflowName } from '../config/structured-log.js'
import { BoundedFetcher } from '../fetch/bounded-fetcher.js'
import type { PageFetcher, Prober } from '../fetch/bounded-fetcher.js'
import { resolvePaths } from '../store/paths.js'
import type { ProjectPaths } from '../store/paths.js'

/** Everything a workflow needs from the outside world. */
export interface PipelineContext {
  paths: ProjectPaths
  fetcher: Prober & PageFetcher
  log: WorkflowLogger
  now: () => Date
}

export function createPipelineContext(settings: Settings, workflow: WorkflowName): PipelineContext {
  const now = () => new Date()
  return {
    paths: resolvePaths(settings.projectRoot),
    fetcher: new BoundedFetcher({
      maxConcurrent: settings.maxConcurrent,
      timeoutMs: settings.requestTimeoutMs,
      userAgent: settings.userAgent,
    }),
    log: createWorkflowLogger(logger.child(workflow), {
      workflow,
      stage: 'start',
      runId: createRunId(now()),
    }),
    now,
  }
}
