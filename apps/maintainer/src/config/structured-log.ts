/**
 * Structured logging helpers for maintenance workflows.
 *
 * Every event carries the run envelope (workflow, stage, runId). URLs are
 * logged as host + path + short hash, never with their query strings.
 */

import { createHash } from 'node:crypto'
import type { ILogger } from '@certwatch/logger'

export type WorkflowName = 'maintain' | 'validate' | 'discover' | 'import-csv' | 'fix-urls'

export type LogContext = {
  workflow: WorkflowName
  stage: string
  runId?: string
  source?: string
  query?: string
  [key: string]: unknown
}

type LogMeta = Record<string, unknown>

export interface WorkflowLogger {
  debug(event: string, meta?: LogMeta): void
  info(event: string, meta?: LogMeta): void
  warn(event: string, meta?: LogMeta, err?: unknown): void
  error(event: string, meta?: LogMeta, err?: unknown): void
  fatal(event: string, meta?: LogMeta, err?: unknown): void
  child(extra: Partial<LogContext>): WorkflowLogger
}

export function createWorkflowLogger(base: ILogger, context: LogContext): WorkflowLogger {
  const envelope = compact(context)

  const payload = (event: string, meta?: LogMeta): LogMeta => ({
    event_name: event,
    ...envelope,
    ...(meta ? compact(meta) : {}),
  })

  return {
    debug: (event, meta) => base.debug(event, payload(event, meta)),
    info: (event, meta) => base.info(event, payload(event, meta)),
    warn: (event, meta, err) => base.warn(event, payload(event, meta), err),
    error: (event, meta, err) => base.error(event, payload(event, meta), err),
    fatal: (event, meta, err) => base.fatal(event, payload(event, meta), err),
    child: extra => createWorkflowLogger(base, { ...context, ...compact(extra) }),
  }
}

export function sanitizeUrl(url?: string | null): {
  urlHost?: string
  urlPath?: string
  urlHash?: string
} {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return {
      urlHost: parsed.host,
      urlPath: parsed.pathname,
      urlHash: hashValue(`${parsed.host}${parsed.pathname}`),
    }
  } catch {
    return { urlHash: hashValue(url) }
  }
}

export function hashValue(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16)
}

export function createRunId(now: Date = new Date()): string {
  return `run_${now.toISOString().replace(/[-:.TZ]/g, '').slice(0, 14)}_${hashValue(String(Math.random())).slice(0, 6)}`
}

function compact<T extends Record<string, unknown>>(value: T): T {
  const next: Record<string, unknown> = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next as T
}
