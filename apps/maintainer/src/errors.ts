/**
 * Run-level errors.
 *
 * Per-record and per-source failures never reach here: they become
 * partition membership or empty candidate lists. Only failures on canonical
 * state (dataset files, configuration) are raised, and they stop the run.
 */

import { ZodError } from 'zod'

export const ERROR_CODES = {
  DATASET_READ_FAILED: 'DATASET_READ_FAILED',
  DATASET_CORRUPT: 'DATASET_CORRUPT',
  DATASET_WRITE_FAILED: 'DATASET_WRITE_FAILED',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export class MaintainerError extends Error {
  readonly code: ErrorCode
  readonly exitCode: number
  readonly details?: Record<string, unknown>

  constructor(code: ErrorCode, message: string, options: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super(message, { cause: options.cause })
    this.name = new.target.name
    this.code = code
    this.exitCode = 1
    this.details = options.details
  }
}

/** Base for failures on the canonical dataset files. */
export class DatasetError extends MaintainerError {}

export class DatasetReadError extends DatasetError {
  constructor(path: string, cause: unknown) {
    super(ERROR_CODES.DATASET_READ_FAILED, `Failed to read ${path}: ${describeCause(cause)}`, {
      cause,
      details: { path },
    })
  }
}

/**
 * The dataset exists but cannot be parsed. Fatal: overwriting it would
 * silently replace the baseline with partial state.
 */
export class DatasetCorruptError extends DatasetError {
  constructor(path: string, cause: unknown) {
    super(ERROR_CODES.DATASET_CORRUPT, `Dataset ${path} is corrupt: ${describeCause(cause)}`, {
      cause,
      details: { path },
    })
  }
}

export class DatasetWriteError extends DatasetError {
  constructor(path: string, cause: unknown) {
    super(ERROR_CODES.DATASET_WRITE_FAILED, `Failed to write ${path}: ${describeCause(cause)}`, {
      cause,
      details: { path },
    })
  }
}

export class ConfigError extends MaintainerError {
  constructor(message: string, cause?: unknown) {
    super(ERROR_CODES.CONFIGURATION_ERROR, cause === undefined ? message : `${message}: ${describeCause(cause)}`, {
      cause,
    })
  }
}

/**
 * One-line description of an underlying error. Zod issues are flattened to
 * `path: message` pairs.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof ZodError) {
    return cause.issues
      .slice(0, 5)
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
  }
  if (cause instanceof Error) {
    return cause.message
  }
  return String(cause)
}
