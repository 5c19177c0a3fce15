/**
 * Runtime settings parsed from the environment.
 */

import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { ConfigError } from '../errors.js'

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'

const BUNDLED_DISCOVERY_CONFIG = resolve(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'config',
  'discovery.json'
)

const BUNDLED_URL_REPAIR_CONFIG = resolve(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'config',
  'url-repair.json'
)

const settingsSchema = z.object({
  MAX_CONCURRENT: z.coerce.number().int().positive().default(15),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  SOURCE_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  SEARCH_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),
  MIN_VALID_PERCENTAGE: z.coerce.number().min(0).max(100).default(80),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  PROJECT_ROOT: z.string().min(1).optional(),
  DISCOVERY_CONFIG: z.string().min(1).optional(),
  URL_REPAIR_CONFIG: z.string().min(1).optional(),
})

export interface Settings {
  maxConcurrent: number
  requestTimeoutMs: number
  sourceDelayMs: number
  searchDelayMs: number
  minValidPercentage: number
  userAgent: string
  projectRoot: string
  discoveryConfigPath: string
  urlRepairConfigPath: string
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Settings {
  const parsed = settingsSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError('Invalid environment settings', parsed.error)
  }

  const values = parsed.data
  const projectRoot = resolve(cwd, values.PROJECT_ROOT ?? '.')

  return {
    maxConcurrent: values.MAX_CONCURRENT,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    sourceDelayMs: values.SOURCE_DELAY_MS,
    searchDelayMs: values.SEARCH_DELAY_MS,
    minValidPercentage: values.MIN_VALID_PERCENTAGE,
    userAgent: values.USER_AGENT,
    projectRoot,
    discoveryConfigPath: values.DISCOVERY_CONFIG
      ? resolve(projectRoot, values.DISCOVERY_CONFIG)
      : BUNDLED_DISCOVERY_CONFIG,
    urlRepairConfigPath: values.URL_REPAIR_CONFIG
      ? resolve(projectRoot, values.URL_REPAIR_CONFIG)
      : BUNDLED_URL_REPAIR_CONFIG,
  }
}
