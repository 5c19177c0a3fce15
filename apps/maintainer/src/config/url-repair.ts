/**
 * Replacement table and per-provider URL patterns used to repair links the
 * validator flagged as broken.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigError } from '../errors.js'
import type { UrlRepairConfig } from '../types.js'

const repairPatternSchema = z.object({
  domain: z.string().min(1),
  slug: z.enum(['hyphenated', 'alphanumeric', 'collapsed']),
  templates: z.array(z.string().includes('{slug}')).min(1),
})

export const urlRepairConfigSchema = z.object({
  replacements: z.record(z.string().url(), z.string().url()).default({}),
  patterns: z.array(repairPatternSchema).default([]),
})

export function parseUrlRepairConfig(raw: unknown): UrlRepairConfig {
  const parsed = urlRepairConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError('Invalid URL repair configuration', parsed.error)
  }
  return parsed.data
}

export async function loadUrlRepairConfig(path: string): Promise<UrlRepairConfig> {
  let raw: unknown
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'))
  } catch (error) {
    throw new ConfigError(`Unable to read URL repair configuration ${path}`, error)
  }
  return parseUrlRepairConfig(raw)
}
