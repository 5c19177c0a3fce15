/**
 * Discovery configuration: source pages, search queries and the ordered rule
 * tables used for classification. Loaded once and handed to the discovery
 * components, so tests substitute fixtures instead of patching constants.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigError } from '../errors.js'
import type { DiscoveryConfig } from '../types.js'

const keywordRuleSchema = z.object({
  match: z.string().min(1),
  value: z.string().min(1),
})

const sourceSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  category: z.string().min(1),
  provider: z.string().default(''),
  selectors: z
    .object({
      links: z.string().min(1).optional(),
    })
    .default({}),
})

export const discoveryConfigSchema = z.object({
  sources: z.array(sourceSchema),
  searchQueries: z.array(z.string().min(1)),
  searchEndpoint: z.string().url(),
  searchResultLimit: z.number().int().positive().default(10),
  maxLinksPerSource: z.number().int().positive().default(50),
  certificationKeywords: z.array(z.string().min(1)).min(1),
  providerRules: z.array(keywordRuleSchema),
  categoryRules: z.array(keywordRuleSchema),
  defaultCategory: z.string().min(1),
  candidateDefaults: z.object({
    duration: z.string(),
    level: z.string(),
    descriptionTemplate: z.string(),
  }),
})

export function parseDiscoveryConfig(raw: unknown): DiscoveryConfig {
  const parsed = discoveryConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError('Invalid discovery configuration', parsed.error)
  }
  return parsed.data
}

export async function loadDiscoveryConfig(path: string): Promise<DiscoveryConfig> {
  let raw: unknown
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'))
  } catch (error) {
    throw new ConfigError(`Unable to read discovery configuration ${path}`, error)
  }
  return parseDiscoveryConfig(raw)
}
