/**
 * Dataset Store
 *
 * Reads and writes the canonical JSON document and the audit artifacts. A
 * missing dataset is an empty one; a dataset that exists but does not parse
 * stops the run before anything is written.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import { loggers } from '../config/logger.js'
import { DatasetCorruptError, DatasetReadError, DatasetWriteError } from '../errors.js'
import type { DatasetDocument, Listing } from '../types.js'

const log = loggers.store

const text = z.string().default('')

const certificationSchema = z.object({
  id: z.number().int().nonnegative().default(0),
  category: text,
  name: text,
  provider: text,
  url: text,
  description: text,
  duration: text,
  level: text,
  prerequisites: text,
  expiration: text,
  discovered_at: z.string().optional(),
  source: z.string().optional(),
  validated: z.boolean().nullable().optional(),
  last_checked: z.string().nullable().optional(),
})

const metadataSchema = z.object({
  total_certifications: z.number().int().nonnegative().default(0),
  last_updated: text,
  categories: z.array(z.string()).default([]),
  providers: z.array(z.string()).default([]),
  levels: z.array(z.string()).default([]),
  validation_run: z.string().optional(),
})

export const datasetSchema = z.object({
  metadata: metadataSchema.default({}),
  certifications: z.array(certificationSchema).default([]),
})

export function emptyDataset(): DatasetDocument {
  return {
    metadata: { total_certifications: 0, last_updated: '', categories: [], providers: [], levels: [] },
    certifications: [],
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export async function loadDataset(path: string): Promise<DatasetDocument> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    if (isMissingFile(error)) {
      log.info('Dataset not found, starting empty', { path })
      return emptyDataset()
    }
    throw new DatasetReadError(path, error)
  }

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    throw new DatasetCorruptError(path, error)
  }

  const parsed = datasetSchema.safeParse(raw)
  if (!parsed.success) {
    throw new DatasetCorruptError(path, parsed.error)
  }

  log.debug('Dataset loaded', { path, records: parsed.data.certifications.length })
  return parsed.data
}

const validationReportSchema = z.object({
  invalid_urls: z.array(z.object({ name: text, url: z.string() })),
})

/**
 * Broken listings from the last validation report, or null when no report
 * has been written yet.
 */
export async function loadInvalidListings(path: string): Promise<Listing[] | null> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    if (isMissingFile(error)) {
      return null
    }
    throw new DatasetReadError(path, error)
  }

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    throw new DatasetCorruptError(path, error)
  }

  const parsed = validationReportSchema.safeParse(raw)
  if (!parsed.success) {
    throw new DatasetCorruptError(path, parsed.error)
  }
  return parsed.data.invalid_urls.map(item => ({ name: item.name, url: item.url }))
}

export function serializeJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, content, 'utf-8')
  } catch (error) {
    throw new DatasetWriteError(path, error)
  }
  log.debug('File written', { path, bytes: Buffer.byteLength(content) })
}

export async function writeJsonFile(path: string, value: unknown): Promise<void> {
  await writeTextFile(path, serializeJson(value))
}

export async function saveDataset(path: string, dataset: DatasetDocument): Promise<void> {
  await writeJsonFile(path, dataset)
  log.info('Dataset saved', { path, records: dataset.certifications.length })
}
