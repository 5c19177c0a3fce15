/**
 * Run-level deduplication against the known universe.
 *
 * The frontier is an immutable value. Concurrent tasks within a phase only
 * read it; the orchestrator replaces it with `extendFrontier` after the phase
 * has joined, which makes the phase boundary explicit.
 */

import type { Listing } from '../types.js'

export interface Frontier {
  readonly urls: ReadonlySet<string>
  readonly names: ReadonlySet<string>
}

/** Lowercase with one trailing slash stripped. */
export function normalizeUrl(url: string): string {
  const lowered = url.toLowerCase()
  return lowered.endsWith('/') ? lowered.slice(0, -1) : lowered
}

/** Lowercase, nothing else. */
export function normalizeName(name: string): string {
  return name.toLowerCase()
}

export const EMPTY_FRONTIER: Frontier = { urls: new Set(), names: new Set() }

export function createFrontier(listings: readonly Listing[]): Frontier {
  return extendFrontier(EMPTY_FRONTIER, listings)
}

export function extendFrontier(frontier: Frontier, listings: readonly Listing[]): Frontier {
  const urls = new Set(frontier.urls)
  const names = new Set(frontier.names)
  for (const listing of listings) {
    urls.add(normalizeUrl(listing.url))
    names.add(normalizeName(listing.name))
  }
  return { urls, names }
}

export function isDuplicate(frontier: Frontier, candidate: Listing): boolean {
  return frontier.urls.has(normalizeUrl(candidate.url)) || frontier.names.has(normalizeName(candidate.name))
}

/**
 * Fold candidates into the frontier in order, keeping only those not already
 * known. Later candidates are checked against earlier accepted ones.
 */
export function admitCandidates<T extends Listing>(
  frontier: Frontier,
  candidates: readonly T[]
): { admitted: T[]; rejected: T[]; frontier: Frontier } {
  const urls = new Set(frontier.urls)
  const names = new Set(frontier.names)
  const growing: Frontier = { urls, names }
  const admitted: T[] = []
  const rejected: T[] = []

  for (const candidate of candidates) {
    if (isDuplicate(growing, candidate)) {
      rejected.push(candidate)
      continue
    }
    urls.add(normalizeUrl(candidate.url))
    names.add(normalizeName(candidate.name))
    admitted.push(candidate)
  }

  return { admitted, rejected, frontier: growing }
}
