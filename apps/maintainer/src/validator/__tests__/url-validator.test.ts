import { describe, expect, it, vi } from 'vitest'
import type { Prober } from '../../fetch/bounded-fetcher.js'
import type { ProbeResult } from '../../types.js'
import { UrlValidator, passesThreshold, summarizeValidation } from '../url-validator.js'

const CHECKED_AT = new Date('2026-03-01T12:00:00.000Z')

function proberFor(unreachable: Set<string>): Prober {
  return {
    probe: vi.fn(async (url: string): Promise<ProbeResult> => {
      // Resolve out of order to prove results are paired by index
      await new Promise(resolve => setTimeout(resolve, url.length % 3))
      if (unreachable.has(url)) {
        return { reachable: false, url, reason: 'http_status', statusCode: 404, error: 'HTTP 404', durationMs: 1 }
      }
      return { reachable: true, url, statusCode: 200, durationMs: 1 }
    }),
  }
}

function listings(count: number): Array<{ name: string; url: string }> {
  return Array.from({ length: count }, (_, i) => ({ name: `Course ${i}`, url: `https://example.com/c/${i}` }))
}

describe('UrlValidator', () => {
  it('partitions records by reachability, preserving input order', async () => {
    const records = listings(6)
    const validator = new UrlValidator(proberFor(new Set([records[1].url, records[4].url])), {
      now: () => CHECKED_AT,
    })

    const outcome = await validator.validate(records)

    expect(outcome.valid.map(r => r.name)).toEqual(['Course 0', 'Course 2', 'Course 3', 'Course 5'])
    expect(outcome.invalid.map(r => r.name)).toEqual(['Course 1', 'Course 4'])
    expect(outcome.results.map(r => r.url)).toEqual(records.map(r => r.url))
    expect(outcome.results[1]).toEqual({
      url: 'https://example.com/c/1',
      name: 'Course 1',
      status: 404,
      valid: false,
      error: null,
      checked_at: '2026-03-01T12:00:00.000Z',
    })
  })

  it('returns empty partitions for empty input without probing', async () => {
    const prober = proberFor(new Set())
    const outcome = await new UrlValidator(prober).validate([])

    expect(outcome).toEqual({ valid: [], invalid: [], results: [] })
    expect(prober.probe).not.toHaveBeenCalled()
  })

  it('records the transport error for unreachable hosts', async () => {
    const prober: Prober = {
      probe: async url => ({ reachable: false, url, reason: 'timeout', error: 'Timeout after 20000ms', durationMs: 20000 }),
    }
    const outcome = await new UrlValidator(prober, { now: () => CHECKED_AT }).validate(listings(1))

    expect(outcome.results[0]).toMatchObject({ status: null, valid: false, error: 'Timeout after 20000ms' })
  })
})

describe('validation threshold', () => {
  async function summaryWithFailures(failures: number) {
    const records = listings(100)
    const unreachable = new Set(records.slice(0, failures).map(r => r.url))
    const outcome = await new UrlValidator(proberFor(unreachable), { now: () => CHECKED_AT }).validate(records)
    return summarizeValidation(outcome.results, CHECKED_AT)
  }

  it('fails when 21 of 100 URLs are unreachable', async () => {
    const summary = await summaryWithFailures(21)

    expect(summary.valid_percentage).toBe(79)
    expect(passesThreshold(summary, 80)).toBe(false)
  })

  it('passes when 15 of 100 URLs are unreachable', async () => {
    const summary = await summaryWithFailures(15)

    expect(summary.valid_percentage).toBe(85)
    expect(passesThreshold(summary, 80)).toBe(true)
  })

  it('passes exactly at the threshold', async () => {
    const summary = await summaryWithFailures(20)

    expect(passesThreshold(summary, 80)).toBe(true)
  })
})

describe('summarizeValidation', () => {
  it('rounds the percentage to two decimals', () => {
    const results = [true, true, false].map((valid, i) => ({
      url: `https://example.com/${i}`,
      name: `Course ${i}`,
      status: valid ? 200 : 500,
      valid,
      error: null,
      checked_at: CHECKED_AT.toISOString(),
    }))

    expect(summarizeValidation(results, CHECKED_AT)).toEqual({
      total_checked: 3,
      valid: 2,
      invalid: 1,
      valid_percentage: 66.67,
      generated_at: '2026-03-01T12:00:00.000Z',
    })
  })

  it('reports 0% for an empty run', () => {
    expect(summarizeValidation([], CHECKED_AT).valid_percentage).toBe(0)
  })
})
