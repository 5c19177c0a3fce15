import { describe, expect, it } from 'vitest'
import { buildCandidate, normalizeTitle } from '../candidate.js'
import type { CandidateContext, RawCandidate } from '../candidate.js'

const CONTEXT: CandidateContext = {
  providerRules: [{ match: 'coursera.org', value: 'Coursera' }],
  defaults: { duration: 'Self-paced', level: 'Beginner', descriptionTemplate: 'Free certification from {provider}' },
  now: new Date('2026-02-10T08:00:00.000Z'),
}

function raw(title: string, overrides: Partial<RawCandidate> = {}): RawCandidate {
  return {
    url: 'https://www.coursera.org/learn/cloud',
    title,
    category: 'Cloud Computing',
    provider: '',
    source: 'Coursera Free Certificates',
    ...overrides,
  }
}

describe('buildCandidate title bounds', () => {
  it('rejects a 4 character title', () => {
    expect(buildCandidate(raw('abcd'), CONTEXT)).toEqual({ ok: false, reason: 'TITLE_TOO_SHORT' })
  })

  it('accepts a 5 character title', () => {
    expect(buildCandidate(raw('abcde'), CONTEXT).ok).toBe(true)
  })

  it('accepts a 200 character title', () => {
    expect(buildCandidate(raw('a'.repeat(200)), CONTEXT).ok).toBe(true)
  })

  it('rejects a 201 character title', () => {
    expect(buildCandidate(raw('a'.repeat(201)), CONTEXT)).toEqual({ ok: false, reason: 'TITLE_TOO_LONG' })
  })

  it('measures the title after collapsing whitespace', () => {
    expect(buildCandidate(raw('  ab \n\t cd  '), CONTEXT)).toEqual({ ok: false, reason: 'TITLE_TOO_SHORT' })
    expect(buildCandidate(raw('  ab \n\t cde  '), CONTEXT)).toMatchObject({
      ok: true,
      candidate: { name: 'ab cde' },
    })
  })
})

describe('buildCandidate fields', () => {
  it('rejects candidates without a URL or title', () => {
    expect(buildCandidate(raw('Valid title', { url: '  ' }), CONTEXT)).toEqual({ ok: false, reason: 'MISSING_FIELD' })
    expect(buildCandidate(raw('   '), CONTEXT)).toEqual({ ok: false, reason: 'MISSING_FIELD' })
  })

  it('infers the provider when none is configured and stamps defaults', () => {
    const result = buildCandidate(raw('Cloud Computing Basics'), CONTEXT)

    expect(result).toEqual({
      ok: true,
      candidate: {
        category: 'Cloud Computing',
        name: 'Cloud Computing Basics',
        provider: 'Coursera',
        url: 'https://www.coursera.org/learn/cloud',
        description: 'Free certification from Coursera',
        duration: 'Self-paced',
        level: 'Beginner',
        prerequisites: '',
        expiration: '',
        discovered_at: '2026-02-10T08:00:00.000Z',
        source: 'Coursera Free Certificates',
      },
    })
  })

  it('keeps a configured provider and an explicit description', () => {
    const result = buildCandidate(
      raw('Cloud Computing Basics', { provider: 'Partner Org', description: 'Hands-on labs' }),
      CONTEXT
    )

    expect(result).toMatchObject({ ok: true, candidate: { provider: 'Partner Org', description: 'Hands-on labs' } })
  })
})

describe('normalizeTitle', () => {
  it('collapses runs of whitespace and trims', () => {
    expect(normalizeTitle('\n  Google   Cloud\tEssentials ')).toBe('Google Cloud Essentials')
  })
})
