import { describe, expect, it } from 'vitest'
import {
  admitCandidates,
  createFrontier,
  extendFrontier,
  isDuplicate,
  normalizeName,
  normalizeUrl,
} from '../dedupe.js'

describe('normalization', () => {
  it('lowercases URLs and strips a single trailing slash', () => {
    expect(normalizeUrl('https://A.com/X/')).toBe('https://a.com/x')
    expect(normalizeUrl('https://a.com/x//')).toBe('https://a.com/x/')
    expect(normalizeUrl('https://a.com/x')).toBe('https://a.com/x')
  })

  it('lowercases names without trimming', () => {
    expect(normalizeName('Intro To Cloud ')).toBe('intro to cloud ')
  })
})

describe('isDuplicate', () => {
  it('rejects a candidate whose name matches even though the URL differs', () => {
    const frontier = createFrontier([{ name: 'Intro to Cloud', url: 'https://a.com/x/' }])

    expect(isDuplicate(frontier, { name: 'Intro to Cloud', url: 'https://a.com/y' })).toBe(true)
  })

  it('rejects a candidate whose URL differs only by a trailing slash', () => {
    const frontier = createFrontier([{ name: 'Cloud Basics', url: 'https://a.com/x' }])

    expect(isDuplicate(frontier, { name: 'Something Else', url: 'https://a.com/x/' })).toBe(true)
  })

  it('compares names case-insensitively', () => {
    const frontier = createFrontier([{ name: 'Intro to Cloud', url: 'https://a.com/x' }])

    expect(isDuplicate(frontier, { name: 'INTRO TO CLOUD', url: 'https://b.com/' })).toBe(true)
    expect(isDuplicate(frontier, { name: 'Intro to Clouds', url: 'https://b.com/' })).toBe(false)
  })
})

describe('extendFrontier', () => {
  it('returns a new frontier and leaves the original untouched', () => {
    const original = createFrontier([{ name: 'A course', url: 'https://a.com/1' }])
    const extended = extendFrontier(original, [{ name: 'B course', url: 'https://a.com/2' }])

    expect(original.urls.size).toBe(1)
    expect(extended.urls.size).toBe(2)
    expect(extended.names.has('b course')).toBe(true)
  })
})

describe('admitCandidates', () => {
  it('deduplicates later candidates against earlier ones from the same pass', () => {
    const frontier = createFrontier([{ name: 'Existing', url: 'https://a.com/existing' }])
    const candidates = [
      { name: 'First Course', url: 'https://a.com/1' },
      { name: 'first course', url: 'https://a.com/2' },
      { name: 'Second Course', url: 'https://A.com/1/' },
      { name: 'Existing', url: 'https://a.com/3' },
      { name: 'Third Course', url: 'https://a.com/3' },
    ]

    const gate = admitCandidates(frontier, candidates)

    expect(gate.admitted.map(c => c.name)).toEqual(['First Course', 'Third Course'])
    expect(gate.rejected.map(c => c.name)).toEqual(['first course', 'Second Course', 'Existing'])
    expect(gate.frontier.urls.has('https://a.com/3')).toBe(true)
    expect(frontier.urls.has('https://a.com/3')).toBe(false)
  })

  it('rejects exactly the candidates isDuplicate flags against the growing frontier', () => {
    let frontier = createFrontier([{ name: 'Cloud Basics', url: 'https://a.com/x' }])
    const candidates = [
      { name: 'Other', url: 'https://A.com/X/' },
      { name: 'CLOUD BASICS', url: 'https://b.com/1' },
      { name: 'Fresh Course', url: 'https://b.com/2/' },
      { name: 'fresh course', url: 'https://c.com/3' },
    ]

    const gate = admitCandidates(frontier, candidates)
    const flagged = candidates.map(candidate => {
      const duplicate = isDuplicate(frontier, candidate)
      if (!duplicate) frontier = extendFrontier(frontier, [candidate])
      return duplicate
    })

    expect(flagged).toEqual([true, true, false, true])
    expect(gate.rejected).toEqual(candidates.filter((_, index) => flagged[index]))
    expect(gate.admitted).toEqual([candidates[2]])
  })
})

