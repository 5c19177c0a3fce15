import { fileURLToPath } from 'node:url'
import { describe, expect, it } from 'vitest'
import { loadUrlRepairConfig, parseUrlRepairConfig } from '../../config/url-repair.js'
import { ConfigError } from '../../errors.js'
import { FakeFetcher } from '../../testing/fakes.js'
import type { UrlRepairConfig } from '../../types.js'
import { UrlFixer, replacementCandidates, slugify } from '../url-fixer.js'

const CONFIG: UrlRepairConfig = {
  replacements: {
    'https://www.coursera.org/learn/old-course': 'https://www.coursera.org/learn/new-course',
  },
  patterns: [
    {
      domain: 'coursera.org',
      slug: 'collapsed',
      templates: ['https://www.coursera.org/learn/{slug}', 'https://www.coursera.org/specializations/{slug}'],
    },
    {
      domain: 'learn.microsoft.com',
      slug: 'hyphenated',
      templates: ['https://learn.microsoft.com/en-us/training/paths/{slug}'],
    },
  ],
}

describe('slugify', () => {
  it('hyphenates spaces and keeps everything else', () => {
    expect(slugify('Intro to Python: Basics (2024)', 'hyphenated')).toBe('intro-to-python:-basics-(2024)')
  })

  it('drops characters outside lowercase letters, digits and hyphens', () => {
    expect(slugify('Intro to Python: Basics (2024)', 'alphanumeric')).toBe('intro-to-python-basics-2024')
    expect(slugify('AI  &  You ', 'alphanumeric')).toBe('ai----you-')
  })

  it('merges hyphen runs and trims them', () => {
    expect(slugify('AI  &  You ', 'collapsed')).toBe('ai-you')
  })
})

describe('replacementCandidates', () => {
  it('puts the known replacement first and skips the broken URL itself', () => {
    expect(replacementCandidates({ name: 'Old Course', url: 'https://www.coursera.org/learn/old-course' }, CONFIG)).toEqual([
      'https://www.coursera.org/learn/new-course',
      'https://www.coursera.org/specializations/old-course',
    ])
  })

  it('uses the pattern for the broken URL host', () => {
    expect(
      replacementCandidates({ name: 'Azure Fundamentals', url: 'https://learn.microsoft.com/en-us/training/x' }, CONFIG)
    ).toEqual(['https://learn.microsoft.com/en-us/training/paths/azure-fundamentals'])
  })

  it('has nothing to offer for unknown hosts or unparseable URLs', () => {
    expect(replacementCandidates({ name: 'Some Course', url: 'https://unknown.example.com/x' }, CONFIG)).toEqual([])
    expect(replacementCandidates({ name: 'Some Course', url: 'not a url' }, CONFIG)).toEqual([])
  })

  it('skips patterns when the name leaves an empty slug', () => {
    expect(replacementCandidates({ name: '&&', url: 'https://www.coursera.org/learn/x' }, CONFIG)).toEqual([])
  })
})

describe('UrlFixer', () => {
  it('stops at the first reachable candidate', async () => {
    const fetcher = new FakeFetcher()
    fetcher.live.add('https://www.coursera.org/learn/new-course')
    fetcher.live.add('https://www.coursera.org/specializations/old-course')

    const fixer = new UrlFixer(fetcher, CONFIG)
    const replacement = await fixer.findReplacement({ name: 'Old Course', url: 'https://www.coursera.org/learn/old-course' })

    expect(replacement).toBe('https://www.coursera.org/learn/new-course')
    expect(fetcher.probed).toEqual(['https://www.coursera.org/learn/new-course'])
  })

  it('falls through to the provider pattern when the known replacement is dead', async () => {
    const fetcher = new FakeFetcher()
    fetcher.live.add('https://www.coursera.org/specializations/old-course')

    const fixer = new UrlFixer(fetcher, CONFIG)

    expect(await fixer.findReplacement({ name: 'Old Course', url: 'https://www.coursera.org/learn/old-course' })).toBe(
      'https://www.coursera.org/specializations/old-course'
    )
    expect(fetcher.probed).toEqual([
      'https://www.coursera.org/learn/new-course',
      'https://www.coursera.org/specializations/old-course',
    ])
  })

  it('reports one fix per listing in input order', async () => {
    const fetcher = new FakeFetcher()
    fetcher.live.add('https://learn.microsoft.com/en-us/training/paths/azure-fundamentals')

    const fixes = await new UrlFixer(fetcher, CONFIG).repair([
      { name: 'Gone Course', url: 'https://unknown.example.com/gone' },
      { name: 'Azure Fundamentals', url: 'https://learn.microsoft.com/en-us/training/x' },
    ])

    expect(fixes).toEqual([
      { name: 'Gone Course', url: 'https://unknown.example.com/gone', replacement: null },
      {
        name: 'Azure Fundamentals',
        url: 'https://learn.microsoft.com/en-us/training/x',
        replacement: 'https://learn.microsoft.com/en-us/training/paths/azure-fundamentals',
      },
    ])
  })
})

describe('URL repair configuration', () => {
  it('loads the bundled tables', async () => {
    const config = await loadUrlRepairConfig(fileURLToPath(new URL('../../../config/url-repair.json', import.meta.url)))

    expect(config.patterns.map(pattern => pattern.domain)).toEqual([
      'coursera.org',
      'edx.org',
      'futurelearn.com',
      'learn.microsoft.com',
    ])
    expect(
      replacementCandidates({ name: 'Data Science: Foundations', url: 'https://www.edx.org/course/data-old' }, config)
    ).toEqual(['https://www.edx.org/learn/data-science-foundations', 'https://www.edx.org/course/data-science-foundations'])
  })

  it('rejects templates without a slug placeholder', () => {
    expect(() =>
      parseUrlRepairConfig({ patterns: [{ domain: 'edx.org', slug: 'collapsed', templates: ['https://www.edx.org/'] }] })
    ).toThrow(ConfigError)
  })
})
