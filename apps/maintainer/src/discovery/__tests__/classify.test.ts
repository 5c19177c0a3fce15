import { describe, expect, it } from 'vitest'
import { inferCategory, inferProvider, looksLikeCertification, titleCase } from '../classify.js'

const PROVIDER_RULES = [
  { match: 'cloud.google.com', value: 'Google Cloud' },
  { match: 'google.com', value: 'Google' },
  { match: 'coursera.org', value: 'Coursera' },
]

const CATEGORY_RULES = [
  { match: 'cloud', value: 'Cloud Computing' },
  { match: 'security', value: 'Cybersecurity & Information Security' },
]

describe('inferProvider', () => {
  it('uses the first matching rule', () => {
    expect(inferProvider('https://cloud.google.com/learn', PROVIDER_RULES)).toBe('Google Cloud')
    expect(inferProvider('https://skillshop.google.com/', PROVIDER_RULES)).toBe('Google')
    expect(inferProvider('https://www.Coursera.org/learn/x', PROVIDER_RULES)).toBe('Coursera')
  })

  it('falls back to the title-cased first host label without www', () => {
    expect(inferProvider('https://www.pluralsight.com/courses', PROVIDER_RULES)).toBe('Pluralsight')
    expect(inferProvider('https://academy.example.org/', PROVIDER_RULES)).toBe('Academy')
    expect(inferProvider('https://my-school.io/', PROVIDER_RULES)).toBe('My-School')
  })

  it('returns Unknown for unparseable URLs', () => {
    expect(inferProvider('not a url', PROVIDER_RULES)).toBe('Unknown')
  })
})

describe('inferCategory', () => {
  it('returns the first matching rule across title and snippet', () => {
    expect(inferCategory(CATEGORY_RULES, 'Programming & Development', 'Free course', 'Cloud security basics')).toBe(
      'Cloud Computing'
    )
    expect(inferCategory(CATEGORY_RULES, 'Programming & Development', 'Network SECURITY')).toBe(
      'Cybersecurity & Information Security'
    )
  })

  it('falls back to the default category', () => {
    expect(inferCategory(CATEGORY_RULES, 'Programming & Development', 'Rust for beginners')).toBe(
      'Programming & Development'
    )
  })
})

describe('titleCase', () => {
  it('capitalizes the start of every letter run', () => {
    expect(titleCase('freecodecamp')).toBe('Freecodecamp')
    expect(titleCase('ALISON')).toBe('Alison')
    expect(titleCase('not specified')).toBe('Not Specified')
    expect(titleCase('3d-design')).toBe('3D-Design')
  })
})

describe('looksLikeCertification', () => {
  const keywords = ['certif', 'course', 'training', 'learn', 'badge', 'credential']

  it('matches keywords in the title or the URL', () => {
    expect(looksLikeCertification(keywords, 'AWS Certified Cloud Practitioner', 'https://aws.amazon.com/')).toBe(true)
    expect(looksLikeCertification(keywords, 'Kubernetes', 'https://example.com/training/k8s')).toBe(true)
  })

  it('rejects results without any keyword', () => {
    expect(looksLikeCertification(keywords, 'Pricing plans', 'https://example.com/pricing')).toBe(false)
  })
})
