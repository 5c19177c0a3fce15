/**
 * Core Types
 *
 * Records, candidates, network outcomes and report shapes shared by the
 * validation, discovery and reconciliation phases.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Certification Records
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Normalized level vocabulary. Unknown levels are title-cased on import and
 * kept as-is, so the field itself stays a string.
 */
export const KNOWN_LEVELS = [
  'Beginner',
  'Beginner-Intermediate',
  'Intermediate',
  'Intermediate-Advanced',
  'Advanced',
  'Associate',
  'Professional',
  'Expert',
  'Not Specified',
] as const

export type KnownLevel = (typeof KNOWN_LEVELS)[number]

/**
 * A single listing in the canonical dataset.
 *
 * `id` is reassigned on every reconciliation pass and carries no meaning
 * across runs.
 */
export interface CertificationRecord {
  id: number
  category: string
  name: string
  provider: string
  url: string
  description: string
  duration: string
  level: string
  prerequisites: string
  expiration: string

  /** When the record first entered the dataset through discovery */
  discovered_at?: string

  /** Where a discovered record came from (source name or 'web_search') */
  source?: string

  validated?: boolean | null
  last_checked?: string | null
}

/**
 * A provisional record extracted from a scrape or search result.
 * Has no id until the reconciler assigns one.
 */
export type CandidateRecord = Omit<CertificationRecord, 'id'>

/** Anything with the two fields dedupe and reachability checks need. */
export interface Listing {
  name: string
  url: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Discovery Configuration
// ═══════════════════════════════════════════════════════════════════════════════

export interface SourceSelectors {
  /** CSS selector for listing links; every anchor with an href when absent */
  links?: string
}

/** A provider listing page scraped for candidates. Immutable configuration. */
export interface SourceDescriptor {
  readonly name: string
  readonly url: string
  readonly category: string
  readonly provider: string
  readonly selectors: Readonly<SourceSelectors>
}

/** Ordered rule: the first rule whose pattern matches wins. */
export interface KeywordRule {
  readonly match: string
  readonly value: string
}

/** Field defaults stamped on every discovered candidate. */
export interface CandidateDefaults {
  readonly duration: string
  readonly level: string
  /** `{provider}` is replaced with the candidate's provider */
  readonly descriptionTemplate: string
}

export interface DiscoveryConfig {
  readonly sources: readonly SourceDescriptor[]
  readonly searchQueries: readonly string[]
  readonly searchEndpoint: string
  readonly searchResultLimit: number
  readonly maxLinksPerSource: number
  readonly certificationKeywords: readonly string[]
  readonly providerRules: readonly KeywordRule[]
  readonly categoryRules: readonly KeywordRule[]
  readonly defaultCategory: string
  readonly candidateDefaults: CandidateDefaults
}

/**
 * How a listing name becomes a URL slug. Every style lowercases and turns
 * spaces into hyphens; `alphanumeric` also drops anything outside
 * [a-z0-9-], and `collapsed` further merges hyphen runs and trims them.
 */
export type SlugStyle = 'hyphenated' | 'alphanumeric' | 'collapsed'

/** Candidate URL shapes tried for broken links on one provider's domain. */
export interface RepairPattern {
  /** Matched against the broken URL's host */
  readonly domain: string
  readonly slug: SlugStyle
  /** URLs with a `{slug}` placeholder, tried in order */
  readonly templates: readonly string[]
}

export interface UrlRepairConfig {
  /** Known moves, keyed by the broken URL; tried before any pattern */
  readonly replacements: Readonly<Record<string, string>>
  readonly patterns: readonly RepairPattern[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Network Outcomes
// ═══════════════════════════════════════════════════════════════════════════════

export type UnreachableReason =
  | 'http_status' // Final status outside [200, 400)
  | 'timeout' // Request exceeded its own timeout
  | 'network' // Connection refused, DNS, TLS and other transport failures
  | 'invalid_url' // Not an absolute http(s) URL

/**
 * Result of a reachability probe. Failure is data, never an exception.
 */
export type ProbeResult =
  | { reachable: true; url: string; statusCode: number; durationMs: number }
  | {
      reachable: false
      url: string
      reason: UnreachableReason
      statusCode?: number
      error: string
      durationMs: number
    }

/**
 * Result of a page fetch for extraction. `empty` means "no candidates
 * available", not a failure of the run.
 */
export type PageResult =
  | { status: 'ok'; url: string; statusCode: number; body: string }
  | { status: 'empty'; url: string; reason: UnreachableReason; statusCode?: number; error: string }

export interface ValidationResult {
  url: string
  name: string
  status: number | null
  valid: boolean
  error: string | null
  checked_at: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Persisted Documents
// ═══════════════════════════════════════════════════════════════════════════════

export interface DatasetMetadata {
  total_certifications: number
  last_updated: string
  categories: string[]
  providers: string[]
  levels: string[]
  /** Set by maintain runs */
  validation_run?: string
}

export interface DatasetDocument {
  metadata: DatasetMetadata
  certifications: CertificationRecord[]
}

export interface ValidationSummary {
  total_checked: number
  valid: number
  invalid: number
  valid_percentage: number
  generated_at: string
}

export interface ValidationReport {
  summary: ValidationSummary
  invalid_urls: ValidationResult[]
  all_results: ValidationResult[]
}

export interface MaintenanceReport {
  timestamp: string
  previous_count: number
  removed_invalid: number
  discovered_new: number
  duplicates_dropped: number
  final_count: number
  invalid_removed: Listing[]
  new_added: Listing[]
  duplicates: Listing[]
  /** Records dropped for a blank name or URL */
  incomplete: Listing[]
}

export interface UrlFixReport {
  generated_at: string
  /** Broken URL to its reachable replacement */
  fixes: Record<string, string>
  /** Broken URLs with no reachable replacement, dropped from the dataset */
  removals: string[]
  summary: {
    fixed: number
    removed: number
    remaining: number
  }
}

export interface DiscoveriesDocument {
  discovered_at: string
  count: number
  certifications: CandidateRecord[]
}
