import type { CandidateRecord, DiscoveriesDocument } from '../types.js'
import { truncate } from './markdown.js'

const MAX_DESCRIPTION_LENGTH = 200

export function buildDiscoveriesDocument(candidates: readonly CandidateRecord[], discoveredAt: Date): DiscoveriesDocument {
  return {
    discovered_at: discoveredAt.toISOString(),
    count: candidates.length,
    certifications: [...candidates],
  }
}

export function renderDiscoveriesDigest(document: DiscoveriesDocument): string {
  const lines = [
    '# New Certification Discoveries',
    '',
    `**Discovered:** ${document.discovered_at}`,
    '',
    `Found **${document.count}** potential new certifications:`,
  ]

  for (const cert of document.certifications) {
    lines.push(
      '',
      `### ${cert.name}`,
      `- **Provider:** ${cert.provider}`,
      `- **Category:** ${cert.category}`,
      `- **URL:** ${cert.url}`,
      `- **Description:** ${truncate(cert.description, MAX_DESCRIPTION_LENGTH)}`
    )
  }

  return `${lines.join('\n')}\n`
}
