import { join } from 'node:path'

export interface ProjectPaths {
  dataDir: string
  dataset: string
  csv: string
  validationReport: string
  validationStatus: string
  maintenanceReport: string
  maintenanceSummary: string
  discoveries: string
  discoveriesDigest: string
  urlFixes: string
}

/** Locations of the canonical files and audit artifacts under a project root. */
export function resolvePaths(projectRoot: string): ProjectPaths {
  const dataDir = join(projectRoot, 'data')
  return {
    dataDir,
    dataset: join(dataDir, 'certifications.json'),
    csv: join(projectRoot, 'free_certifications.csv'),
    validationReport: join(dataDir, 'validation_report.json'),
    validationStatus: join(dataDir, 'VALIDATION_STATUS.md'),
    maintenanceReport: join(dataDir, 'maintenance_report.json'),
    maintenanceSummary: join(dataDir, 'MAINTENANCE_SUMMARY.md'),
    discoveries: join(dataDir, 'discoveries.json'),
    discoveriesDigest: join(dataDir, 'NEW_DISCOVERIES.md'),
    urlFixes: join(dataDir, 'url_fixes.json'),
  }
}
