/**
 * Candidate analysis view
 *
 * Normalizes a catalog row (or a full catalog image) into the CandidateAnalysis
 * shape every factor scorer reads. Null columns become empty values.
 */

import type { CandidateRow, CatalogImage, InstalledPackages } from '../catalog/types';
import type { CandidateAnalysis } from '../types/recommendation';

/**
 * Split the comma-joined capability column, dropping blanks
 */
export function splitCapabilities(value: string | null): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((capability) => capability.trim())
    .filter(Boolean);
}

/**
 * Build the view for a query row. Only the language entry that matched the
 * query is carried; the installed packages come from a separate lookup.
 */
export function analysisFromCandidateRow(
  row: CandidateRow,
  installed: InstalledPackages,
): CandidateAnalysis {
  return {
    image: row.name,
    languages: row.language
      ? [
          {
            language: row.language,
            version: row.langVersion ?? '',
            majorMinor: row.majorMinor ?? '',
            verified: row.verified,
          },
        ]
      : [],
    systemPackages: installed.systemPackages,
    packageManagers: installed.packageManagers,
    capabilities: splitCapabilities(row.capabilities),
    vulnerabilities: {
      total: row.totalVulnerabilities,
      critical: row.criticalVulnerabilities,
      high: row.highVulnerabilities,
      medium: row.mediumVulnerabilities,
      low: row.lowVulnerabilities,
    },
    sizeBytes: row.sizeBytes ?? 0,
    baseOs: row.baseOsName ?? '',
  };
}

/**
 * Build the view for a stored image with all of its detected languages
 */
export function analysisFromCatalogImage(image: CatalogImage): CandidateAnalysis {
  return {
    image: image.name,
    languages: image.languages,
    systemPackages: image.systemPackages.map((name) => name.toLowerCase()),
    packageManagers: image.packageManagers.map((name) => name.toLowerCase()),
    capabilities: image.capabilities,
    vulnerabilities: image.vulnerabilities,
    sizeBytes: image.sizeBytes,
    baseOs: image.baseOsName,
  };
}
