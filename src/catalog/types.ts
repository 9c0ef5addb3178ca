/**
 * Catalog store contract
 *
 * The recommendation pipeline reads images through this interface only.
 * Implementations own storage, concurrency and query execution; errors they
 * raise propagate to the caller unchanged.
 */

import type { DetectedLanguage, VulnerabilityCounts } from '../types/recommendation';

export interface CandidateQuery {
  language: string;
  /** Loose match: version or major.minor prefix */
  version?: string;
  /** Upper bound on total vulnerabilities */
  maxVulnerabilities?: number;
}

/**
 * One candidate image joined with the language entry that matched the query.
 * Column values may be null when the scan that produced them was incomplete.
 */
export interface CandidateRow {
  name: string;
  language: string | null;
  langVersion: string | null;
  majorMinor: string | null;
  verified: boolean;
  /** Capabilities joined with commas, null when none were recorded */
  capabilities: string | null;
  sizeBytes: number | null;
  baseOsName: string | null;
  totalVulnerabilities: number;
  criticalVulnerabilities: number;
  highVulnerabilities: number;
  mediumVulnerabilities: number;
  lowVulnerabilities: number;
}

/**
 * Installed software for one image, case-folded
 */
export interface InstalledPackages {
  systemPackages: string[];
  packageManagers: string[];
}

/**
 * A fully stored image record
 */
export interface CatalogImage {
  name: string;
  sizeBytes: number;
  baseOsName: string;
  languages: DetectedLanguage[];
  systemPackages: string[];
  packageManagers: string[];
  capabilities: string[];
  vulnerabilities: VulnerabilityCounts;
}

export interface CatalogStore {
  /**
   * Candidates for a language, ordered by total vulnerabilities then size (ascending)
   */
  getCandidates(query: CandidateQuery): Promise<CandidateRow[]>;

  /**
   * Exact name lookup; null when the image is not cataloged
   */
  getImageByName(name: string): Promise<CatalogImage | null>;

  /**
   * Installed system packages and package managers for one image.
   * Unknown images yield empty lists.
   */
  getInstalledPackagesAndManagers(imageName: string): Promise<InstalledPackages>;
}
