/**
 * In-memory catalog store
 *
 * Holds catalog images in a Map keyed by image name and answers candidate
 * queries with the same semantics as the relational store: language match,
 * loose version prefix match, total-vulnerability cap, ordering by
 * total vulnerabilities then size.
 */

import type { DetectedLanguage } from '../types/recommendation';
import type {
  CandidateQuery,
  CandidateRow,
  CatalogImage,
  CatalogStore,
  InstalledPackages,
} from './types';

const MAJOR_MINOR_PATTERN = /^(\d+)\.(\d+)/;

/**
 * Loose version match used by candidate queries.
 *
 * A language entry matches when its version or major.minor starts with the
 * requested version. When the request carries a major.minor prefix, a version
 * starting with that prefix or a major.minor equal to it also matches.
 */
export function matchesRequestedVersion(entry: DetectedLanguage, requested: string): boolean {
  const version = entry.version.toLowerCase();
  const majorMinor = entry.majorMinor.toLowerCase();
  const wanted = requested.toLowerCase();

  if (version.startsWith(wanted) || majorMinor.startsWith(wanted)) {
    return true;
  }

  const match = MAJOR_MINOR_PATTERN.exec(requested);
  if (!match) {
    return false;
  }

  const requestedMajorMinor = `${match[1]}.${match[2]}`;
  return version.startsWith(requestedMajorMinor) || majorMinor === requestedMajorMinor;
}

function toCandidateRow(image: CatalogImage, entry: DetectedLanguage): CandidateRow {
  return {
    name: image.name,
    language: entry.language,
    langVersion: entry.version,
    majorMinor: entry.majorMinor,
    verified: entry.verified,
    capabilities: image.capabilities.length > 0 ? image.capabilities.join(',') : null,
    sizeBytes: image.sizeBytes,
    baseOsName: image.baseOsName,
    totalVulnerabilities: image.vulnerabilities.total,
    criticalVulnerabilities: image.vulnerabilities.critical,
    highVulnerabilities: image.vulnerabilities.high,
    mediumVulnerabilities: image.vulnerabilities.medium,
    lowVulnerabilities: image.vulnerabilities.low,
  };
}

export class MemoryCatalog implements CatalogStore {
  private readonly images = new Map<string, CatalogImage>();

  constructor(images: Iterable<CatalogImage> = []) {
    for (const image of images) {
      this.add(image);
    }
  }

  /**
   * Insert or replace an image, keyed by name
   */
  add(image: CatalogImage): void {
    this.images.set(image.name, image);
  }

  get size(): number {
    return this.images.size;
  }

  async getCandidates(query: CandidateQuery): Promise<CandidateRow[]> {
    const language = query.language.toLowerCase();
    const rows: CandidateRow[] = [];

    for (const image of this.images.values()) {
      if (
        query.maxVulnerabilities !== undefined &&
        image.vulnerabilities.total > query.maxVulnerabilities
      ) {
        continue;
      }

      // One row per image: the first language entry satisfying the query
      const entry = image.languages.find(
        (lang) =>
          lang.language.toLowerCase() === language &&
          (!query.version || matchesRequestedVersion(lang, query.version)),
      );

      if (entry) {
        rows.push(toCandidateRow(image, entry));
      }
    }

    return rows.sort(
      (a, b) =>
        a.totalVulnerabilities - b.totalVulnerabilities || (a.sizeBytes ?? 0) - (b.sizeBytes ?? 0),
    );
  }

  async getImageByName(name: string): Promise<CatalogImage | null> {
    return this.images.get(name) ?? null;
  }

  async getInstalledPackagesAndManagers(imageName: string): Promise<InstalledPackages> {
    const image = this.images.get(imageName);
    if (!image) {
      return { systemPackages: [], packageManagers: [] };
    }

    return {
      systemPackages: image.systemPackages.map((name) => name.toLowerCase()),
      packageManagers: image.packageManagers.map((name) => name.toLowerCase()),
    };
  }
}
