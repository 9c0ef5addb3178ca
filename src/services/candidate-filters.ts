/**
 * Candidate pre-filters
 *
 * Cheap elimination passes run on raw catalog rows before any scoring.
 */

import type { Logger } from 'pino';
import { PLATFORM_MARKERS } from '../config/scoring';
import type { CandidateRow } from '../catalog/types';
import type { Requirement } from '../types/recommendation';

/**
 * Drop rows the requirement's security level disqualifies. Mirrors the gate in
 * the security scorer so both stay enforced on their own.
 */
export function securityPrefilter(rows: CandidateRow[], requirement: Requirement): CandidateRow[] {
  switch (requirement.securityLevel) {
    case 'maximum':
      return rows.filter((row) => row.criticalVulnerabilities === 0 && row.highVulnerabilities === 0);
    case 'high':
      return rows.filter(
        (row) =>
          row.criticalVulnerabilities <= requirement.maxCriticalVulnerabilities &&
          row.highVulnerabilities <= requirement.maxHighVulnerabilities,
      );
    case 'standard':
      return rows;
    default: {
      const _exhaustive: never = requirement.securityLevel;
      throw new Error(`Unknown security level: ${String(_exhaustive)}`);
    }
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build the token patterns for the platform filter. A marker only counts when
 * it is bounded by the start or a separator before it and by a separator,
 * a digest `@` or the end after it.
 */
export function buildPlatformPatterns(extraMarkers: readonly string[] = []): RegExp[] {
  return [...PLATFORM_MARKERS, ...extraMarkers].map(
    (marker) => new RegExp(`(?:^|[-_:/.])${escapeRegExp(marker.toLowerCase())}(?:[-_:/.@]|$)`),
  );
}

/**
 * Whether an image name carries an architecture or platform token
 */
export function isPlatformSpecific(imageName: string, patterns: readonly RegExp[]): boolean {
  const name = imageName.toLowerCase();
  return patterns.some((pattern) => pattern.test(name));
}

/**
 * Exclude platform-specific images so recommendations stay architecture-neutral
 */
export function filterPlatformSpecificImages(
  rows: CandidateRow[],
  patterns: readonly RegExp[],
  logger?: Logger,
): CandidateRow[] {
  const kept = rows.filter((row) => {
    const specific = isPlatformSpecific(row.name, patterns);
    if (specific) {
      logger?.debug({ image: row.name }, 'Filtering out platform-specific image');
    }
    return !specific;
  });

  logger?.debug(
    { filtered: rows.length - kept.length, remaining: kept.length },
    'Applied platform-artifact filter',
  );
  return kept;
}
