/**
 * Existing-image adapter helpers
 *
 * Turns a cataloged image into a derived requirement and the relaxation ladder
 * the engine walks when the derived requirement matches nothing.
 */

import type {
  CandidateAnalysis,
  DetectedLanguage,
  RelaxationStage,
  Requirement,
} from '../types/recommendation';

const MAJOR_MINOR_PATTERN = /^(\d+)\.(\d+)/;

/**
 * Primary language priority: first verified, else first with a version, else first
 */
export function selectPrimaryLanguage(
  languages: readonly DetectedLanguage[],
): DetectedLanguage | undefined {
  return (
    languages.find((entry) => entry.verified) ??
    languages.find((entry) => entry.version !== '') ??
    languages[0]
  );
}

/**
 * Installed system packages then package managers, de-duplicated in first-seen order
 */
export function collectInstalledPackages(analysis: CandidateAnalysis, limit: number): string[] {
  const unique = new Set([...analysis.systemPackages, ...analysis.packageManagers]);
  return [...unique].slice(0, limit);
}

/**
 * Copy of a requirement with its version replaced, or removed when undefined
 */
export function withVersion(requirement: Requirement, version: string | undefined): Requirement {
  const { version: _previous, ...rest } = requirement;
  return version ? { ...rest, version } : rest;
}

/**
 * Requirement describing the image itself, keeping the caller's size and security preferences
 */
export function deriveRequirement(
  language: DetectedLanguage,
  packages: string[],
  preferences: Requirement,
): Requirement {
  return withVersion({ ...preferences, language: language.language, packages }, language.version);
}

/**
 * major.minor prefix of a version, or undefined when it has fewer than two numeric components
 */
export function truncateToMajorMinor(version: string): string | undefined {
  const match = MAJOR_MINOR_PATTERN.exec(version);
  return match ? `${match[1]}.${match[2]}` : undefined;
}

export interface RelaxationAttempt {
  stage: RelaxationStage;
  requirement: Requirement;
}

/**
 * Requirements to try, strictly in order: exact, major.minor (only when the
 * version has one), then unconstrained. A derived requirement without a
 * version is already unconstrained, so it is tried once.
 */
export function buildRelaxationLadder(derived: Requirement): RelaxationAttempt[] {
  const attempts: RelaxationAttempt[] = [{ stage: 'exact', requirement: derived }];

  const majorMinor = derived.version ? truncateToMajorMinor(derived.version) : undefined;
  if (majorMinor) {
    attempts.push({ stage: 'major_minor', requirement: withVersion(derived, majorMinor) });
  }
  if (derived.version) {
    attempts.push({ stage: 'unconstrained', requirement: withVersion(derived, undefined) });
  }

  return attempts;
}
