/**
 * Version compatibility comparator
 *
 * Ladder, highest first: exact tuple > same major.minor > adjacent minor >
 * same major > different major. The engine's versionMatch threshold (0.7)
 * sits on the adjacent-minor rung, so these constants must not drift.
 */

import { RECOMMENDATION_SCORING } from '../../config/scoring';

const { VERSION } = RECOMMENDATION_SCORING;

const GENERIC_VERSION_PATTERN = /^(\d+)\.(\d+)(?:\.(\d+))?/;

/**
 * Numeric-component patterns per language. Java versions may be a bare major ("17").
 */
const VERSION_PATTERNS: Readonly<Record<string, RegExp>> = {
  python: GENERIC_VERSION_PATTERN,
  node: GENERIC_VERSION_PATTERN,
  java: /^(\d+)(?:\.(\d+))?(?:\.(\d+))?/,
  go: GENERIC_VERSION_PATTERN,
  dotnet: GENERIC_VERSION_PATTERN,
};

/**
 * Extract the numeric components a language's pattern recognizes.
 * Returns null when the string does not start with a recognizable version.
 */
export function parseVersionParts(version: string, language: string): number[] | null {
  const pattern = VERSION_PATTERNS[language.toLowerCase()] ?? GENERIC_VERSION_PATTERN;
  const match = pattern.exec(version);
  if (!match) {
    return null;
  }

  return match
    .slice(1)
    .filter((part): part is string => part !== undefined)
    .map((part) => parseInt(part, 10));
}

function sameParts(a: number[], b: number[]): boolean {
  return a.length === b.length && a.every((part, i) => part === b[i]);
}

/**
 * Score how well an available version satisfies a required one, in [0, 1]
 *
 * @param required - Version the caller asked for, possibly partial ("3.12")
 * @param available - Version the image reports ("3.12.4")
 * @param language - Selects the parsing pattern
 */
export function compareVersions(required: string, available: string, language: string): number {
  if (!required || !available) {
    return VERSION.UNKNOWN;
  }

  const requiredParts = parseVersionParts(required, language);
  const availableParts = parseVersionParts(available, language);

  if (!requiredParts || !availableParts) {
    return required === available ? VERSION.EXACT : VERSION.UNKNOWN;
  }

  if (sameParts(requiredParts, availableParts)) {
    return VERSION.EXACT;
  }

  const [requiredMajor, requiredMinor] = requiredParts;
  const [availableMajor, availableMinor] = availableParts;

  if (requiredMajor !== availableMajor) {
    return VERSION.DIFFERENT_MAJOR;
  }

  if (requiredMinor !== undefined && availableMinor !== undefined) {
    if (requiredMinor === availableMinor) {
      return VERSION.SAME_MINOR;
    }
    if (Math.abs(requiredMinor - availableMinor) === 1) {
      return VERSION.ADJACENT_MINOR;
    }
  }

  return VERSION.SAME_MAJOR;
}
