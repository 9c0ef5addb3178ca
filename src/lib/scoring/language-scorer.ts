/**
 * Language and version factors
 */

import { RECOMMENDATION_SCORING } from '../../config/scoring';
import type { CandidateAnalysis, DetectedLanguage, Requirement } from '../../types/recommendation';
import { factorScore, type FactorScore } from './base-scorer';
import { compareVersions } from './version-compatibility';

const { LANGUAGE, VERSION } = RECOMMENDATION_SCORING;

/**
 * First language entry whose name equals the requested language, ignoring case
 */
export function findLanguageEntry(
  analysis: CandidateAnalysis,
  language: string,
): DetectedLanguage | undefined {
  const target = language.toLowerCase();
  return analysis.languages.find((entry) => entry.language.toLowerCase() === target);
}

/**
 * Score whether the image ships the requested language runtime
 */
export function scoreLanguageMatch(analysis: CandidateAnalysis, requirement: Requirement): FactorScore {
  const entry = findLanguageEntry(analysis, requirement.language);

  let score: number;
  if (entry) {
    score = entry.verified ? LANGUAGE.VERIFIED : LANGUAGE.UNVERIFIED;
  } else if (analysis.baseOs.toLowerCase().includes('linux')) {
    score = LANGUAGE.INSTALLABLE;
  } else {
    score = LANGUAGE.NONE;
  }

  if (score > LANGUAGE.EXCELLENT_ABOVE) {
    return factorScore(score, `Excellent ${requirement.language} support`);
  }
  if (score > LANGUAGE.GOOD_ABOVE) {
    return factorScore(score, `Good ${requirement.language} support`);
  }
  return factorScore(score);
}

/**
 * Raw version score, shared by the version factor and the versionMatch flag
 */
export function versionCompatibility(analysis: CandidateAnalysis, requirement: Requirement): number {
  if (!requirement.version) {
    return VERSION.UNCONSTRAINED;
  }

  const entry = findLanguageEntry(analysis, requirement.language);
  if (!entry) {
    return VERSION.MISSING_LANGUAGE;
  }

  return compareVersions(requirement.version, entry.version, requirement.language.toLowerCase());
}

/**
 * Score how close the image's runtime version is to the requested one
 */
export function scoreVersionCompatibility(
  analysis: CandidateAnalysis,
  requirement: Requirement,
): FactorScore {
  const score = versionCompatibility(analysis, requirement);

  if (score > VERSION.PERFECT_ABOVE) {
    return factorScore(score, 'Perfect version match');
  }
  if (score > VERSION.COMPATIBLE_ABOVE) {
    return factorScore(score, 'Compatible version');
  }
  return factorScore(score);
}
