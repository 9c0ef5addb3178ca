/**
 * Security factor
 *
 * Starts from a base score that favors the trusted distribution, subtracts
 * vulnerability penalties, then applies the security-level gate. A gated
 * candidate scores exactly 0 and is dropped by the engine.
 */

import { RECOMMENDATION_SCORING } from '../../config/scoring';
import type { TrustedDistro } from '../../config/app-config';
import type { CandidateAnalysis, Requirement } from '../../types/recommendation';
import { factorScore, type FactorScore, type ScoringContext } from './base-scorer';

const { SECURITY } = RECOMMENDATION_SCORING;

/**
 * Whether the candidate is built on the trusted distribution, judged by its
 * base OS name or by a marker in the image name
 */
export function isTrustedDistro(analysis: CandidateAnalysis, trusted: TrustedDistro): boolean {
  const baseOs = analysis.baseOs.toLowerCase();
  const image = analysis.image.toLowerCase();
  const osName = trusted.osName.toLowerCase();

  return (
    baseOs.includes(osName) ||
    trusted.imageMarkers.some((marker) => image.includes(marker.toLowerCase()))
  );
}

/**
 * Whether the security level rejects the candidate outright
 */
export function failsSecurityGate(analysis: CandidateAnalysis, requirement: Requirement): boolean {
  const { critical, high } = analysis.vulnerabilities;

  switch (requirement.securityLevel) {
    case 'maximum':
      return critical > 0 || high > 0;
    case 'high':
      return (
        critical > requirement.maxCriticalVulnerabilities || high > requirement.maxHighVulnerabilities
      );
    case 'standard':
      return false;
    default: {
      const _exhaustive: never = requirement.securityLevel;
      throw new Error(`Unknown security level: ${String(_exhaustive)}`);
    }
  }
}

export function scoreSecurity(
  analysis: CandidateAnalysis,
  requirement: Requirement,
  context: ScoringContext,
): FactorScore {
  if (failsSecurityGate(analysis, requirement)) {
    return factorScore(SECURITY.GATED);
  }

  const { total, critical, high } = analysis.vulnerabilities;
  let score: number = SECURITY.BASE;

  if (!isTrustedDistro(analysis, context.trustedDistro)) {
    score -= SECURITY.UNTRUSTED_PENALTY;
  }
  if (critical > 0) {
    score -= SECURITY.CRITICAL_PENALTY;
  }
  if (high > 0) {
    score -= SECURITY.HIGH_PENALTY;
  }
  if (total > 10) {
    score -= SECURITY.TOTAL_OVER_10_PENALTY;
  } else if (total > 5) {
    score -= SECURITY.TOTAL_OVER_5_PENALTY;
  }

  score = Math.max(0, score);

  return score > SECURITY.EXCELLENT_ABOVE
    ? factorScore(score, 'Excellent security profile')
    : factorScore(score);
}
