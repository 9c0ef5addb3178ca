/**
 * Size preference factor
 */

import { RECOMMENDATION_SCORING } from '../../config/scoring';
import type { CandidateAnalysis, Requirement, SizePreference } from '../../types/recommendation';
import { factorScore, type FactorScore } from './base-scorer';

const { SIZE } = RECOMMENDATION_SCORING;

function sizeScoreFor(sizeBytes: number, preference: SizePreference): number {
  switch (preference) {
    case 'minimal':
      if (sizeBytes < SIZE.MINIMAL.SMALL_BELOW) return SIZE.MINIMAL.SMALL;
      if (sizeBytes < SIZE.MINIMAL.MEDIUM_BELOW) return SIZE.MINIMAL.MEDIUM;
      return SIZE.MINIMAL.LARGE;

    case 'balanced':
      if (sizeBytes > SIZE.BALANCED.SWEET_SPOT_ABOVE && sizeBytes < SIZE.BALANCED.SWEET_SPOT_BELOW) {
        return SIZE.BALANCED.SWEET_SPOT;
      }
      if (sizeBytes < SIZE.BALANCED.ACCEPTABLE_BELOW) return SIZE.BALANCED.ACCEPTABLE;
      return SIZE.BALANCED.OTHER;

    case 'full':
      return SIZE.FULL;

    default: {
      const _exhaustive: never = preference;
      throw new Error(`Unknown size preference: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Score the declared image size against the size preference. Unknown size (0) is neutral.
 */
export function scoreSizePreference(analysis: CandidateAnalysis, requirement: Requirement): FactorScore {
  const score =
    analysis.sizeBytes > 0 ? sizeScoreFor(analysis.sizeBytes, requirement.sizePreference) : SIZE.UNKNOWN;

  return score > SIZE.OPTIMAL_ABOVE
    ? factorScore(score, 'Optimal size for requirements')
    : factorScore(score);
}
