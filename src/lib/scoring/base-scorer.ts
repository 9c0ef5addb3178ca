/**
 * Base scorer types shared by the five recommendation factors
 */

import { FACTOR_ORDER, RECOMMENDATION_SCORING, type FactorName } from '../../config/scoring';
import type { TrustedDistro } from '../../config/app-config';
import type { CandidateAnalysis, Requirement } from '../../types/recommendation';

/**
 * Outcome of one factor: a [0, 1] score plus any reasoning it triggered
 */
export interface FactorScore {
  score: number;
  reasoning: string[];
}

/**
 * Context that is constant for a whole recommendation run
 */
export interface ScoringContext {
  trustedDistro: TrustedDistro;
}

export type FactorScorer = (
  analysis: CandidateAnalysis,
  requirement: Requirement,
  context: ScoringContext,
) => FactorScore;

export type FactorBreakdown = Record<FactorName, number>;

/**
 * Build a factor score, attaching reasoning only when one was produced
 */
export function factorScore(score: number, reason?: string): FactorScore {
  return { score, reasoning: reason ? [reason] : [] };
}

/**
 * Weighted sum of factor scores using the composite weights, clamped to [0, 1]
 */
export function calculateComposite(
  breakdown: FactorBreakdown,
  weights: FactorBreakdown = RECOMMENDATION_SCORING.WEIGHTS,
): number {
  let total = 0;
  for (const factor of FACTOR_ORDER) {
    total += breakdown[factor] * weights[factor];
  }
  return Math.min(1, Math.max(0, total));
}
