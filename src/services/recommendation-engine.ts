/**
 * Recommendation Engine
 *
 * Ranks catalog candidates against a requirement:
 * query -> security pre-filter -> platform filter -> score -> stable sort.
 *
 * Catalog failures propagate to the caller. A failure while scoring one
 * candidate is logged and that candidate is skipped.
 */

import type { Logger } from 'pino';
import { appConfig, type TrustedDistro } from '../config/app-config';
import { FACTOR_ORDER, RECOMMENDATION_SCORING } from '../config/scoring';
import type { CandidateRow, CatalogStore } from '../catalog/types';
import { ERROR_MESSAGES, InvalidRequirementError, extractErrorMessage } from '../lib/errors';
import { withDefaultTag } from '../lib/image-names';
import { createTimer } from '../lib/logger';
import {
  FACTOR_SCORERS,
  calculateComposite,
  type FactorBreakdown,
  type ScoringContext,
} from '../lib/scoring';
import type {
  CandidateAnalysis,
  ExistingImageRecommendation,
  Recommendation,
  Requirement,
} from '../types/recommendation';
import { analysisFromCandidateRow, analysisFromCatalogImage } from './analysis-view';
import {
  buildPlatformPatterns,
  filterPlatformSpecificImages,
  securityPrefilter,
} from './candidate-filters';
import {
  buildRelaxationLadder,
  collectInstalledPackages,
  deriveRequirement,
  selectPrimaryLanguage,
} from './existing-image';

export interface EngineOptions {
  trustedDistro?: TrustedDistro;
  /** Cap on packages carried into a derived requirement */
  packageLimit?: number;
  /** Tag appended to image identifiers that have none */
  defaultTag?: string;
}

export class RecommendationEngine {
  private readonly context: ScoringContext;
  private readonly packageLimit: number;
  private readonly defaultTag: string;
  private readonly platformPatterns: RegExp[];

  constructor(
    private readonly catalog: CatalogStore,
    private readonly logger: Logger,
    options: EngineOptions = {},
  ) {
    const trustedDistro = options.trustedDistro ?? appConfig.recommendation.trustedDistro;
    this.context = { trustedDistro };
    this.packageLimit = options.packageLimit ?? appConfig.recommendation.packageLimit;
    this.defaultTag = options.defaultTag ?? appConfig.recommendation.defaultTag;
    this.platformPatterns = buildPlatformPatterns([trustedDistro.shortCode]);
  }

  /**
   * Ranked recommendations, highest score first. An empty list means no match.
   *
   * @throws InvalidRequirementError when the requirement has no language
   */
  async recommend(requirement: Requirement): Promise<Recommendation[]> {
    if (!requirement.language.trim()) {
      throw new InvalidRequirementError();
    }

    const timer = createTimer(this.logger, 'recommend', {
      language: requirement.language,
      version: requirement.version,
    });

    try {
      const rows = await this.catalog.getCandidates({
        language: requirement.language,
        ...(requirement.version ? { version: requirement.version } : {}),
        ...(requirement.maxVulnerabilities !== undefined && {
          maxVulnerabilities: requirement.maxVulnerabilities,
        }),
      });

      const secure = securityPrefilter(rows, requirement);
      const candidates = filterPlatformSpecificImages(secure, this.platformPatterns, this.logger);

      timer.checkpoint('candidates filtered', {
        queried: rows.length,
        afterSecurity: secure.length,
        afterPlatform: candidates.length,
        securityLevel: requirement.securityLevel,
      });

      if (candidates.length === 0) {
        this.logger.info(
          { language: requirement.language, version: requirement.version },
          'No images found matching security, language and platform requirements',
        );
        timer.end({ recommendations: 0 });
        return [];
      }

      const recommendations: Recommendation[] = [];
      for (const row of candidates) {
        const recommendation = await this.evaluateCandidate(row, requirement);
        if (recommendation) {
          recommendations.push(recommendation);
        }
      }

      // Array.prototype.sort is stable, so ties keep catalog order
      recommendations.sort((a, b) => b.score - a.score);

      timer.end({ candidates: candidates.length, recommendations: recommendations.length });
      return recommendations;
    } catch (error) {
      timer.error(error);
      throw error;
    }
  }

  /**
   * Recommend replacements for a cataloged image, relaxing the version when nothing matches
   */
  async recommendFromExistingImage(
    imageIdentifier: string,
    requirement: Requirement,
  ): Promise<ExistingImageRecommendation> {
    if (!imageIdentifier.trim()) {
      this.logger.warn({ image: imageIdentifier }, ERROR_MESSAGES.IMAGE_NOT_CATALOGED(imageIdentifier));
      return { analysis: null, recommendations: [], requirement, relaxation: 'exact' };
    }

    const imageName = withDefaultTag(imageIdentifier, this.defaultTag);
    const image = await this.catalog.getImageByName(imageName);

    if (!image) {
      this.logger.warn({ image: imageName }, ERROR_MESSAGES.IMAGE_NOT_CATALOGED(imageName));
      return { analysis: null, recommendations: [], requirement, relaxation: 'exact' };
    }

    const analysis = analysisFromCatalogImage(image);
    const primary = selectPrimaryLanguage(analysis.languages);

    if (!primary) {
      this.logger.warn({ image: imageName }, ERROR_MESSAGES.NO_LANGUAGES_DETECTED(imageName));
      return { analysis, recommendations: [], requirement, relaxation: 'exact' };
    }

    const packages = collectInstalledPackages(analysis, this.packageLimit);
    const derived = deriveRequirement(primary, packages, requirement);

    this.logger.info(
      {
        image: imageName,
        language: derived.language,
        version: derived.version,
        verified: primary.verified,
        packages: packages.length,
      },
      'Derived requirement from existing image',
    );

    for (const attempt of buildRelaxationLadder(derived)) {
      const recommendations = await this.recommend(attempt.requirement);
      this.logger.debug(
        { stage: attempt.stage, version: attempt.requirement.version, found: recommendations.length },
        'Relaxation attempt complete',
      );

      if (recommendations.length > 0) {
        return {
          analysis,
          recommendations,
          requirement: attempt.requirement,
          relaxation: attempt.stage,
        };
      }
    }

    this.logger.warn(
      { image: imageName },
      ERROR_MESSAGES.NO_MATCH(derived.language, derived.version),
    );
    return { analysis, recommendations: [], requirement: derived, relaxation: 'exact' };
  }

  /**
   * Score one candidate; null when it is not viable or its data cannot be scored
   */
  private async evaluateCandidate(
    row: CandidateRow,
    requirement: Requirement,
  ): Promise<Recommendation | null> {
    const installed = await this.catalog.getInstalledPackagesAndManagers(row.name);

    try {
      const analysis = analysisFromCandidateRow(row, installed);
      return this.scoreCandidate(analysis, requirement);
    } catch (error) {
      this.logger.warn(
        { image: row.name, error: extractErrorMessage(error) },
        'Skipping candidate that could not be scored',
      );
      return null;
    }
  }

  private scoreCandidate(analysis: CandidateAnalysis, requirement: Requirement): Recommendation | null {
    const breakdown: FactorBreakdown = { language: 0, version: 0, package: 0, size: 0, security: 0 };
    const reasoning: string[] = [];

    for (const factor of FACTOR_ORDER) {
      const result = FACTOR_SCORERS[factor](analysis, requirement, this.context);
      if (!Number.isFinite(result.score)) {
        throw new Error(`Non-numeric ${factor} score`);
      }
      breakdown[factor] = result.score;
      reasoning.push(...result.reasoning);
    }

    const score = calculateComposite(breakdown);
    if (score <= 0) {
      this.logger.debug({ image: analysis.image }, 'Candidate not viable');
      return null;
    }

    return {
      imageName: analysis.image,
      score,
      // candidates were selected by language
      languageMatch: true,
      versionMatch:
        !requirement.version || breakdown.version >= RECOMMENDATION_SCORING.VERSION.MATCH_AT_LEAST,
      packageCompatibility: breakdown.package,
      sizeScore: breakdown.size,
      securityScore: breakdown.security,
      reasoning,
      analysis,
    };
  }
}
