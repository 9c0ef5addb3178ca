/**
 * Recommendation scoring
 *
 * Five independent factor scorers combined into a weighted composite.
 */

import type { FactorName } from '../../config/scoring';
import type { FactorScorer } from './base-scorer';
import { scoreLanguageMatch, scoreVersionCompatibility } from './language-scorer';
import { scorePackageEcosystem } from './package-scorer';
import { scoreSecurity } from './security-scorer';
import { scoreSizePreference } from './size-scorer';

export {
  calculateComposite,
  factorScore,
  type FactorBreakdown,
  type FactorScore,
  type FactorScorer,
  type ScoringContext,
} from './base-scorer';
export { compareVersions, parseVersionParts } from './version-compatibility';
export {
  findLanguageEntry,
  scoreLanguageMatch,
  scoreVersionCompatibility,
  versionCompatibility,
} from './language-scorer';
export { checkPackageAvailability, scorePackageEcosystem, type PackageAvailability } from './package-scorer';
export { scoreSizePreference } from './size-scorer';
export { failsSecurityGate, isTrustedDistro, scoreSecurity } from './security-scorer';

/**
 * Scorer per factor. The engine runs them in FACTOR_ORDER.
 */
export const FACTOR_SCORERS: Readonly<Record<FactorName, FactorScorer>> = {
  language: scoreLanguageMatch,
  version: scoreVersionCompatibility,
  package: scorePackageEcosystem,
  size: scoreSizePreference,
  security: scoreSecurity,
};
