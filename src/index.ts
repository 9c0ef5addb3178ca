/**
 * Public API of the base image advisor
 * Build a catalog, hand it to the engine, render the ranked result
 */

// Engine
/** @public */
export { RecommendationEngine, type EngineOptions } from './services/recommendation-engine';
/** @public */
export {
  createRequirement,
  parseRequirement,
  RequirementSchema,
  type RequirementInput,
} from './services/requirement';

// Catalog
/** @public */
export { MemoryCatalog } from './catalog/memory-catalog';
/** @public */
export { loadCatalogFile, parseCatalogDocument, detectCatalogFormat } from './catalog/catalog-file';
/** @public */
export type {
  CandidateQuery,
  CandidateRow,
  CatalogImage,
  CatalogStore,
  InstalledPackages,
} from './catalog/types';

// Scoring building blocks
export {
  compareVersions,
  scoreLanguageMatch,
  scoreVersionCompatibility,
  scorePackageEcosystem,
  scoreSizePreference,
  scoreSecurity,
  calculateComposite,
  type FactorScore,
  type ScoringContext,
} from './lib/scoring';

// Rendering
export {
  formatRecommendations,
  formatRecommendationsJson,
  formatDockerfileSnippet,
  renderRecommendations,
  type OutputFormat,
} from './cli/render';
export { formatSize, parseImageName, withDefaultTag } from './lib/image-names';

// Ambient
export { createLogger, createTimer, type Logger } from './lib/logger';
export { InvalidRequirementError, ERROR_MESSAGES } from './lib/errors';
export { appConfig, createAppConfig, type AppConfig, type TrustedDistro } from './config/app-config';

/** @public */
export type {
  CandidateAnalysis,
  DetectedLanguage,
  ExistingImageRecommendation,
  Recommendation,
  RelaxationStage,
  Requirement,
  SecurityLevel,
  SizePreference,
  VulnerabilityCounts,
} from './types/recommendation';
/** @public */
export { Success, Failure, isFail, type Result } from './types';
