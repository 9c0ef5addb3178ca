/**
 * Recommendation data model
 *
 * Requirement in, ranked Recommendation list out. The CandidateAnalysis view is
 * built once per candidate and shared by every factor scorer.
 */

/**
 * Image size preference. `full` means size is irrelevant.
 */
export type SizePreference = 'minimal' | 'balanced' | 'full';

/**
 * Security strictness. `maximum` rejects any critical or high vulnerability,
 * `high` enforces the requirement's numeric caps, `standard` applies no gate.
 */
export type SecurityLevel = 'standard' | 'high' | 'maximum';

export const SIZE_PREFERENCES = ['minimal', 'balanced', 'full'] as const satisfies readonly SizePreference[];
export const SECURITY_LEVELS = ['standard', 'high', 'maximum'] as const satisfies readonly SecurityLevel[];

/**
 * Caller's search criteria
 */
export interface Requirement {
  /** Language identifier, compared case-insensitively */
  readonly language: string;
  /** Optional, possibly partial version (e.g. "3.12") */
  readonly version?: string;
  /** Package or tool names the candidate should provide, in caller order */
  readonly packages: readonly string[];
  /** Advisory only; not used in scoring */
  readonly capabilities: readonly string[];
  readonly sizePreference: SizePreference;
  readonly securityLevel: SecurityLevel;
  /** Cap on total vulnerabilities, applied by the catalog query */
  readonly maxVulnerabilities?: number;
  readonly maxCriticalVulnerabilities: number;
  readonly maxHighVulnerabilities: number;
}

export interface DetectedLanguage {
  readonly language: string;
  readonly version: string;
  readonly majorMinor: string;
  readonly verified: boolean;
}

export interface VulnerabilityCounts {
  readonly total: number;
  readonly critical: number;
  readonly high: number;
  readonly medium: number;
  readonly low: number;
}

/**
 * Normalized per-image projection used for scoring. Never persisted.
 */
export interface CandidateAnalysis {
  readonly image: string;
  readonly languages: readonly DetectedLanguage[];
  /** Installed system package names, case-folded */
  readonly systemPackages: readonly string[];
  /** Installed package manager names, case-folded */
  readonly packageManagers: readonly string[];
  readonly capabilities: readonly string[];
  readonly vulnerabilities: VulnerabilityCounts;
  /** Declared size; 0 when unknown */
  readonly sizeBytes: number;
  readonly baseOs: string;
}

/**
 * A scored candidate. Lives only for the duration of one request.
 */
export interface Recommendation {
  readonly imageName: string;
  /** Weighted composite in [0, 1] */
  readonly score: number;
  readonly languageMatch: boolean;
  readonly versionMatch: boolean;
  readonly packageCompatibility: number;
  readonly sizeScore: number;
  readonly securityScore: number;
  readonly reasoning: readonly string[];
  readonly analysis: CandidateAnalysis;
}

/**
 * Progressive relaxation states, visited strictly in this order.
 */
export type RelaxationStage = 'exact' | 'major_minor' | 'unconstrained';

export interface ExistingImageRecommendation {
  /** null when the image is not cataloged */
  readonly analysis: CandidateAnalysis | null;
  readonly recommendations: readonly Recommendation[];
  /** The requirement variant that produced `recommendations` */
  readonly requirement: Requirement;
  readonly relaxation: RelaxationStage;
}
