/**
 * Recommendation Scoring Configuration
 *
 * Factor weights, reasoning thresholds, size buckets and security penalties.
 * Every score here is on the [0, 1] scale.
 */

const MB = 1024 * 1024;

export const RECOMMENDATION_SCORING = {
  /** Composite weights; they sum to 1 */
  WEIGHTS: {
    language: 0.4,
    version: 0.25,
    package: 0.2,
    size: 0.1,
    security: 0.05,
  },
  LANGUAGE: {
    VERIFIED: 1.0,
    UNVERIFIED: 0.9,
    /** Base OS is Linux, so the runtime could be installed later */
    INSTALLABLE: 0.3,
    NONE: 0.0,
    EXCELLENT_ABOVE: 0.8,
    GOOD_ABOVE: 0.5,
  },
  VERSION: {
    UNCONSTRAINED: 1.0,
    EXACT: 1.0,
    SAME_MINOR: 0.9,
    ADJACENT_MINOR: 0.7,
    SAME_MAJOR: 0.6,
    DIFFERENT_MAJOR: 0.2,
    UNKNOWN: 0.5,
    MISSING_LANGUAGE: 0.0,
    PERFECT_ABOVE: 0.9,
    COMPATIBLE_ABOVE: 0.7,
    /** Recommendation.versionMatch threshold (inclusive) */
    MATCH_AT_LEAST: 0.7,
  },
  PACKAGE: {
    ALL_FOUND: 1.0,
    /** Nothing found but packages can be fetched over HTTP */
    HTTP_CLIENT_FALLBACK: 0.4,
    MINIMAL_SUPPORT: 0.1,
    HTTP_CLIENT_CAPABILITY: 'http_client',
    DETAILED_AT_LEAST: 0.8,
    GOOD_ABOVE: 0.6,
  },
  SIZE: {
    UNKNOWN: 0.5,
    MINIMAL: { SMALL_BELOW: 50 * MB, MEDIUM_BELOW: 100 * MB, SMALL: 1.0, MEDIUM: 0.7, LARGE: 0.3 },
    BALANCED: {
      SWEET_SPOT_ABOVE: 50 * MB,
      SWEET_SPOT_BELOW: 200 * MB,
      ACCEPTABLE_BELOW: 300 * MB,
      SWEET_SPOT: 1.0,
      ACCEPTABLE: 0.8,
      OTHER: 0.5,
    },
    FULL: 1.0,
    OPTIMAL_ABOVE: 0.8,
  },
  SECURITY: {
    BASE: 1.0,
    UNTRUSTED_PENALTY: 0.2,
    CRITICAL_PENALTY: 0.5,
    HIGH_PENALTY: 0.3,
    /** Only the larger total-count penalty applies */
    TOTAL_OVER_10_PENALTY: 0.1,
    TOTAL_OVER_5_PENALTY: 0.05,
    GATED: 0.0,
    EXCELLENT_ABOVE: 0.9,
  },
} as const;

export type FactorName = keyof typeof RECOMMENDATION_SCORING.WEIGHTS;

/** Scorer invocation order; reasoning is accumulated in this order */
export const FACTOR_ORDER = [
  'language',
  'version',
  'package',
  'size',
  'security',
] as const satisfies readonly FactorName[];

/**
 * Architecture and platform tokens that mark an image tag as platform-specific.
 * The trusted distribution's short code is appended at runtime from config.
 */
export const PLATFORM_MARKERS = [
  'arm',
  'amd',
  'x86',
  'aarch64',
  'arm64',
  'armhf',
  'armv7',
  'armv6',
  'i386',
  'i686',
  'x64',
  'amd64',
  'intel',
  'apple',
  'm1',
  'm2',
] as const;
