/**
 * Unified Application Configuration
 *
 * Single source of truth for runtime configuration with Zod validation.
 * Environment variables override the defaults below.
 */

import { z } from 'zod';
import { getEnvValue, parseListEnv } from './env-utils';

/**
 * Flattened configuration defaults
 */
const DEFAULT_CONFIG = {
  CATALOG_PATH: './data/catalog.json',
  RECOMMENDATION_LIMIT: 5,
  DERIVED_PACKAGE_LIMIT: 20,
  DEFAULT_IMAGE_TAG: 'latest',
  TRUSTED_DISTRO: 'azurelinux',
  TRUSTED_IMAGE_MARKERS: ['azurelinux', 'mcr.microsoft.com/azurelinux'],
  TRUSTED_DISTRO_SHORT_CODE: 'azl',
} as const;

const LogLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .default('info');

const TrustedDistroSchema = z.object({
  /** Base OS name that earns the full security base score */
  osName: z.string().min(1).default(DEFAULT_CONFIG.TRUSTED_DISTRO),
  /** Image-name substrings that identify the trusted distribution */
  imageMarkers: z
    .array(z.string().min(1))
    .default(() => [...DEFAULT_CONFIG.TRUSTED_IMAGE_MARKERS]),
  /** Short code treated as a platform marker by the platform-artifact filter */
  shortCode: z.string().min(1).default(DEFAULT_CONFIG.TRUSTED_DISTRO_SHORT_CODE),
});

const AppConfigSchema = z.object({
  logging: z.object({
    level: LogLevelSchema,
  }),
  catalog: z.object({
    path: z.string().min(1).default(DEFAULT_CONFIG.CATALOG_PATH),
  }),
  recommendation: z.object({
    defaultLimit: z.coerce.number().int().positive().default(DEFAULT_CONFIG.RECOMMENDATION_LIMIT),
    packageLimit: z.coerce.number().int().positive().default(DEFAULT_CONFIG.DERIVED_PACKAGE_LIMIT),
    defaultTag: z.string().min(1).default(DEFAULT_CONFIG.DEFAULT_IMAGE_TAG),
    trustedDistro: TrustedDistroSchema,
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type TrustedDistro = z.infer<typeof TrustedDistroSchema>;

/**
 * Create configuration with environment variable overrides and validation
 * @public
 */
export function createAppConfig(): AppConfig {
  const rawConfig = {
    logging: {
      level: getEnvValue('LOG_LEVEL') ?? (getEnvValue('NODE_ENV') === 'development' ? 'debug' : undefined),
    },
    catalog: {
      path: getEnvValue('BASE_IMAGE_CATALOG'),
    },
    recommendation: {
      defaultLimit: getEnvValue('RECOMMENDATION_LIMIT'),
      packageLimit: getEnvValue('DERIVED_PACKAGE_LIMIT'),
      defaultTag: getEnvValue('DEFAULT_IMAGE_TAG'),
      trustedDistro: {
        osName: getEnvValue('TRUSTED_DISTRO'),
        imageMarkers: parseListEnv('TRUSTED_IMAGE_MARKERS'),
        shortCode: getEnvValue('TRUSTED_DISTRO_SHORT_CODE'),
      },
    },
  };

  /**
   * Postcondition: Config is fully validated and type-safe
   * Failure Mode: Throws on invalid configuration to fail fast
   */
  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  return result.data;
}

/**
 * Export the application configuration
 * Creates configuration with environment variable overrides
 * @public
 */
export const appConfig = createAppConfig();
