/**
 * Application configuration tests
 */

import { describe, it, expect, beforeEach, afterAll } from '@jest/globals';
import { createAppConfig } from '../../../src/config/app-config';

const CONFIG_KEYS = [
  'LOG_LEVEL',
  'BASE_IMAGE_CATALOG',
  'RECOMMENDATION_LIMIT',
  'DERIVED_PACKAGE_LIMIT',
  'DEFAULT_IMAGE_TAG',
  'TRUSTED_DISTRO',
  'TRUSTED_IMAGE_MARKERS',
  'TRUSTED_DISTRO_SHORT_CODE',
];

describe('createAppConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv, NODE_ENV: 'test' };
    for (const key of CONFIG_KEYS) {
      delete process.env[key];
    }
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('applies defaults', () => {
    expect(createAppConfig()).toEqual({
      logging: { level: 'info' },
      catalog: { path: './data/catalog.json' },
      recommendation: {
        defaultLimit: 5,
        packageLimit: 20,
        defaultTag: 'latest',
        trustedDistro: {
          osName: 'azurelinux',
          imageMarkers: ['azurelinux', 'mcr.microsoft.com/azurelinux'],
          shortCode: 'azl',
        },
      },
    });
  });

  it('reads overrides from the environment', () => {
    process.env.LOG_LEVEL = 'debug';
    process.env.BASE_IMAGE_CATALOG = '/srv/catalog.yaml';
    process.env.RECOMMENDATION_LIMIT = '3';
    process.env.TRUSTED_DISTRO = 'wolfi';
    process.env.TRUSTED_IMAGE_MARKERS = 'wolfi, chainguard';
    process.env.TRUSTED_DISTRO_SHORT_CODE = 'wlf';

    const config = createAppConfig();

    expect(config.logging.level).toBe('debug');
    expect(config.catalog.path).toBe('/srv/catalog.yaml');
    expect(config.recommendation.defaultLimit).toBe(3);
    expect(config.recommendation.trustedDistro).toEqual({
      osName: 'wolfi',
      imageMarkers: ['wolfi', 'chainguard'],
      shortCode: 'wlf',
    });
  });

  it('defaults to debug logging in development', () => {
    process.env.NODE_ENV = 'development';

    expect(createAppConfig().logging.level).toBe('debug');
  });

  it('prefers LOG_LEVEL over the development default', () => {
    process.env.NODE_ENV = 'development';
    process.env.LOG_LEVEL = 'warn';

    expect(createAppConfig().logging.level).toBe('warn');
  });

  it('fails fast on invalid values', () => {
    process.env.RECOMMENDATION_LIMIT = 'zero';
    expect(() => createAppConfig()).toThrow(/^Configuration validation failed/);
  });

  it('rejects an unknown log level', () => {
    process.env.LOG_LEVEL = 'verbose';
    expect(() => createAppConfig()).toThrow(/^Configuration validation failed/);
  });
});
