#!/usr/bin/env node
/**
 * Base Image Advisor CLI
 * Command-line interface for ranking cataloged container base images
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { argv } from 'node:process';
import { program } from 'commander';
import { createLogger } from '../lib/logger';
import { createFromImageCommand } from './commands/from-image';
import { createRecommendCommand } from './commands/recommend';
import { handleGenericError } from './error-formatting';

// Recommendations go to stdout, so logs go to stderr
process.env.ADVISOR_CLI = 'true';

// src/cli and dist/cli both sit two levels below the package root
const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8'));
const version =
  typeof packageJson === 'object' &&
  packageJson !== null &&
  'version' in packageJson &&
  typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

const logger = createLogger().child({ module: 'cli' });

program
  .name('base-image-advisor')
  .description('Rank cataloged container base images against language, package, size and security needs')
  .version(version)
  // subcommands own their options, including --version for the language version
  .enablePositionalOptions()
  .addCommand(createRecommendCommand(logger))
  .addCommand(createFromImageCommand(logger))
  .addHelpText(
    'after',
    `

Examples:
  $ base-image-advisor recommend --language python --version 3.12
  $ base-image-advisor recommend -l node -v 20 --packages npm,git --size minimal
  $ base-image-advisor recommend -l java -v 17 --security maximum --format json
  $ base-image-advisor from-image registry.example.com/base/python:3.12

Environment Variables:
  BASE_IMAGE_CATALOG         Catalog file used when --catalog is not given
  RECOMMENDATION_LIMIT       Number of recommendations shown (default: 5)
  DERIVED_PACKAGE_LIMIT      Packages carried over by from-image (default: 20)
  DEFAULT_IMAGE_TAG          Tag appended to untagged images (default: latest)
  TRUSTED_DISTRO             Base OS name that earns the full security score
  TRUSTED_IMAGE_MARKERS      Comma-separated image-name markers of the trusted distribution
  TRUSTED_DISTRO_SHORT_CODE  Trusted distribution code treated as a platform tag marker
  LOG_LEVEL                  Logging level (debug, info, warn, error)
`,
  );

program.parseAsync(argv).catch((error: unknown) => {
  handleGenericError('Command failed', error);
});
