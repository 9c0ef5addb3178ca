/**
 * From-Image CLI Command
 *
 * Recommends replacements for an image that is already in the catalog, using
 * the image's own language, version and installed packages as the requirement.
 */

import { Command } from 'commander';
import type { Logger } from 'pino';
import { appConfig } from '../../config/app-config';
import { ERROR_MESSAGES } from '../../lib/errors';
import { parseRequirement } from '../../services/requirement';
import { isFail } from '../../types';
import type { ExistingImageRecommendation } from '../../types/recommendation';
import { deliverOutput, openEngine } from '../bootstrap';
import { addPreferenceOptions, resolveRuntime, toRequirementInput, type CLIOptions } from '../config-loader';
import { handleGenericError, handleResultError } from '../error-formatting';
import { renderRecommendations } from '../render';

/**
 * One-line explanation of how the result was obtained, or null for a plain exact match
 */
export function describeOutcome(image: string, result: ExistingImageRecommendation): string | null {
  if (!result.analysis) {
    return ERROR_MESSAGES.IMAGE_NOT_CATALOGED(image);
  }
  if (result.analysis.languages.length === 0) {
    return ERROR_MESSAGES.NO_LANGUAGES_DETECTED(image);
  }
  if (result.recommendations.length === 0) {
    return ERROR_MESSAGES.NO_MATCH(result.requirement.language, result.requirement.version);
  }

  switch (result.relaxation) {
    case 'exact':
      return null;
    case 'major_minor':
      return `No exact version match; showing ${result.requirement.language} ${result.requirement.version ?? ''} images`;
    case 'unconstrained':
      return `No version match; showing ${result.requirement.language} images of any version`;
    default: {
      const _exhaustive: never = result.relaxation;
      throw new Error(`Unknown relaxation stage: ${String(_exhaustive)}`);
    }
  }
}

export function createFromImageCommand(logger: Logger): Command {
  const command = new Command('from-image')
    .description('Recommend base images similar to a cataloged image')
    .argument('<image>', 'image reference, e.g. registry/repository:tag');

  addPreferenceOptions(command).action(async (image: string, options: CLIOptions) => {
    // Language and version are derived from the image; the placeholder only satisfies validation
    const preferences = parseRequirement(toRequirementInput(options, { language: 'unknown' }));
    if (isFail(preferences)) {
      handleResultError(preferences, 'Invalid preferences');
    }

    const runtime = resolveRuntime(options, appConfig);

    try {
      const engine = await openEngine(runtime.catalogPath, logger);
      const result = await engine.recommendFromExistingImage(image, preferences.value);

      const note = describeOutcome(image, result);
      if (note) {
        console.error(note);
      }

      if (result.recommendations.length === 0) {
        process.exitCode = 1;
        return;
      }

      await deliverOutput(
        renderRecommendations(result.recommendations, options.format, runtime.limit),
        options.output,
      );
    } catch (error) {
      handleGenericError('Recommendation failed', error);
    }
  });

  return command;
}
