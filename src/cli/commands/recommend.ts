/**
 * Recommend CLI Command
 *
 * Ranks cataloged base images for a language, version and package list.
 */

import { Command } from 'commander';
import type { Logger } from 'pino';
import { appConfig } from '../../config/app-config';
import { ERROR_MESSAGES } from '../../lib/errors';
import { parseRequirement } from '../../services/requirement';
import { isFail } from '../../types';
import { deliverOutput, openEngine } from '../bootstrap';
import {
  addPreferenceOptions,
  parseList,
  resolveRuntime,
  toRequirementInput,
  type CLIOptions,
} from '../config-loader';
import { handleGenericError, handleResultError } from '../error-formatting';
import { renderRecommendations } from '../render';

interface RecommendOptions extends CLIOptions {
  language: string;
  version?: string;
}

export function createRecommendCommand(logger: Logger): Command {
  const command = new Command('recommend')
    .description('Recommend base images for a language runtime')
    .requiredOption('-l, --language <language>', 'programming language (python, node, java, go, dotnet)')
    .option('-v, --version <version>', 'language version, possibly partial (3.12, 20, 17)')
    .option('-p, --packages <list>', 'comma-separated packages the image should provide', parseList);

  addPreferenceOptions(command).action(async (options: RecommendOptions) => {
    const requirement = parseRequirement(
      toRequirementInput(options, { language: options.language, version: options.version }),
    );
    if (isFail(requirement)) {
      handleResultError(requirement, 'Invalid requirement');
    }

    const runtime = resolveRuntime(options, appConfig);

    try {
      const engine = await openEngine(runtime.catalogPath, logger);
      const recommendations = await engine.recommend(requirement.value);

      if (recommendations.length === 0) {
        console.error(ERROR_MESSAGES.NO_MATCH(requirement.value.language, requirement.value.version));
        process.exitCode = 1;
        return;
      }

      await deliverOutput(
        renderRecommendations(recommendations, options.format, runtime.limit),
        options.output,
      );
    } catch (error) {
      handleGenericError('Recommendation failed', error);
    }
  });

  return command;
}
