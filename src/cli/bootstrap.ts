/**
 * CLI bootstrap helpers
 *
 * Opens the catalog, builds the engine and delivers rendered output. Shared by
 * every recommendation command.
 */

import { writeFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import { loadCatalogFile } from '../catalog/catalog-file';
import { appConfig } from '../config/app-config';
import { RecommendationEngine } from '../services/recommendation-engine';
import { isFail } from '../types';
import { handleResultError } from './error-formatting';

/**
 * Load the catalog file and build an engine over it. Exits on an unreadable catalog.
 */
export async function openEngine(catalogPath: string, logger: Logger): Promise<RecommendationEngine> {
  const catalog = await loadCatalogFile(catalogPath);
  if (isFail(catalog)) {
    handleResultError(catalog, 'Could not open catalog');
  }

  logger.debug({ catalogPath, images: catalog.value.size }, 'Catalog loaded');

  return new RecommendationEngine(catalog.value, logger, {
    trustedDistro: appConfig.recommendation.trustedDistro,
    packageLimit: appConfig.recommendation.packageLimit,
    defaultTag: appConfig.recommendation.defaultTag,
  });
}

/**
 * Print to stdout, or write to a file and confirm on stderr
 */
export async function deliverOutput(output: string, path?: string): Promise<void> {
  if (!path) {
    console.log(output);
    return;
  }

  await writeFile(path, output, 'utf-8');
  console.error(`Recommendations saved to ${path}`);
}
