/**
 * CLI Configuration Loader
 *
 * Maps parsed Commander options onto requirement input and runtime settings.
 * Environment-backed defaults come from appConfig; explicit flags win.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { AppConfig } from '../config/app-config';
import type { RequirementInput } from '../services/requirement';
import { SECURITY_LEVELS, SIZE_PREFERENCES, type SecurityLevel, type SizePreference } from '../types/recommendation';
import { OUTPUT_FORMATS, type OutputFormat } from './render';

/**
 * Preference and output options shared by every recommendation command
 */
export interface CLIOptions {
  packages?: string[];
  size: SizePreference;
  security: SecurityLevel;
  maxVulnerabilities?: number;
  maxCritical?: number;
  maxHigh?: number;
  format: OutputFormat;
  limit?: number;
  output?: string;
  catalog?: string;
}

/**
 * Commander argument parser for non-negative integers
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/**
 * Commander argument parser for counts that must be at least 1
 */
export function parsePositiveInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Commander argument parser for comma-separated lists
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Register the shared preference and output options on a command
 */
export function addPreferenceOptions(command: Command): Command {
  return command
    .addOption(
      new Option('-s, --size <preference>', 'size preference')
        .choices(SIZE_PREFERENCES)
        .default('balanced'),
    )
    .addOption(
      new Option('--security <level>', 'security level').choices(SECURITY_LEVELS).default('high'),
    )
    .option('--max-vulnerabilities <count>', 'cap on total vulnerabilities', parseInteger)
    .option('--max-critical <count>', 'allowed critical vulnerabilities at security level high', parseInteger)
    .option('--max-high <count>', 'allowed high vulnerabilities at security level high', parseInteger)
    .addOption(
      new Option('-f, --format <format>', 'output format').choices(OUTPUT_FORMATS).default('text'),
    )
    .option('-n, --limit <count>', 'maximum number of recommendations to show', parsePositiveInteger)
    .option('-o, --output <path>', 'write output to a file instead of stdout')
    .option('-c, --catalog <path>', 'catalog file (.json, .yaml or .yml)');
}

/**
 * Build requirement input from CLI options; the requirement schema validates it
 */
export function toRequirementInput(
  options: CLIOptions,
  target: { language?: string; version?: string } = {},
): RequirementInput {
  return {
    language: target.language ?? '',
    ...(target.version !== undefined && { version: target.version }),
    packages: options.packages ?? [],
    sizePreference: options.size,
    securityLevel: options.security,
    ...(options.maxVulnerabilities !== undefined && { maxVulnerabilities: options.maxVulnerabilities }),
    ...(options.maxCritical !== undefined && { maxCriticalVulnerabilities: options.maxCritical }),
    ...(options.maxHigh !== undefined && { maxHighVulnerabilities: options.maxHigh }),
  };
}

/**
 * Runtime settings resolved from flags over configuration
 */
export interface ResolvedRuntime {
  catalogPath: string;
  limit: number;
}

export function resolveRuntime(options: CLIOptions, config: AppConfig): ResolvedRuntime {
  return {
    catalogPath: options.catalog ?? config.catalog.path,
    limit: options.limit ?? config.recommendation.defaultLimit,
  };
}
