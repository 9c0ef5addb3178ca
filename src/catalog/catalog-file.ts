/**
 * Catalog file loader
 *
 * Reads a catalog export (JSON or YAML) into a MemoryCatalog. The file layout
 * mirrors the relational store's export: snake_case image columns plus nested
 * languages, capabilities, package managers and system packages.
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { Failure, Success, type Result } from '../types';
import { ERROR_MESSAGES, extractErrorMessage } from '../lib/errors';
import { formatZodIssues } from '../lib/zod-utils';
import { MemoryCatalog } from './memory-catalog';
import type { CatalogImage } from './types';

const CountSchema = z
  .number()
  .int()
  .nonnegative()
  .nullish()
  .transform((value) => value ?? 0);

/** Package and manager entries appear either as bare names or as `{ name, version }` rows */
const NamedEntrySchema = z
  .union([z.string().min(1), z.object({ name: z.string().min(1) }).passthrough()])
  .transform((entry) => (typeof entry === 'string' ? entry : entry.name));

const LanguageEntrySchema = z
  .object({
    language: z.string().min(1),
    version: z.string().nullish(),
    major_minor: z.string().nullish(),
    // the relational store keeps booleans as 0/1
    verified: z.union([z.boolean(), z.number()]).optional(),
  })
  .transform((raw) => ({
    language: raw.language,
    version: raw.version ?? '',
    majorMinor: raw.major_minor ?? '',
    verified: Boolean(raw.verified),
  }));

export const CatalogImageSchema = z
  .object({
    name: z.string().min(1),
    size_bytes: CountSchema,
    base_os_name: z.string().nullish(),
    total_vulnerabilities: CountSchema,
    critical_vulnerabilities: CountSchema,
    high_vulnerabilities: CountSchema,
    medium_vulnerabilities: CountSchema,
    low_vulnerabilities: CountSchema,
    languages: z.array(LanguageEntrySchema).default([]),
    capabilities: z.array(z.string().min(1)).default([]),
    package_managers: z.array(NamedEntrySchema).default([]),
    system_packages: z.array(NamedEntrySchema).default([]),
  })
  .transform(
    (raw): CatalogImage => ({
      name: raw.name,
      sizeBytes: raw.size_bytes,
      baseOsName: raw.base_os_name ?? '',
      languages: raw.languages,
      systemPackages: raw.system_packages,
      packageManagers: raw.package_managers,
      capabilities: raw.capabilities,
      vulnerabilities: {
        total: raw.total_vulnerabilities,
        critical: raw.critical_vulnerabilities,
        high: raw.high_vulnerabilities,
        medium: raw.medium_vulnerabilities,
        low: raw.low_vulnerabilities,
      },
    }),
  );

export const CatalogFileSchema = z.object({
  images: z.array(CatalogImageSchema),
});

export type CatalogFileFormat = 'json' | 'yaml';

/**
 * Detect the document format from the file extension
 */
export function detectCatalogFormat(path: string): CatalogFileFormat | null {
  switch (extname(path).toLowerCase()) {
    case '.json':
      return 'json';
    case '.yaml':
    case '.yml':
      return 'yaml';
    default:
      return null;
  }
}

/**
 * Parse catalog document text into validated images
 */
export function parseCatalogDocument(content: string, format: CatalogFileFormat): Result<CatalogImage[]> {
  let document: unknown;
  try {
    document = format === 'json' ? JSON.parse(content) : yaml.load(content);
  } catch (error) {
    return Failure(extractErrorMessage(error));
  }

  const parsed = CatalogFileSchema.safeParse(document);
  if (!parsed.success) {
    return Failure(ERROR_MESSAGES.VALIDATION_FAILED(formatZodIssues(parsed.error)));
  }

  return Success(parsed.data.images);
}

/**
 * Load a catalog file into an in-memory store
 */
export async function loadCatalogFile(path: string): Promise<Result<MemoryCatalog>> {
  const format = detectCatalogFormat(path);
  if (!format) {
    return Failure(ERROR_MESSAGES.CATALOG_UNSUPPORTED_FORMAT(path));
  }

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    return Failure(ERROR_MESSAGES.CATALOG_LOAD_FAILED(path, extractErrorMessage(error)));
  }

  const images = parseCatalogDocument(content, format);
  if (!images.ok) {
    return Failure(ERROR_MESSAGES.CATALOG_LOAD_FAILED(path, images.error));
  }

  return Success(new MemoryCatalog(images.value));
}
