/**
 * Requirement construction and validation
 */

import { z } from 'zod';
import { Failure, Success, type Result } from '../types';
import {
  SECURITY_LEVELS,
  SIZE_PREFERENCES,
  type Requirement,
} from '../types/recommendation';
import { ERROR_MESSAGES } from '../lib/errors';
import { formatZodIssues } from '../lib/zod-utils';

const CountSchema = z.coerce.number().int().nonnegative();

export const RequirementSchema = z.object({
  language: z
    .string({ required_error: ERROR_MESSAGES.LANGUAGE_REQUIRED() })
    .trim()
    .min(1, ERROR_MESSAGES.LANGUAGE_REQUIRED()),
  version: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  packages: z.array(z.string().trim().min(1)).default([]),
  capabilities: z.array(z.string().trim().min(1)).default([]),
  sizePreference: z.enum(SIZE_PREFERENCES).default('balanced'),
  securityLevel: z.enum(SECURITY_LEVELS).default('high'),
  maxVulnerabilities: CountSchema.optional(),
  maxCriticalVulnerabilities: CountSchema.default(0),
  maxHighVulnerabilities: CountSchema.default(0),
});

export type RequirementInput = z.input<typeof RequirementSchema>;

/**
 * Validate untrusted input (CLI flags, JSON) into a Requirement with defaults applied
 */
export function parseRequirement(input: unknown): Result<Requirement> {
  const parsed = RequirementSchema.safeParse(input);
  if (!parsed.success) {
    return Failure(ERROR_MESSAGES.VALIDATION_FAILED(formatZodIssues(parsed.error)));
  }
  return Success(stripUndefined(parsed.data));
}

/**
 * Build a Requirement from typed input, throwing on invalid values
 */
export function createRequirement(input: RequirementInput): Requirement {
  return stripUndefined(RequirementSchema.parse(input));
}

// Keeps optional keys absent rather than present-and-undefined
function stripUndefined(data: z.output<typeof RequirementSchema>): Requirement {
  const { version, maxVulnerabilities, ...rest } = data;
  return {
    ...rest,
    ...(version !== undefined && { version }),
    ...(maxVulnerabilities !== undefined && { maxVulnerabilities }),
  };
}
