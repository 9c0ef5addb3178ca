/**
 * Zod utility functions
 */

import type { z } from 'zod';

/**
 * Flatten Zod issues into a single line: `path: message; path: message`.
 * Issues on the root value are reported without a path prefix.
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
