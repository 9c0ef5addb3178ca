/**
 * Error handling utilities and message templates
 */

// ============================================================================
// Error Message Templates
// ============================================================================

/**
 * Centralized Error Messages
 *
 * Template functions for parameterized messages shared by the engine,
 * the catalog loader and the CLI.
 */
export const ERROR_MESSAGES = {
  // Requirement errors
  LANGUAGE_REQUIRED: () => 'Requirement must specify a language',
  VALIDATION_FAILED: (issues: string) => `Validation failed: ${issues}`,

  // Catalog errors
  CATALOG_LOAD_FAILED: (path: string, error: string) =>
    `Failed to load catalog ${path}: ${error}\n` +
    `Tip: Catalog files are JSON or YAML documents with a top-level "images" array.`,
  CATALOG_UNSUPPORTED_FORMAT: (path: string) =>
    `Unsupported catalog format: ${path} (expected .json, .yaml or .yml)`,

  // Recommendation outcomes
  IMAGE_NOT_CATALOGED: (image: string) =>
    `Image not found in catalog: ${image}\n` + `Tip: Scan the image to add it to the catalog first.`,
  NO_LANGUAGES_DETECTED: (image: string) =>
    `No language runtimes detected for ${image}; it may only contain system libraries.`,
  NO_MATCH: (language: string, version?: string) =>
    `No suitable images found for ${language}${version ? ` ${version}` : ''}\n` +
    `Tip: Relax security requirements, change the size preference or try another version.`,
} as const;

// ============================================================================
// Error Types
// ============================================================================

/**
 * Raised when a requirement cannot be evaluated at all (missing language).
 * This is the only precondition the recommendation pipeline rejects outright.
 */
export class InvalidRequirementError extends Error {
  constructor(message: string = ERROR_MESSAGES.LANGUAGE_REQUIRED()) {
    super(message);
    this.name = 'InvalidRequirementError';
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Safely extracts error message from unknown error types.
 * Invariant: Always returns a string message
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

