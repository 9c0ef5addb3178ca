/**
 * Centralized error formatting for CLI commands
 * Ensures consistent error messages and exit behavior
 */

import type { Result } from '../types';
import { InvalidRequirementError, extractErrorMessage } from '../lib/errors';

/**
 * Standard error formatting for CLI commands
 */
export function formatError(message: string, error?: unknown): string {
  const baseMessage = `❌ ${message}`;

  if (error === undefined || error === '') {
    return baseMessage;
  }

  return `${baseMessage}: ${typeof error === 'string' ? error : extractErrorMessage(error)}`;
}

/**
 * Handle Result errors consistently across CLI commands
 */
export function handleResultError<T>(result: Result<T>, message: string): never {
  if (result.ok) {
    throw new Error('Called handleResultError on successful result');
  }

  console.error(formatError(message, result.error));
  process.exit(1);
}

/**
 * Handle thrown errors consistently across CLI commands
 */
export function handleGenericError(message: string, error?: unknown): never {
  const label = error instanceof InvalidRequirementError ? 'Invalid requirement' : message;
  console.error(formatError(label, error));
  process.exit(1);
}
