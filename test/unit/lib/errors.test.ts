/**
 * Error utility tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  ERROR_MESSAGES,
  InvalidRequirementError,
  extractErrorMessage,
} from '../../../src/lib/errors';
import { formatError } from '../../../src/cli/error-formatting';

describe('extractErrorMessage', () => {
  it('reads Error messages and stringifies everything else', () => {
    expect(extractErrorMessage(new Error('boom'))).toBe('boom');
    expect(extractErrorMessage('plain')).toBe('plain');
    expect(extractErrorMessage(42)).toBe('42');
  });
});

describe('InvalidRequirementError', () => {
  it('defaults to the missing-language message', () => {
    const error = new InvalidRequirementError();

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('InvalidRequirementError');
    expect(error.message).toBe('Requirement must specify a language');
  });
});

describe('ERROR_MESSAGES.NO_MATCH', () => {
  it('includes the version only when given', () => {
    expect(ERROR_MESSAGES.NO_MATCH('go').split('\n')[0]).toBe('No suitable images found for go');
    expect(ERROR_MESSAGES.NO_MATCH('go', '1.22').split('\n')[0]).toBe('No suitable images found for go 1.22');
  });
});

describe('formatError', () => {
  it('adds the detail when present', () => {
    expect(formatError('Recommendation failed')).toBe('❌ Recommendation failed');
    expect(formatError('Recommendation failed', new Error('boom'))).toBe('❌ Recommendation failed: boom');
    expect(formatError('Invalid input', 'language missing')).toBe('❌ Invalid input: language missing');
  });
});
