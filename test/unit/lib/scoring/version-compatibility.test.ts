/**
 * Version compatibility comparator tests
 */

import { describe, it, expect } from '@jest/globals';
import { compareVersions, parseVersionParts } from '../../../../src/lib/scoring/version-compatibility';

describe('parseVersionParts', () => {
  it('extracts numeric components from the start of the version', () => {
    expect(parseVersionParts('3.12.4', 'python')).toEqual([3, 12, 4]);
    expect(parseVersionParts('3.12.4-slim', 'python')).toEqual([3, 12, 4]);
    expect(parseVersionParts('20.11', 'node')).toEqual([20, 11]);
  });

  it('accepts a bare major for java only', () => {
    expect(parseVersionParts('17', 'java')).toEqual([17]);
    expect(parseVersionParts('17', 'python')).toBeNull();
  });

  it('falls back to the generic pattern for unknown languages', () => {
    expect(parseVersionParts('1.75.0', 'rust')).toEqual([1, 75, 0]);
  });

  it('returns null when the version does not start with digits', () => {
    expect(parseVersionParts('v3.12', 'python')).toBeNull();
  });
});

describe('compareVersions', () => {
  it('scores identical tuples as exact', () => {
    expect(compareVersions('3.12', '3.12', 'python')).toBe(1.0);
    expect(compareVersions('3.12.4', '3.12.4', 'python')).toBe(1.0);
  });

  it('scores same major.minor with a different patch as 0.9', () => {
    expect(compareVersions('3.12', '3.12.4', 'python')).toBe(0.9);
    expect(compareVersions('3.12.1', '3.12.4', 'python')).toBe(0.9);
  });

  it('scores adjacent minors as 0.7', () => {
    expect(compareVersions('3.12', '3.11.9', 'python')).toBe(0.7);
    expect(compareVersions('3.12', '3.13.0', 'python')).toBe(0.7);
  });

  it('scores a distant minor on the same major as 0.6', () => {
    expect(compareVersions('3.12', '3.10.1', 'python')).toBe(0.6);
  });

  it('scores a missing minor on the same major as 0.6', () => {
    expect(compareVersions('17', '17.0.9', 'java')).toBe(0.6);
  });

  it('scores a different major as 0.2', () => {
    expect(compareVersions('3.12', '2.7.18', 'python')).toBe(0.2);
    expect(compareVersions('17', '21.0.1', 'java')).toBe(0.2);
  });

  it('returns 0.5 when either side is empty', () => {
    expect(compareVersions('', '3.12', 'python')).toBe(0.5);
    expect(compareVersions('3.12', '', 'python')).toBe(0.5);
  });

  it('compares unparseable versions as strings', () => {
    expect(compareVersions('latest', 'latest', 'python')).toBe(1.0);
    expect(compareVersions('latest', '3.12.4', 'python')).toBe(0.5);
  });

  it('is exact for any non-empty version compared with itself', () => {
    for (const version of ['3.12', '17', '20.11.1', 'nightly']) {
      expect(compareVersions(version, version, 'java')).toBe(1.0);
      expect(compareVersions(version, version, 'node')).toBe(1.0);
    }
  });
});
