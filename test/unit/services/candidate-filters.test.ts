/**
 * Candidate pre-filter tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  buildPlatformPatterns,
  filterPlatformSpecificImages,
  isPlatformSpecific,
  securityPrefilter,
} from '../../../src/services/candidate-filters';
import { createCandidateRow, createTestRequirement } from '../../__support__/factories/catalog-factory';

describe('isPlatformSpecific', () => {
  const patterns = buildPlatformPatterns(['azl']);

  it.each([
    'registry.example.com/base/python:3.12-arm64',
    'registry.example.com/base/python:3.12-amd64@sha256:0123',
    'registry.example.com/base/python:m1-build',
    'registry.example.com/base/python:3.12_x86',
    'registry.example.com/base/python:3.12-azl',
    'registry.example.com/Base/Python:3.12-ARM64',
    'arm/python:3.12',
  ])('flags %s', (name) => {
    expect(isPlatformSpecific(name, patterns)).toBe(true);
  });

  it.each([
    'registry.example.com/base/python:3.12',
    'registry.example.com/charming/app:1.0',
    'registry.example.com/base/python:3.12-azl3',
    'registry.example.com/base/armada:2.0',
  ])('keeps %s', (name) => {
    expect(isPlatformSpecific(name, patterns)).toBe(false);
  });

  it('only treats the short code as a marker when it is configured', () => {
    expect(isPlatformSpecific('registry.example.com/base/python:3.12-azl', buildPlatformPatterns())).toBe(
      false,
    );
  });
});

describe('filterPlatformSpecificImages', () => {
  it('keeps architecture-neutral rows in order', () => {
    const rows = [
      createCandidateRow({ name: 'registry.example.com/base/python:3.12' }),
      createCandidateRow({ name: 'registry.example.com/base/python:3.12-arm64' }),
      createCandidateRow({ name: 'registry.example.com/base/python:3.11' }),
    ];

    const kept = filterPlatformSpecificImages(rows, buildPlatformPatterns());

    expect(kept.map((row) => row.name)).toEqual([
      'registry.example.com/base/python:3.12',
      'registry.example.com/base/python:3.11',
    ]);
  });
});

describe('securityPrefilter', () => {
  const rows = [
    createCandidateRow({ name: 'clean' }),
    createCandidateRow({ name: 'one-high', totalVulnerabilities: 1, highVulnerabilities: 1 }),
    createCandidateRow({ name: 'one-critical', totalVulnerabilities: 1, criticalVulnerabilities: 1 }),
  ];

  it('applies nothing at standard level', () => {
    const kept = securityPrefilter(rows, createTestRequirement({ securityLevel: 'standard' }));

    expect(kept.map((row) => row.name)).toEqual(['clean', 'one-high', 'one-critical']);
  });

  it('enforces the caps at high level', () => {
    const kept = securityPrefilter(rows, createTestRequirement({ maxHighVulnerabilities: 1 }));

    expect(kept.map((row) => row.name)).toEqual(['clean', 'one-high']);
  });

  it('drops any critical or high vulnerability at maximum level', () => {
    const kept = securityPrefilter(
      rows,
      createTestRequirement({
        securityLevel: 'maximum',
        maxCriticalVulnerabilities: 5,
        maxHighVulnerabilities: 5,
      }),
    );

    expect(kept.map((row) => row.name)).toEqual(['clean']);
  });
});
