/**
 * Recommendation rendering tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  formatDockerfileSnippet,
  formatRecommendations,
  formatRecommendationsJson,
  renderRecommendations,
} from '../../../src/cli/render';
import type { Recommendation } from '../../../src/types/recommendation';
import { MB, createAnalysis } from '../../__support__/factories/catalog-factory';

function createRecommendation(overrides: Partial<Recommendation> = {}): Recommendation {
  return {
    imageName: 'registry.example.com/base/python:3.12',
    score: 0.96,
    languageMatch: true,
    versionMatch: true,
    packageCompatibility: 1,
    sizeScore: 1,
    securityScore: 1,
    reasoning: ['Excellent python support', 'Compatible version'],
    analysis: createAnalysis(),
    ...overrides,
  };
}

describe('formatRecommendations', () => {
  it('renders the empty message for no recommendations', () => {
    expect(formatRecommendations([])).toBe('No suitable images found for your requirements.');
  });

  it('renders one block per recommendation', () => {
    const output = formatRecommendations([
      createRecommendation(),
      createRecommendation({
        imageName: 'docker.io/library/python:3.12',
        score: 0.5,
        reasoning: [],
        analysis: createAnalysis({
          image: 'docker.io/library/python:3.12',
          vulnerabilities: { total: 9, critical: 1, high: 2, medium: 6, low: 0 },
          sizeBytes: 0,
        }),
      }),
    ]);

    expect(output.split('\n')).toEqual([
      '🔍 Recommended Base Images:',
      '',
      '1. registry.example.com/base/python:3.12',
      '   Score: 0.96/1.00',
      '   Reasons: Excellent python support, Compatible version',
      '   Language: python 3.12.4',
      '   Security: ✅ No vulnerabilities found',
      '   Size: 80.0 MB',
      '',
      '2. docker.io/library/python:3.12',
      '   Score: 0.50/1.00',
      '   Reasons: ',
      '   Language: python 3.12.4',
      '   Security: 9 total, 1 critical ⚠️, 2 high ⚠️',
      '',
    ]);
  });

  it('honors the limit', () => {
    const recommendations = [
      createRecommendation({ imageName: 'first' }),
      createRecommendation({ imageName: 'second' }),
    ];

    const output = formatRecommendations(recommendations, 1);

    expect(output).toContain('1. first');
    expect(output).not.toContain('second');
  });

  it('shows unknown for a language without a version', () => {
    const output = formatRecommendations([
      createRecommendation({
        analysis: createAnalysis({
          languages: [{ language: 'python', version: '', majorMinor: '', verified: false }],
        }),
      }),
    ]);

    expect(output.split('\n')).toContain('   Language: python unknown');
  });
});

describe('formatRecommendationsJson', () => {
  it('emits snake_case entries', () => {
    const parsed: unknown = JSON.parse(
      formatRecommendationsJson([createRecommendation({ analysis: createAnalysis({ sizeBytes: 40 * MB }) })]),
    );

    expect(parsed).toEqual([
      {
        image: 'registry.example.com/base/python:3.12',
        score: 0.96,
        language_match: true,
        version_match: true,
        reasoning: ['Excellent python support', 'Compatible version'],
        size_mb: 40,
        languages: [{ language: 'python', version: '3.12.4', major_minor: '3.12' }],
        capabilities: [],
      },
    ]);
  });
});

describe('formatDockerfileSnippet', () => {
  it('starts from the recommended image', () => {
    const lines = formatDockerfileSnippet(createRecommendation()).split('\n');

    expect(lines.slice(0, 5)).toEqual([
      '# Recommended base image',
      'FROM registry.example.com/base/python:3.12',
      '',
      '# Image score: 0.96/1.00',
      '# Reasons: Excellent python support, Compatible version',
    ]);
  });
});

describe('renderRecommendations', () => {
  it('renders the best recommendation for the dockerfile format', () => {
    const output = renderRecommendations(
      [createRecommendation({ imageName: 'best' }), createRecommendation({ imageName: 'runner-up' })],
      'dockerfile',
    );

    expect(output).toContain('FROM best\n');
    expect(output).not.toContain('runner-up');
  });

  it('falls back to the empty message without recommendations', () => {
    expect(renderRecommendations([], 'dockerfile')).toBe('No suitable images found for your requirements.');
    expect(renderRecommendations([], 'json')).toBe('[]');
  });
});
