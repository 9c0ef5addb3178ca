/**
 * Candidate analysis view tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  analysisFromCandidateRow,
  analysisFromCatalogImage,
  splitCapabilities,
} from '../../../src/services/analysis-view';
import { MB, createCandidateRow, createCatalogImage } from '../../__support__/factories/catalog-factory';

describe('splitCapabilities', () => {
  it('splits the joined column and drops blanks', () => {
    expect(splitCapabilities('http_client, tls,,shell')).toEqual(['http_client', 'tls', 'shell']);
    expect(splitCapabilities(null)).toEqual([]);
    expect(splitCapabilities('')).toEqual([]);
  });
});

describe('analysisFromCandidateRow', () => {
  it('carries the matched language and the installed packages', () => {
    const analysis = analysisFromCandidateRow(createCandidateRow({ capabilities: 'http_client' }), {
      systemPackages: ['openssl'],
      packageManagers: ['pip'],
    });

    expect(analysis).toEqual({
      image: 'registry.example.com/base/python:3.12',
      languages: [{ language: 'python', version: '3.12.4', majorMinor: '3.12', verified: true }],
      systemPackages: ['openssl'],
      packageManagers: ['pip'],
      capabilities: ['http_client'],
      vulnerabilities: { total: 0, critical: 0, high: 0, medium: 0, low: 0 },
      sizeBytes: 80 * MB,
      baseOs: 'azurelinux',
    });
  });

  it('normalizes null columns', () => {
    const analysis = analysisFromCandidateRow(
      createCandidateRow({ langVersion: null, majorMinor: null, sizeBytes: null, baseOsName: null }),
      { systemPackages: [], packageManagers: [] },
    );

    expect(analysis.languages).toEqual([
      { language: 'python', version: '', majorMinor: '', verified: true },
    ]);
    expect(analysis.sizeBytes).toBe(0);
    expect(analysis.baseOs).toBe('');
  });

  it('has no languages when the row has none', () => {
    const analysis = analysisFromCandidateRow(createCandidateRow({ language: null }), {
      systemPackages: [],
      packageManagers: [],
    });

    expect(analysis.languages).toEqual([]);
  });
});

describe('analysisFromCatalogImage', () => {
  it('keeps every language and case-folds installed names', () => {
    const image = createCatalogImage({
      languages: [
        { language: 'python', version: '3.12.4', majorMinor: '3.12', verified: false },
        { language: 'node', version: '20.11.1', majorMinor: '20.11', verified: true },
      ],
      systemPackages: ['OpenSSL'],
      packageManagers: ['PIP', 'npm'],
    });

    const analysis = analysisFromCatalogImage(image);

    expect(analysis.languages).toHaveLength(2);
    expect(analysis.systemPackages).toEqual(['openssl']);
    expect(analysis.packageManagers).toEqual(['pip', 'npm']);
  });
});
