/**
 * Shared CLI rendering utilities for recommendation output
 */

import { formatSize } from '../lib/image-names';
import type { Recommendation } from '../types/recommendation';

export type OutputFormat = 'text' | 'json' | 'dockerfile';

export const OUTPUT_FORMATS = ['text', 'json', 'dockerfile'] as const satisfies readonly OutputFormat[];

export const NO_RECOMMENDATIONS_MESSAGE = 'No suitable images found for your requirements.';

const MB = 1024 * 1024;

function formatSecurityLine(rec: Recommendation): string {
  const { total, critical, high } = rec.analysis.vulnerabilities;
  if (total === 0) {
    return '   Security: ✅ No vulnerabilities found';
  }

  let line = `   Security: ${total} total`;
  if (critical > 0) line += `, ${critical} critical ⚠️`;
  if (high > 0) line += `, ${high} high ⚠️`;
  return line;
}

/**
 * Plain-text listing of the top recommendations
 */
export function formatRecommendations(recommendations: readonly Recommendation[], limit = 5): string {
  if (recommendations.length === 0) {
    return NO_RECOMMENDATIONS_MESSAGE;
  }

  const lines: string[] = ['🔍 Recommended Base Images:', ''];

  recommendations.slice(0, limit).forEach((rec, index) => {
    lines.push(`${index + 1}. ${rec.imageName}`);
    lines.push(`   Score: ${rec.score.toFixed(2)}/1.00`);
    lines.push(`   Reasons: ${rec.reasoning.join(', ')}`);

    const primary = rec.analysis.languages[0];
    if (primary) {
      lines.push(`   Language: ${primary.language} ${primary.version || 'unknown'}`);
    }

    lines.push(formatSecurityLine(rec));

    if (rec.analysis.sizeBytes > 0) {
      lines.push(`   Size: ${formatSize(rec.analysis.sizeBytes)}`);
    }

    lines.push('');
  });

  return lines.join('\n');
}

/**
 * JSON array of the top recommendations, snake_case keys for downstream tooling
 */
export function formatRecommendationsJson(recommendations: readonly Recommendation[], limit = 5): string {
  const output = recommendations.slice(0, limit).map((rec) => ({
    image: rec.imageName,
    score: rec.score,
    language_match: rec.languageMatch,
    version_match: rec.versionMatch,
    reasoning: rec.reasoning,
    size_mb: rec.analysis.sizeBytes / MB,
    languages: rec.analysis.languages.map((lang) => ({
      language: lang.language,
      version: lang.version,
      major_minor: lang.majorMinor,
    })),
    capabilities: rec.analysis.capabilities,
  }));

  return JSON.stringify(output, null, 2);
}

/**
 * Dockerfile starting point for the best recommendation
 */
export function formatDockerfileSnippet(rec: Recommendation): string {
  return [
    '# Recommended base image',
    `FROM ${rec.imageName}`,
    '',
    `# Image score: ${rec.score.toFixed(2)}/1.00`,
    `# Reasons: ${rec.reasoning.join(', ')}`,
    '',
    '# Your application code here',
    'COPY . /app',
    'WORKDIR /app',
    '',
    'CMD ["your-app-command"]',
    '',
  ].join('\n');
}

/**
 * Render recommendations in the requested format
 */
export function renderRecommendations(
  recommendations: readonly Recommendation[],
  format: OutputFormat,
  limit = 5,
): string {
  switch (format) {
    case 'text':
      return formatRecommendations(recommendations, limit);
    case 'json':
      return formatRecommendationsJson(recommendations, limit);
    case 'dockerfile': {
      const best = recommendations[0];
      return best ? formatDockerfileSnippet(best) : NO_RECOMMENDATIONS_MESSAGE;
    }
    default: {
      const _exhaustive: never = format;
      throw new Error(`Unsupported format: ${String(_exhaustive)}`);
    }
  }
}
