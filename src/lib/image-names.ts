/**
 * Image name utilities
 */

/**
 * Parsed image reference components
 */
export interface ParsedImageName {
  repository: string;
  /** Undefined when the reference carries no tag */
  tag?: string | undefined;
  registry?: string | undefined;
}

/**
 * Parses an image reference into its components
 * Handles formats:
 * - image:tag
 * - registry/image:tag
 * - registry:port/namespace/image:tag
 * - image@sha256:digest (the digest stays on the repository)
 */
export function parseImageName(imageName: string): ParsedImageName {
  const trimmed = imageName.trim();
  if (!trimmed) {
    throw new Error('Image name cannot be empty');
  }

  // A tag is the part after the last colon with no slash after it; digests are not tags
  const tagMatch = /^(.+?)(?::([^/@]+))?$/.exec(trimmed);
  const repositoryPart = tagMatch?.[1];
  if (!repositoryPart || repositoryPart.includes('@')) {
    return { repository: trimmed };
  }

  let registry: string | undefined;
  let repository = repositoryPart;

  const [firstPart, ...rest] = repositoryPart.split('/');
  if (
    rest.length > 0 &&
    firstPart &&
    (firstPart.includes('.') || firstPart.includes(':') || firstPart === 'localhost')
  ) {
    registry = firstPart;
    repository = rest.join('/');
  }

  const result: ParsedImageName = { repository };
  if (tagMatch?.[2] !== undefined) {
    result.tag = tagMatch[2];
  }
  if (registry !== undefined) {
    result.registry = registry;
  }
  return result;
}

/**
 * Append the default tag when the reference has neither a tag nor a digest
 */
export function withDefaultTag(imageName: string, defaultTag: string): string {
  const parsed = parseImageName(imageName);
  if (parsed.tag !== undefined || parsed.repository.includes('@')) {
    return imageName.trim();
  }
  return `${imageName.trim()}:${defaultTag}`;
}

/**
 * Format byte size in human-readable form with one decimal
 *
 * @example
 * formatSize(512) // "512 B"
 * formatSize(1536) // "1.5 KB"
 * formatSize(45 * 1024 * 1024) // "45.0 MB"
 */
export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${Math.max(0, bytes)} B`;

  const units = ['KB', 'MB', 'GB', 'TB'];
  let size = bytes / 1024;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(1)} ${units[unitIndex] ?? 'TB'}`;
}
