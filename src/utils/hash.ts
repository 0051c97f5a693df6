import { createHash } from 'crypto';

export type IdentityStrategy = 'content' | 'source';

export interface IdentityParts {
  title: string;
  company: string;
  sourceName: string;
  nativeId?: string;
}

function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

function normalizePart(value: string): string {
  return value.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Generates a deterministic identity for a vacancy.
 *
 * - content: title + company, so the same vacancy listed on two providers
 *   collapses to a single identity
 * - source: provider name + provider id, falling back to
 *   provider name + title + company when the provider exposes no id
 */
export function generateJobIdentity(
  parts: IdentityParts,
  strategy: IdentityStrategy = 'content'
): string {
  const title = normalizePart(parts.title);
  const company = normalizePart(parts.company);

  if (strategy === 'source') {
    const nativeId = parts.nativeId?.trim();
    if (nativeId) {
      return sha256(`${parts.sourceName}:${nativeId}`);
    }
    return sha256(`${parts.sourceName}|${title}|${company}`);
  }

  return sha256(`${title}|${company}`);
}
