/**
 * Content fingerprints and feature vectors.
 * The fingerprint is the cheap equality short-circuit; the feature vector feeds graded similarity.
 */

import { createHash } from 'crypto';
import type { JobSource } from '@reconciler/schemas';
import stopwords from './data/stopwords.json';
import { normalizeSource, type NormalizedContent, type SalaryRange } from './normalize';

export interface FeatureVector {
  /** SHA-256 over the shingle set; null when the posting is non-comparable. */
  fingerprint: string | null;
  /** Weighted term frequencies; title terms count double. */
  terms: Map<string, number>;
  norm: number;
  locationTokens: string[];
  salary: SalaryRange | null;
}

export interface PreparedSource {
  source: JobSource;
  content: NormalizedContent;
  features: FeatureVector;
}

export const SHINGLE_SIZE = 3;
const TITLE_TERM_WEIGHT = 2;
const STOPWORDS = new Set<string>(stopwords);

/**
 * Sorted, unique word n-grams. Sequences shorter than `size` yield a single shingle.
 */
export function shingle(tokens: string[], size: number = SHINGLE_SIZE): string[] {
  if (tokens.length === 0) return [];
  if (tokens.length < size) return [tokens.join(' ')];

  const shingles = new Set<string>();
  for (let i = 0; i + size <= tokens.length; i++) {
    shingles.add(tokens.slice(i, i + size).join(' '));
  }
  return [...shingles].sort();
}

export function computeContentFingerprint(content: NormalizedContent): string | null {
  if (!content.comparable) return null;
  const shingles = shingle([...content.titleTokens, '|', ...content.descriptionTokens]);
  return createHash('sha256').update(shingles.join('\n')).digest('hex');
}

function isTerm(token: string): boolean {
  return !STOPWORDS.has(token) && (token.length > 1 || /\d/.test(token));
}

export function buildFeatureVector(content: NormalizedContent): FeatureVector {
  const terms = new Map<string, number>();
  const add = (token: string, weight: number) => {
    if (!isTerm(token)) return;
    terms.set(token, (terms.get(token) ?? 0) + weight);
  };
  for (const token of content.titleTokens) add(token, TITLE_TERM_WEIGHT);
  for (const token of content.descriptionTokens) add(token, 1);

  let sumOfSquares = 0;
  for (const key of [...terms.keys()].sort()) {
    const weight = terms.get(key) ?? 0;
    sumOfSquares += weight * weight;
  }

  return {
    fingerprint: computeContentFingerprint(content),
    terms,
    norm: Math.sqrt(sumOfSquares),
    locationTokens: content.locationTokens,
    salary: content.salary,
  };
}

/**
 * Normalize and fingerprint a posting. The source record itself is never modified;
 * changed content has to go through here again and gets a fresh fingerprint.
 */
export function prepareSource(source: JobSource): PreparedSource {
  const content = normalizeSource(source);
  return { source, content, features: buildFeatureVector(content) };
}
