/**
 * Similarity scoring between two prepared postings, and the delta-status band table.
 *
 * All scores are symmetric bit for bit: pairwise terms are combined in a fixed
 * (sorted) order that does not depend on argument order.
 */

import type { DeltaStatus } from '@reconciler/schemas';
import type { DeltaBands, SimilarityWeights } from './config';
import type { FeatureVector } from './fingerprint';
import type { SalaryRange } from './normalize';

export interface SimilarityBreakdown {
  content: number;
  location: number;
  salary: number;
  total: number;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Cosine similarity of the term vectors; identical fingerprints short-circuit to 1.
 */
export function contentSimilarity(a: FeatureVector, b: FeatureVector): number {
  if (a.fingerprint !== null && a.fingerprint === b.fingerprint) return 1;
  if (a.norm === 0 || b.norm === 0) return 0;

  const [smaller, larger] = a.terms.size <= b.terms.size ? [a.terms, b.terms] : [b.terms, a.terms];
  const shared = [...smaller.keys()].filter((term) => larger.has(term)).sort();

  let dot = 0;
  for (const term of shared) {
    dot += (a.terms.get(term) ?? 0) * (b.terms.get(term) ?? 0);
  }
  return clamp01(dot / (a.norm * b.norm));
}

/**
 * 1 when both sides are silent or one location contains the other,
 * `partialCredit` when only one side states a location, Jaccard overlap otherwise.
 */
export function locationAgreement(a: string[], b: string[], partialCredit: number): number {
  if (a.length === 0 && b.length === 0) return 1;
  if (a.length === 0 || b.length === 0) return partialCredit;

  const setA = new Set(a);
  const setB = new Set(b);
  const intersection = [...setA].filter((token) => setB.has(token)).length;
  if (intersection === setA.size || intersection === setB.size) return 1;

  const union = setA.size + setB.size - intersection;
  return intersection / union;
}

/**
 * Overlap of two salary ranges over their combined span. Different currency or pay
 * period never agree; a one-sided salary earns `partialCredit`.
 */
export function salaryAgreement(
  a: SalaryRange | null,
  b: SalaryRange | null,
  partialCredit: number,
): number {
  if (!a && !b) return 1;
  if (!a || !b) return partialCredit;
  if (a.currency !== b.currency || a.period !== b.period) return 0;

  const span = Math.max(a.max, b.max) - Math.min(a.min, b.min);
  if (span === 0) return 1;
  const overlap = Math.min(a.max, b.max) - Math.max(a.min, b.min);
  return clamp01(overlap / span);
}

/**
 * Component scores and their weighted blend. Null when either side is non-comparable.
 */
export function scoreSimilarity(
  a: FeatureVector,
  b: FeatureVector,
  weights: SimilarityWeights,
): SimilarityBreakdown | null {
  if (a.fingerprint === null || b.fingerprint === null) return null;

  const content = contentSimilarity(a, b);
  const location = locationAgreement(a.locationTokens, b.locationTokens, weights.partialCredit);
  const salary = salaryAgreement(a.salary, b.salary, weights.partialCredit);

  const total =
    content === 1 && location === 1 && salary === 1
      ? 1
      : clamp01(
          weights.contentWeight * content +
            weights.locationWeight * location +
            weights.salaryWeight * salary,
        );

  return { content, location, salary, total };
}

/**
 * Symmetric, reflexive similarity in [0, 1]; null when undefined (empty content).
 */
export function similarity(
  a: FeatureVector,
  b: FeatureVector,
  weights: SimilarityWeights,
): number | null {
  return scoreSimilarity(a, b, weights)?.total ?? null;
}

/**
 * Map a similarity score onto the delta band table. A missing score is `indeterminate`,
 * never `outdated_secondary`.
 */
export function classifyDeltaStatus(score: number | null, bands: DeltaBands): DeltaStatus {
  if (score === null || Number.isNaN(score)) return 'indeterminate';
  if (score >= bands.identical) return 'identical';
  if (score >= bands.minorDifferences) return 'minor_differences';
  if (score >= bands.contentDrift) return 'content_drift';
  if (score >= bands.majorDiscrepancy) return 'major_discrepancy';
  return 'outdated_secondary';
}
