/**
 * Company source-quality scoring: aggregates duplicate and delta outcomes for one
 * employer into an HR quality score and diagnostic flags.
 *
 * Pure aggregation; always recomputed wholesale from the current postings.
 */

import type {
  CompanySourceAnalytics,
  JobSource,
  SourceManagementFlag,
} from '@reconciler/schemas';
import { DEFAULT_RECONCILER_CONFIG, platformReliabilityOf, type ReconcilerConfig } from './config';
import type { DetectDuplicatesOptions } from './dedupe';
import { analyzeDeltas, emptyDeltaBreakdown, hasResolvedPrimary, summarizeDeltas } from './delta';

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function countBy(values: string[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1);
  return Object.fromEntries([...counts.entries()].sort(([a], [b]) => (a < b ? -1 : 1)));
}

function uniqueSorted(values: string[]): string[] {
  return [...new Set(values)].sort();
}

/**
 * Neutral analytics for a company with nothing to analyze.
 */
export function emptyCompanyAnalytics(
  companyId: string,
  companyName: string,
  computedAt: Date,
): CompanySourceAnalytics {
  return {
    companyId,
    companyName,
    hrQualityScore: 1,
    contentConsistencyScore: 1,
    platformUsage: {},
    sourceManagementFlags: ['insufficient_data'],
    totalJobsTracked: 0,
    jobsWithPrimarySource: 0,
    jobsWithMultipleSources: 0,
    avgSourcesPerJob: 0,
    primaryPlatforms: [],
    secondaryPlatforms: [],
    avgSimilarityScore: 1,
    outdatedSecondaryCount: 0,
    poorSyncIndicators: 0,
    jobsWithDeltas: 0,
    deltaBreakdown: emptyDeltaBreakdown(),
    sourceReliabilityScore: 1,
    computedAt,
  };
}

/**
 * Score how well one employer keeps its postings in sync across platforms.
 *
 * Only postings attributed to `companyId` are considered. The result does not depend on
 * the order of `sources`.
 */
export function analyzeCompanySources(
  companyId: string,
  companyName: string,
  sources: JobSource[],
  config: ReconcilerConfig = DEFAULT_RECONCILER_CONFIG,
  options: DetectDuplicatesOptions = {},
): CompanySourceAnalytics {
  const computedAt = options.now ?? new Date();
  const own = sources.filter((s) => s.companyId.trim() === companyId.trim());
  if (own.length === 0) return emptyCompanyAnalytics(companyId, companyName, computedAt);

  const analysis = analyzeDeltas(own, config, { ...options, now: computedAt });
  const { clusters, sources: postings } = analysis;
  const {
    deltaBreakdown,
    scoredCount,
    avgSimilarityScore,
    outdatedSecondaryCount,
    poorSyncIndicators,
    jobsWithDeltas,
  } = summarizeDeltas(analysis.deltaRecords);

  const totalJobs = clusters.length;
  // Blank postings cannot show whether an opening is covered by a primary
  const coverable = clusters.filter((c) => !c.flags.includes('non_comparable_content'));
  const resolved = coverable.filter(hasResolvedPrimary).length;
  const missingPrimary = clusters.filter((c) => c.flags.includes('missing_primary_source')).length;
  const ambiguous = clusters.filter((c) => c.flags.includes('ambiguous_primary_source')).length;
  const nonComparable = clusters.filter((c) => c.flags.includes('non_comparable_content')).length;

  // No deltas means nothing to be inconsistent about: the mean contributes no term
  const contentConsistencyScore = avgSimilarityScore;
  const outdatedFraction = scoredCount > 0 ? outdatedSecondaryCount / scoredCount : 0;
  const primaryCoverage = coverable.length > 0 ? resolved / coverable.length : 1;

  const weights = config.companyScore;
  const hrQualityScore = clamp01(
    weights.consistencyWeight * contentConsistencyScore +
      weights.primaryCoverageWeight * primaryCoverage +
      weights.freshnessWeight * (1 - outdatedFraction),
  );

  const flags = new Set<SourceManagementFlag>();
  if (missingPrimary > 0) flags.add('missing_primary_sources');
  if (ambiguous > 0) flags.add('ambiguous_primary_sources');
  if (scoredCount > 0 && outdatedFraction > weights.outdatedFractionThreshold) {
    flags.add('frequent_outdated_secondaries');
  }
  if (scoredCount > 0 && contentConsistencyScore < weights.poorSyncFloor) {
    flags.add('poor_sync_quality');
  }
  if (nonComparable > 0) flags.add('non_comparable_postings');

  const reliabilitySum = postings.reduce(
    (acc, s) => acc + platformReliabilityOf(s.platform, config),
    0,
  );

  return {
    companyId,
    companyName,
    hrQualityScore,
    contentConsistencyScore,
    platformUsage: countBy(postings.map((s) => s.platform)),
    sourceManagementFlags: [...flags].sort(),
    totalJobsTracked: totalJobs,
    jobsWithPrimarySource: clusters.filter((c) => c.primarySourceId !== null).length,
    jobsWithMultipleSources: clusters.filter((c) => c.memberSourceIds.length > 1).length,
    avgSourcesPerJob: postings.length / totalJobs,
    primaryPlatforms: uniqueSorted(
      postings.filter((s) => s.sourceType === 'primary').map((s) => s.platform),
    ),
    secondaryPlatforms: uniqueSorted(
      postings.filter((s) => s.sourceType === 'secondary').map((s) => s.platform),
    ),
    avgSimilarityScore,
    outdatedSecondaryCount,
    poorSyncIndicators,
    jobsWithDeltas,
    deltaBreakdown,
    sourceReliabilityScore: clamp01(reliabilitySum / postings.length),
    computedAt,
  };
}
