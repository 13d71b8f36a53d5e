/**
 * Delta analysis: how far each secondary posting has drifted from its cluster's primary.
 * Records are always directed primary → secondary.
 */

import type {
  DeltaBreakdown,
  DeltaRecord,
  DuplicateCluster,
  FieldDifference,
  JobSource,
} from '@reconciler/schemas';
import { DEFAULT_RECONCILER_CONFIG, type ReconcilerConfig } from './config';
import { detectPreparedDuplicates, type DetectDuplicatesOptions } from './dedupe';
import { prepareSource, type PreparedSource } from './fingerprint';
import type { SalaryRange } from './normalize';
import { classifyDeltaStatus, scoreSimilarity } from './similarity';

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_DIFF_TOKENS = 25;
// A copy differing in at least this many fields is badly synced whatever its score
const POOR_SYNC_FIELD_COUNT = 3;

export interface DeltaAnalysis {
  deltaRecords: DeltaRecord[];
  avgSimilarityScore: number;
  outdatedSecondaryCount: number;
  deltaBreakdown: DeltaBreakdown;
  clusters: DuplicateCluster[];
  duplicatePairsFound: number;
  /** The postings analyzed, one per `sourceId`, in id order. */
  sources: JobSource[];
}

export function emptyDeltaBreakdown(): DeltaBreakdown {
  return {
    identical: 0,
    minor_differences: 0,
    content_drift: 0,
    major_discrepancy: 0,
    outdated_secondary: 0,
    indeterminate: 0,
  };
}

/**
 * A cluster yields deltas only when exactly one primary was found.
 */
export function hasResolvedPrimary(cluster: DuplicateCluster): boolean {
  return cluster.primarySourceId !== null && !cluster.flags.includes('ambiguous_primary_source');
}

function tokenDiff(primary: string[], secondary: string[]) {
  const p = new Set(primary);
  const s = new Set(secondary);
  return {
    removedTokens: [...p].filter((t) => !s.has(t)).sort().slice(0, MAX_DIFF_TOKENS),
    addedTokens: [...s].filter((t) => !p.has(t)).sort().slice(0, MAX_DIFF_TOKENS),
  };
}

function emptyToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function formatSalary(range: SalaryRange | null): string | null {
  if (!range) return null;
  const span = range.min === range.max ? `${range.min}` : `${range.min}-${range.max}`;
  return `${range.currency} ${span}/${range.period}`;
}

function sameSalary(a: SalaryRange, b: SalaryRange): boolean {
  return a.min === b.min && a.max === b.max && a.currency === b.currency && a.period === b.period;
}

function tokenField(
  field: 'title' | 'location',
  primaryValue: string | null,
  secondaryValue: string | null,
  primaryTokens: string[],
  secondaryTokens: string[],
): FieldDifference | null {
  if (primaryTokens.length === 0 && secondaryTokens.length === 0) return null;
  const { removedTokens, addedTokens } = tokenDiff(primaryTokens, secondaryTokens);
  if (primaryTokens.length === 0) {
    return { field, change: 'missing_in_primary', primaryValue, secondaryValue, removedTokens, addedTokens };
  }
  if (secondaryTokens.length === 0) {
    return { field, change: 'missing_in_secondary', primaryValue, secondaryValue, removedTokens, addedTokens };
  }
  if (removedTokens.length === 0 && addedTokens.length === 0) return null;
  return { field, change: 'changed', primaryValue, secondaryValue, removedTokens, addedTokens };
}

/**
 * Coarse field-level diff over title, location and salary tokens, plus a description token
 * diff when the content fingerprints differ. Enough to explain a status, not a full text diff.
 */
export function diffFields(primary: PreparedSource, secondary: PreparedSource): FieldDifference[] {
  const differences: FieldDifference[] = [];

  const title = tokenField(
    'title',
    emptyToNull(primary.source.title),
    emptyToNull(secondary.source.title),
    primary.content.titleTokens,
    secondary.content.titleTokens,
  );
  if (title) differences.push(title);

  const location = tokenField(
    'location',
    emptyToNull(primary.source.locationText),
    emptyToNull(secondary.source.locationText),
    primary.content.locationTokens,
    secondary.content.locationTokens,
  );
  if (location) differences.push(location);

  const p = primary.content.salary;
  const s = secondary.content.salary;
  if (p || s) {
    const change: FieldDifference['change'] | null = !p
      ? 'missing_in_primary'
      : !s
        ? 'missing_in_secondary'
        : sameSalary(p, s)
          ? null
          : 'changed';
    if (change) {
      differences.push({
        field: 'salary',
        change,
        primaryValue: formatSalary(p),
        secondaryValue: formatSalary(s),
        removedTokens: [],
        addedTokens: [],
      });
    }
  }

  const pf = primary.features.fingerprint;
  const sf = secondary.features.fingerprint;
  if (pf && sf && pf !== sf) {
    differences.push({
      field: 'description',
      change: 'changed',
      primaryValue: null,
      secondaryValue: null,
      ...tokenDiff(primary.content.descriptionTokens, secondary.content.descriptionTokens),
    });
  }

  return differences;
}

/**
 * Compare one prepared primary against one prepared secondary.
 */
export function comparePrepared(
  primary: PreparedSource,
  secondary: PreparedSource,
  config: ReconcilerConfig,
  computedAt: Date,
  clusterId: string | null = null,
): DeltaRecord {
  const similarityScore =
    scoreSimilarity(primary.features, secondary.features, config.similarity)?.total ?? null;
  const deltaStatus = classifyDeltaStatus(similarityScore, config.deltaBands);
  const fieldLevelDifferences = diffFields(primary, secondary);
  const p = primary.source.postedDate;
  const s = secondary.source.postedDate;

  return {
    clusterId,
    primarySourceId: primary.source.sourceId,
    secondarySourceId: secondary.source.sourceId,
    similarityScore,
    deltaStatus,
    fieldLevelDifferences,
    indicatesOutdatedSecondary: deltaStatus === 'outdated_secondary',
    indicatesPoorSync:
      similarityScore !== null &&
      (similarityScore < config.deltaBands.contentDrift ||
        fieldLevelDifferences.length >= POOR_SYNC_FIELD_COUNT),
    qualityImpactScore: similarityScore === null ? null : Math.max(0, 1 - similarityScore),
    postedDateGapDays: p && s ? Math.round((p.getTime() - s.getTime()) / DAY_MS) : null,
    computedAt,
  };
}

/**
 * Compare two postings directly, without clustering. Empty content on either side
 * gives an `indeterminate` record.
 */
export function compareSources(
  primary: JobSource,
  secondary: JobSource,
  config: ReconcilerConfig = DEFAULT_RECONCILER_CONFIG,
  computedAt: Date = new Date(),
): DeltaRecord {
  return comparePrepared(prepareSource(primary), prepareSource(secondary), config, computedAt);
}

/**
 * Summary numbers over a set of delta records. Indeterminate records add no similarity term.
 * `jobsWithDeltas` counts clusters holding at least one non-identical copy.
 */
export function summarizeDeltas(records: DeltaRecord[]) {
  const deltaBreakdown = emptyDeltaBreakdown();
  const drifted = new Set<string>();
  let sum = 0;
  let scored = 0;
  let poorSync = 0;
  for (const record of records) {
    deltaBreakdown[record.deltaStatus] += 1;
    if (record.indicatesPoorSync) poorSync += 1;
    if (record.deltaStatus !== 'identical') {
      drifted.add(record.clusterId ?? `${record.primarySourceId}\u0000${record.secondarySourceId}`);
    }
    if (record.similarityScore !== null) {
      sum += record.similarityScore;
      scored += 1;
    }
  }
  return {
    deltaBreakdown,
    scoredCount: scored,
    avgSimilarityScore: scored > 0 ? Math.min(1, sum / scored) : 1,
    outdatedSecondaryCount: deltaBreakdown.outdated_secondary,
    poorSyncIndicators: poorSync,
    jobsWithDeltas: drifted.size,
  };
}

function recordsForCluster(
  cluster: DuplicateCluster,
  prepared: Map<string, PreparedSource>,
  config: ReconcilerConfig,
  computedAt: Date,
): DeltaRecord[] {
  if (!hasResolvedPrimary(cluster) || cluster.primarySourceId === null) return [];
  const primary = prepared.get(cluster.primarySourceId);
  if (!primary) return [];

  const records: DeltaRecord[] = [];
  for (const id of cluster.memberSourceIds) {
    if (id === cluster.primarySourceId) continue;
    const secondary = prepared.get(id);
    if (secondary) {
      records.push(comparePrepared(primary, secondary, config, computedAt, cluster.clusterId));
    }
  }
  return records;
}

/**
 * Cluster the postings, then compare every secondary member against its cluster's primary.
 * Clusters without exactly one primary produce no records.
 */
export function analyzeDeltas(
  sources: JobSource[],
  config: ReconcilerConfig = DEFAULT_RECONCILER_CONFIG,
  options: DetectDuplicatesOptions = {},
): DeltaAnalysis {
  const now = options.now ?? new Date();
  const detection = detectPreparedDuplicates(sources, config, { ...options, now });

  const deltaRecords = detection.clusters.flatMap((cluster) =>
    recordsForCluster(cluster, detection.prepared, config, now),
  );
  const { deltaBreakdown, avgSimilarityScore, outdatedSecondaryCount } =
    summarizeDeltas(deltaRecords);

  return {
    deltaRecords,
    avgSimilarityScore,
    outdatedSecondaryCount,
    deltaBreakdown,
    clusters: detection.clusters,
    duplicatePairsFound: detection.duplicatePairsFound,
    sources: [...detection.prepared.values()].map((p) => p.source),
  };
}
