/**
 * Reconciler configuration: thresholds, weights and reference data.
 *
 * Every knob has a documented default. Nothing here is read from the environment;
 * callers build a config once and pass it explicitly. Invalid configuration fails at
 * construction time with every problem listed.
 */

import { z } from 'zod';
import platformReliability from './data/platform-reliability.json';

const WEIGHT_SUM_TOLERANCE = 1e-6;

const unit = z.number().min(0).max(1);

export const similarityWeightsSchema = z.object({
  contentWeight: unit.default(0.8),
  locationWeight: unit.default(0.1),
  salaryWeight: unit.default(0.1),
  /** Agreement credited when exactly one side states a location or salary. */
  partialCredit: unit.default(0.5),
});

export type SimilarityWeights = z.infer<typeof similarityWeightsSchema>;

export const clusteringModeSchema = z.enum(['transitive', 'complete']);
export type ClusteringMode = z.infer<typeof clusteringModeSchema>;

export const duplicateDetectionSchema = z.object({
  threshold: unit.default(0.85),
  gatingWindowDays: z.number().min(0).default(30),
  /**
   * `transitive`: union-find over links, A~B and B~C merge A, B, C even when A≁C.
   * `complete`: a group only absorbs a source linked to every member.
   */
  clustering: clusteringModeSchema.default('transitive'),
  /** Same-company postings sharing a requisition id are one opening, whatever their text says. */
  linkByRequisitionId: z.boolean().default(true),
  /** Same-company postings at the same normalized URL are one opening. */
  linkByUrl: z.boolean().default(true),
});

export type DuplicateDetectionConfig = z.infer<typeof duplicateDetectionSchema>;

/** Lower bounds, inclusive. Anything under `majorDiscrepancy` is an outdated secondary. */
export const deltaBandsSchema = z.object({
  identical: unit.default(0.98),
  minorDifferences: unit.default(0.9),
  contentDrift: unit.default(0.75),
  majorDiscrepancy: unit.default(0.5),
});

export type DeltaBands = z.infer<typeof deltaBandsSchema>;

export const companyScoreSchema = z.object({
  consistencyWeight: unit.default(0.5),
  primaryCoverageWeight: unit.default(0.3),
  freshnessWeight: unit.default(0.2),
  outdatedFractionThreshold: unit.default(0.2),
  poorSyncFloor: unit.default(0.8),
});

export type CompanyScoreConfig = z.infer<typeof companyScoreSchema>;

export const DEFAULT_PLATFORM_RELIABILITY: Readonly<Record<string, number>> = platformReliability;

function checkWeightSum(ctx: z.RefinementCtx, path: string[], label: string, weights: number[]) {
  const sum = weights.reduce((acc, w) => acc + w, 0);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path,
      message: `${label} must sum to 1.0 (got ${Number(sum.toFixed(6))})`,
    });
  }
}

export const reconcilerConfigSchema = z
  .object({
    similarity: similarityWeightsSchema.default({}),
    duplicates: duplicateDetectionSchema.default({}),
    deltaBands: deltaBandsSchema.default({}),
    companyScore: companyScoreSchema.default({}),
    platformReliability: z.record(unit).default({ ...DEFAULT_PLATFORM_RELIABILITY }),
    /** Reliability assumed for platforms missing from the table. */
    defaultPlatformReliability: unit.default(0.5),
  })
  .superRefine((config, ctx) => {
    const { contentWeight, locationWeight, salaryWeight } = config.similarity;
    checkWeightSum(ctx, ['similarity'], 'similarity weights (content, location, salary)', [
      contentWeight,
      locationWeight,
      salaryWeight,
    ]);

    const { consistencyWeight, primaryCoverageWeight, freshnessWeight } = config.companyScore;
    checkWeightSum(
      ctx,
      ['companyScore'],
      'company score weights (consistency, primary coverage, freshness)',
      [consistencyWeight, primaryCoverageWeight, freshnessWeight],
    );

    const { identical, minorDifferences, contentDrift, majorDiscrepancy } = config.deltaBands;
    if (!(identical > minorDifferences && minorDifferences > contentDrift && contentDrift > majorDiscrepancy)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['deltaBands'],
        message: `delta bands must be strictly descending (identical > minorDifferences > contentDrift > majorDiscrepancy), got ${identical} / ${minorDifferences} / ${contentDrift} / ${majorDiscrepancy}`,
      });
    }
  });

export type ReconcilerConfig = z.infer<typeof reconcilerConfigSchema>;
export type ReconcilerConfigOverrides = z.input<typeof reconcilerConfigSchema>;

/**
 * Raised for operator / programmer mistakes in configuration. Content problems never raise.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid reconciler configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

function freezeConfig(config: ReconcilerConfig): ReconcilerConfig {
  Object.freeze(config.similarity);
  Object.freeze(config.duplicates);
  Object.freeze(config.deltaBands);
  Object.freeze(config.companyScore);
  Object.freeze(config.platformReliability);
  return Object.freeze(config);
}

/**
 * Build a validated, frozen configuration. Omitted fields take their defaults;
 * nested groups merge field by field.
 */
export function createReconcilerConfig(overrides: ReconcilerConfigOverrides = {}): ReconcilerConfig {
  const parsed = reconcilerConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    );
  }
  return freezeConfig(parsed.data);
}

export const DEFAULT_RECONCILER_CONFIG: ReconcilerConfig = createReconcilerConfig();

/**
 * Reliability of a platform from the configured reference table.
 */
export function platformReliabilityOf(platform: string, config: ReconcilerConfig): number {
  return Object.hasOwn(config.platformReliability, platform)
    ? config.platformReliability[platform]
    : config.defaultPlatformReliability;
}
