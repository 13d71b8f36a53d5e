import { z } from 'zod';
import {
  clusterFlagEnum,
  deltaStatusEnum,
  differenceChangeEnum,
  differenceFieldEnum,
  linkReasonEnum,
  sourceManagementFlagEnum,
} from './enums';

export const duplicateClusterSchema = z.object({
  clusterId: z.string(),
  memberSourceIds: z.array(z.string()).min(1),
  primarySourceId: z.string().nullable(),
  flags: z.array(clusterFlagEnum),
  formedAt: z.coerce.date(),
});

export type DuplicateCluster = z.infer<typeof duplicateClusterSchema>;

export const duplicatePairSchema = z.object({
  sourceIdA: z.string(),
  sourceIdB: z.string(),
  similarityScore: z.number().min(0).max(1),
  reason: linkReasonEnum,
});

export type DuplicatePair = z.infer<typeof duplicatePairSchema>;

export const fieldDifferenceSchema = z.object({
  field: differenceFieldEnum,
  change: differenceChangeEnum,
  primaryValue: z.string().nullable(),
  secondaryValue: z.string().nullable(),
  removedTokens: z.array(z.string()),
  addedTokens: z.array(z.string()),
});

export type FieldDifference = z.infer<typeof fieldDifferenceSchema>;

/** Always directed primary → secondary. */
export const deltaRecordSchema = z.object({
  clusterId: z.string().nullable(),
  primarySourceId: z.string(),
  secondarySourceId: z.string(),
  similarityScore: z.number().min(0).max(1).nullable(),
  deltaStatus: deltaStatusEnum,
  fieldLevelDifferences: z.array(fieldDifferenceSchema),
  indicatesOutdatedSecondary: z.boolean(),
  indicatesPoorSync: z.boolean(),
  qualityImpactScore: z.number().min(0).max(1).nullable(),
  postedDateGapDays: z.number().nullable(),
  computedAt: z.coerce.date(),
});

export type DeltaRecord = z.infer<typeof deltaRecordSchema>;

const count = z.number().int().min(0);

export const deltaBreakdownSchema = z.object({
  identical: count,
  minor_differences: count,
  content_drift: count,
  major_discrepancy: count,
  outdated_secondary: count,
  indeterminate: count,
});

export type DeltaBreakdown = z.infer<typeof deltaBreakdownSchema>;

export const companySourceAnalyticsSchema = z.object({
  companyId: z.string(),
  companyName: z.string(),
  hrQualityScore: z.number().min(0).max(1),
  contentConsistencyScore: z.number().min(0).max(1),
  platformUsage: z.record(z.number().int().min(0)),
  sourceManagementFlags: z.array(sourceManagementFlagEnum),
  totalJobsTracked: z.number().int().min(0),
  jobsWithPrimarySource: z.number().int().min(0),
  jobsWithMultipleSources: z.number().int().min(0),
  avgSourcesPerJob: z.number().min(0),
  primaryPlatforms: z.array(z.string()),
  secondaryPlatforms: z.array(z.string()),
  avgSimilarityScore: z.number().min(0).max(1),
  outdatedSecondaryCount: z.number().int().min(0),
  poorSyncIndicators: z.number().int().min(0),
  jobsWithDeltas: z.number().int().min(0),
  deltaBreakdown: deltaBreakdownSchema,
  sourceReliabilityScore: z.number().min(0).max(1),
  computedAt: z.coerce.date(),
});

export type CompanySourceAnalytics = z.infer<typeof companySourceAnalyticsSchema>;

export const sourceAnalysisReportSchema = z.object({
  summary: z.object({
    totalCompaniesAnalyzed: z.number().int(),
    totalJobsTracked: z.number().int(),
    avgSourcesPerJob: z.number(),
    companiesWithMultiSourceJobs: z.number().int(),
  }),
  qualityDistribution: z.object({
    excellent: z.number().int(),
    good: z.number().int(),
    fair: z.number().int(),
    poor: z.number().int(),
  }),
  platformUsage: z.record(z.number().int()),
  problematicCompanies: z.array(
    z.object({
      companyId: z.string(),
      companyName: z.string(),
      hrQualityScore: z.number(),
      contentConsistencyScore: z.number(),
      flags: z.array(sourceManagementFlagEnum),
      jobsTracked: z.number().int(),
    }),
  ),
  commonIssues: z.object({
    missing_primary_sources: count,
    ambiguous_primary_sources: count,
    frequent_outdated_secondaries: count,
    poor_sync_quality: count,
    non_comparable_postings: count,
    insufficient_data: count,
  }),
});

export type SourceAnalysisReport = z.infer<typeof sourceAnalysisReportSchema>;
