import { z } from 'zod';

/** `primary` = employer-controlled channel (careers page, official ATS); `secondary` = third-party board. */
export const sourceTypeEnum = z.enum(['primary', 'secondary']);
export type SourceType = z.infer<typeof sourceTypeEnum>;

export const deltaStatusEnum = z.enum([
  'identical',
  'minor_differences',
  'content_drift',
  'major_discrepancy',
  'outdated_secondary',
  'indeterminate',
]);
export type DeltaStatus = z.infer<typeof deltaStatusEnum>;

export const clusterFlagEnum = z.enum([
  'missing_primary_source',
  'ambiguous_primary_source',
  'non_comparable_content',
  'missing_company',
]);
export type ClusterFlag = z.infer<typeof clusterFlagEnum>;

export const sourceManagementFlagEnum = z.enum([
  'missing_primary_sources',
  'ambiguous_primary_sources',
  'frequent_outdated_secondaries',
  'poor_sync_quality',
  'non_comparable_postings',
  'insufficient_data',
]);
export type SourceManagementFlag = z.infer<typeof sourceManagementFlagEnum>;

export const linkReasonEnum = z.enum(['similarity', 'requisition', 'url']);
export type LinkReason = z.infer<typeof linkReasonEnum>;

export const differenceFieldEnum = z.enum(['title', 'location', 'salary', 'description']);
export type DifferenceField = z.infer<typeof differenceFieldEnum>;

export const differenceChangeEnum = z.enum(['missing_in_primary', 'missing_in_secondary', 'changed']);
export type DifferenceChange = z.infer<typeof differenceChangeEnum>;
