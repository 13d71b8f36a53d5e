import { z } from 'zod';
import { sourceTypeEnum } from './enums';

/**
 * One observation of a job posting on one platform, as handed over by ingestion.
 * `companyId` may be empty when attribution failed; such records are kept but never clustered.
 */
export const jobSourceSchema = z.object({
  sourceId: z.string().min(1),
  jobClusterId: z.string().nullable().default(null),
  companyId: z.string().default(''),
  companyName: z.string().optional(),
  platform: z.string().default('other'),
  sourceType: sourceTypeEnum,
  requisitionId: z.string().nullable().default(null),
  title: z.string().default(''),
  locationText: z.string().default(''),
  descriptionText: z.string().default(''),
  salaryText: z.string().nullable().default(null),
  postedDate: z.coerce.date().nullable().default(null),
  url: z.string().default(''),
  discoveredAt: z.coerce.date(),
  lastVerifiedAt: z.coerce.date().nullable().default(null),
});

export type JobSource = z.infer<typeof jobSourceSchema>;
export type JobSourceInput = z.input<typeof jobSourceSchema>;

/**
 * Snapshot rows may arrive before the origin domain was classified;
 * platform and source type are then derived from the URL.
 */
export const rawJobSourceSchema = jobSourceSchema.extend({
  platform: z.string().optional(),
  sourceType: sourceTypeEnum.optional(),
});

export type RawJobSource = z.infer<typeof rawJobSourceSchema>;

export const sourceSnapshotSchema = z.object({
  companies: z.record(z.string()).default({}),
  sources: z.array(rawJobSourceSchema),
});

export type SourceSnapshot = z.infer<typeof sourceSnapshotSchema>;
