/**
 * Types for the source reconciliation agent
 */

import { z } from 'zod';
import {
  companySourceAnalyticsSchema,
  jobSourceSchema,
  sourceAnalysisReportSchema,
} from '@reconciler/schemas';

export const ReconcileInputSchema = z.object({
  sources: z.array(jobSourceSchema),
  /** companyId → display name; falls back to a source's companyName, then the id. */
  companyNames: z.record(z.string()).default({}),
  maxConcurrency: z.number().int().min(1).default(4),
  /** Timestamp for clusters, deltas and analytics; defaults to the execution timestamp. */
  now: z.coerce.date().optional(),
});

export type ReconcileInput = z.infer<typeof ReconcileInputSchema>;
export type ReconcileInputRaw = z.input<typeof ReconcileInputSchema>;

export const ReconcileOutputSchema = z.object({
  companies: z.array(companySourceAnalyticsSchema),
  report: sourceAnalysisReportSchema.nullable(),
  /** Sources without a companyId; they cannot be attributed to any employer. */
  skippedSourceIds: z.array(z.string()),
});

export type ReconcileOutput = z.infer<typeof ReconcileOutputSchema>;
