/**
 * Snapshot parsing for the analyze script. Rows missing platform / sourceType are
 * classified from their URL.
 */
import { classifySourceUrl } from '@reconciler/core';
import { sourceSnapshotSchema, type JobSource, type RawJobSource } from '@reconciler/schemas';

export function classifySnapshotRow(row: RawJobSource): JobSource {
  const classified = classifySourceUrl(row.url);
  return {
    ...row,
    platform: row.platform ?? classified.platform,
    sourceType: row.sourceType ?? classified.sourceType,
  };
}

export function parseSnapshot(raw: unknown): {
  sources: JobSource[];
  companyNames: Record<string, string>;
} {
  const snapshot = sourceSnapshotSchema.parse(raw);
  return {
    sources: snapshot.sources.map(classifySnapshotRow),
    companyNames: snapshot.companies,
  };
}
