import { describe, it, expect } from 'vitest';
import { emptyCompanyAnalytics, generateSourceAnalysisReport } from '@reconciler/core';
import type { CompanySourceAnalytics } from '@reconciler/schemas';
import { FIXED_NOW } from './fixtures/sources';

const makeAnalytics = (overrides?: Partial<CompanySourceAnalytics>): CompanySourceAnalytics => ({
  ...emptyCompanyAnalytics('acme', 'Acme Corp', FIXED_NOW),
  sourceManagementFlags: [],
  ...overrides,
});

describe('generateSourceAnalysisReport', () => {
  it('returns null for no companies', () => {
    expect(generateSourceAnalysisReport([])).toBeNull();
  });

  it('summarizes companies, platforms and issues', () => {
    const report = generateSourceAnalysisReport([
      makeAnalytics({
        companyId: 'acme',
        hrQualityScore: 0.95,
        totalJobsTracked: 2,
        jobsWithMultipleSources: 1,
        platformUsage: { greenhouse: 2, linkedin: 1 },
      }),
      makeAnalytics({
        companyId: 'globex',
        companyName: 'Globex',
        hrQualityScore: 0.4,
        contentConsistencyScore: 0.3,
        totalJobsTracked: 1,
        platformUsage: { linkedin: 1 },
        sourceManagementFlags: ['missing_primary_sources', 'poor_sync_quality'],
      }),
      makeAnalytics({
        companyId: 'initech',
        companyName: 'Initech',
        hrQualityScore: 0.6,
        totalJobsTracked: 1,
        platformUsage: { indeed: 1 },
        sourceManagementFlags: ['missing_primary_sources'],
      }),
    ]);

    expect(report).toEqual({
      summary: {
        totalCompaniesAnalyzed: 3,
        totalJobsTracked: 4,
        avgSourcesPerJob: 5 / 4,
        companiesWithMultiSourceJobs: 1,
      },
      qualityDistribution: { excellent: 1, good: 0, fair: 1, poor: 1 },
      platformUsage: { greenhouse: 1, indeed: 1, linkedin: 2 },
      problematicCompanies: [
        {
          companyId: 'globex',
          companyName: 'Globex',
          hrQualityScore: 0.4,
          contentConsistencyScore: 0.3,
          flags: ['missing_primary_sources', 'poor_sync_quality'],
          jobsTracked: 1,
        },
        {
          companyId: 'initech',
          companyName: 'Initech',
          hrQualityScore: 0.6,
          contentConsistencyScore: 1,
          flags: ['missing_primary_sources'],
          jobsTracked: 1,
        },
      ],
      commonIssues: {
        missing_primary_sources: 2,
        ambiguous_primary_sources: 0,
        frequent_outdated_secondaries: 0,
        poor_sync_quality: 1,
        non_comparable_postings: 0,
        insufficient_data: 0,
      },
    });
  });

  it('lists at most ten problematic companies, worst first', () => {
    const companies = Array.from({ length: 12 }, (_, i) =>
      makeAnalytics({ companyId: `co-${String(i).padStart(2, '0')}`, hrQualityScore: i / 20 }),
    );
    const report = generateSourceAnalysisReport(companies);
    expect(report?.problematicCompanies.map((c) => c.companyId)).toEqual([
      'co-00',
      'co-01',
      'co-02',
      'co-03',
      'co-04',
      'co-05',
      'co-06',
      'co-07',
      'co-08',
      'co-09',
    ]);
  });
});
