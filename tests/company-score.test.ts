import { describe, it, expect } from 'vitest';
import { analyzeCompanySources, createReconcilerConfig } from '@reconciler/core';
import { FIXED_NOW, makeSource } from './fixtures/sources';
import { boardsOnly, seniorPm, staleDataEngineer } from './fixtures/scenarios';

describe('analyzeCompanySources', () => {
  it('scores a well-synced employer near the top', () => {
    const analytics = analyzeCompanySources(
      'acme',
      'Acme Corp',
      [seniorPm.primary, seniorPm.secondary],
      undefined,
      { now: FIXED_NOW },
    );

    expect(analytics.hrQualityScore).toBeCloseTo(0.975, 10);
    expect(analytics.contentConsistencyScore).toBeCloseTo(0.95, 10);
    expect(analytics.sourceManagementFlags).toEqual([]);
    expect(analytics).toMatchObject({
      companyId: 'acme',
      companyName: 'Acme Corp',
      platformUsage: { greenhouse: 1, linkedin: 1 },
      totalJobsTracked: 1,
      jobsWithPrimarySource: 1,
      jobsWithMultipleSources: 1,
      avgSourcesPerJob: 2,
      primaryPlatforms: ['greenhouse'],
      secondaryPlatforms: ['linkedin'],
      outdatedSecondaryCount: 0,
      computedAt: FIXED_NOW,
    });
    expect(analytics.deltaBreakdown.minor_differences).toBe(1);
    expect(analytics.sourceReliabilityScore).toBeCloseTo(0.875, 12);
    expect(analytics.jobsWithDeltas).toBe(1);
    expect(analytics.poorSyncIndicators).toBe(0);
  });

  it('penalises openings that only appear on job boards', () => {
    const analytics = analyzeCompanySources('acme', 'Acme Corp', boardsOnly, undefined, {
      now: FIXED_NOW,
    });

    expect(analytics.sourceManagementFlags).toEqual(['missing_primary_sources']);
    expect(analytics.deltaBreakdown).toEqual({
      identical: 0,
      minor_differences: 0,
      content_drift: 0,
      major_discrepancy: 0,
      outdated_secondary: 0,
      indeterminate: 0,
    });
    expect(analytics.contentConsistencyScore).toBe(1);
    expect(analytics.jobsWithPrimarySource).toBe(0);
    expect(analytics.hrQualityScore).toBeCloseTo(0.7, 12);
  });

  it('flags stale secondaries linked by requisition id', () => {
    const analytics = analyzeCompanySources(
      'acme',
      'Acme Corp',
      [staleDataEngineer.primary, staleDataEngineer.secondary],
      undefined,
      { now: FIXED_NOW },
    );

    expect(analytics.outdatedSecondaryCount).toBe(1);
    expect(analytics.poorSyncIndicators).toBe(1);
    expect(analytics.sourceManagementFlags).toEqual([
      'frequent_outdated_secondaries',
      'poor_sync_quality',
    ]);
    expect(analytics.hrQualityScore).toBeCloseTo(0.5 * (6.4 / 19) + 0.3, 10);
  });

  it('flags several primaries for one opening', () => {
    const analytics = analyzeCompanySources(
      'acme',
      'Acme Corp',
      [seniorPm.primary, makeSource({ sourceId: 'lever-pm', platform: 'lever' })],
      undefined,
      { now: FIXED_NOW },
    );
    expect(analytics.sourceManagementFlags).toEqual(['ambiguous_primary_sources']);
    expect(analytics.jobsWithPrimarySource).toBe(1);
    expect(analytics.hrQualityScore).toBeCloseTo(0.7, 12);
  });

  it('flags blank postings without counting them against primary coverage', () => {
    const analytics = analyzeCompanySources(
      'acme',
      'Acme Corp',
      [
        seniorPm.primary,
        seniorPm.secondary,
        makeSource({
          sourceId: 'blank',
          platform: 'indeed',
          sourceType: 'secondary',
          descriptionText: '',
        }),
      ],
      undefined,
      { now: FIXED_NOW },
    );
    expect(analytics.totalJobsTracked).toBe(2);
    expect(analytics.sourceManagementFlags).toEqual(['non_comparable_postings']);
    expect(analytics.hrQualityScore).toBeCloseTo(0.975, 10);
    expect(analytics.platformUsage).toEqual({ greenhouse: 1, indeed: 1, linkedin: 1 });
  });

  describe('repeated source ids', () => {
    const rewritten = {
      ...seniorPm.secondary,
      descriptionText: 'Maintain nightly batch reports in a legacy Oracle warehouse using PL/SQL scripts.',
    };

    it('keeps the most recently verified copy whatever the input order', () => {
      const newer = { ...rewritten, lastVerifiedAt: new Date('2024-05-01T00:00:00Z') };
      const forward = analyzeCompanySources(
        'acme',
        'Acme Corp',
        [seniorPm.primary, seniorPm.secondary, newer],
        undefined,
        { now: FIXED_NOW },
      );
      const backward = analyzeCompanySources(
        'acme',
        'Acme Corp',
        [newer, seniorPm.secondary, seniorPm.primary],
        undefined,
        { now: FIXED_NOW },
      );

      expect(backward).toEqual(forward);
      expect(forward).toMatchObject({
        totalJobsTracked: 2,
        platformUsage: { greenhouse: 1, linkedin: 1 },
        avgSourcesPerJob: 1,
        sourceManagementFlags: ['missing_primary_sources'],
      });
      expect(forward.hrQualityScore).toBeCloseTo(0.85, 12);
    });

    it('settles equally dated copies by content', () => {
      const sources = [seniorPm.primary, seniorPm.secondary, rewritten];
      const forward = analyzeCompanySources('acme', 'Acme Corp', sources, undefined, {
        now: FIXED_NOW,
      });
      const backward = analyzeCompanySources('acme', 'Acme Corp', [...sources].reverse(), undefined, {
        now: FIXED_NOW,
      });
      expect(backward).toEqual(forward);
      expect(Object.values(forward.platformUsage).reduce((a, b) => a + b, 0)).toBe(2);
    });
  });

  it('returns neutral analytics when there is nothing to analyze', () => {
    const analytics = analyzeCompanySources(
      'acme',
      'Acme Corp',
      [makeSource({ companyId: 'globex' })],
      undefined,
      { now: FIXED_NOW },
    );
    expect(analytics).toMatchObject({
      hrQualityScore: 1,
      contentConsistencyScore: 1,
      totalJobsTracked: 0,
      avgSourcesPerJob: 0,
      platformUsage: {},
      sourceManagementFlags: ['insufficient_data'],
      sourceReliabilityScore: 1,
    });
  });

  it('does not depend on input order', () => {
    const sources = [
      seniorPm.primary,
      seniorPm.secondary,
      staleDataEngineer.primary,
      staleDataEngineer.secondary,
      ...boardsOnly.map((s) => ({
        ...s,
        title: 'Operations Lead',
        descriptionText: 'Run warehouse operations.',
      })),
    ];
    const forward = analyzeCompanySources('acme', 'Acme Corp', sources, undefined, { now: FIXED_NOW });
    const backward = analyzeCompanySources('acme', 'Acme Corp', [...sources].reverse(), undefined, {
      now: FIXED_NOW,
    });
    expect(backward).toEqual(forward);
    expect(forward.totalJobsTracked).toBe(3);
  });

  it('uses the configured reliability table', () => {
    const config = createReconcilerConfig({
      platformReliability: { greenhouse: 1, linkedin: 0.5 },
      defaultPlatformReliability: 0,
    });
    const analytics = analyzeCompanySources(
      'acme',
      'Acme Corp',
      [
        seniorPm.primary,
        seniorPm.secondary,
        makeSource({
          sourceId: 'x',
          platform: 'mystery',
          sourceType: 'secondary',
          title: 'Recruiter',
          descriptionText: 'Source candidates.',
        }),
      ],
      config,
      { now: FIXED_NOW },
    );
    expect(analytics.sourceReliabilityScore).toBeCloseTo(0.5, 12);
  });
});
