/**
 * Cross-company roll-up of source analytics.
 */

import type {
  CompanySourceAnalytics,
  SourceAnalysisReport,
  SourceManagementFlag,
} from '@reconciler/schemas';

const PROBLEMATIC_SCORE = 0.7;
const MAX_PROBLEMATIC = 10;

function qualityBand(score: number): keyof SourceAnalysisReport['qualityDistribution'] {
  if (score >= 0.9) return 'excellent';
  if (score >= 0.7) return 'good';
  if (score >= 0.5) return 'fair';
  return 'poor';
}

/**
 * Summarize analytics for many companies. Returns null when there is nothing to report.
 */
export function generateSourceAnalysisReport(
  analytics: CompanySourceAnalytics[],
): SourceAnalysisReport | null {
  if (analytics.length === 0) return null;

  const companies = [...analytics].sort((a, b) => (a.companyId < b.companyId ? -1 : 1));
  const totalJobsTracked = companies.reduce((acc, c) => acc + c.totalJobsTracked, 0);
  const totalSources = companies.reduce(
    (acc, c) => acc + Object.values(c.platformUsage).reduce((n, v) => n + v, 0),
    0,
  );

  const qualityDistribution = { excellent: 0, good: 0, fair: 0, poor: 0 };
  const platformCompanies = new Map<string, number>();
  const commonIssues: Record<SourceManagementFlag, number> = {
    missing_primary_sources: 0,
    ambiguous_primary_sources: 0,
    frequent_outdated_secondaries: 0,
    poor_sync_quality: 0,
    non_comparable_postings: 0,
    insufficient_data: 0,
  };

  for (const company of companies) {
    qualityDistribution[qualityBand(company.hrQualityScore)] += 1;
    for (const platform of Object.keys(company.platformUsage)) {
      platformCompanies.set(platform, (platformCompanies.get(platform) ?? 0) + 1);
    }
    for (const flag of company.sourceManagementFlags) commonIssues[flag] += 1;
  }

  const problematicCompanies = companies
    .filter((c) => c.hrQualityScore < PROBLEMATIC_SCORE)
    .sort((a, b) => a.hrQualityScore - b.hrQualityScore || (a.companyId < b.companyId ? -1 : 1))
    .slice(0, MAX_PROBLEMATIC)
    .map((c) => ({
      companyId: c.companyId,
      companyName: c.companyName,
      hrQualityScore: c.hrQualityScore,
      contentConsistencyScore: c.contentConsistencyScore,
      flags: c.sourceManagementFlags,
      jobsTracked: c.totalJobsTracked,
    }));

  return {
    summary: {
      totalCompaniesAnalyzed: companies.length,
      totalJobsTracked,
      avgSourcesPerJob: totalJobsTracked > 0 ? totalSources / totalJobsTracked : 0,
      companiesWithMultiSourceJobs: companies.filter((c) => c.jobsWithMultipleSources > 0).length,
    },
    qualityDistribution,
    platformUsage: Object.fromEntries(
      [...platformCompanies.entries()].sort(([a], [b]) => (a < b ? -1 : 1)),
    ),
    problematicCompanies,
    commonIssues,
  };
}
