/**
 * Source Reconciler Agent - batch source analysis over a snapshot
 *
 * Responsibilities:
 * - Group postings by employer
 * - Score each employer independently, a bounded number at a time
 * - Roll the per-company analytics up into one report
 *
 * LLM Usage: None (deterministic)
 */

import type { JobSource } from '@reconciler/schemas';
import {
  analyzeCompanySources,
  generateSourceAnalysisReport,
  DEFAULT_RECONCILER_CONFIG,
  type ReconcilerConfig,
} from '@reconciler/core';
import { BaseAgent } from '../shared/base-agent.js';
import { mapWithConcurrency } from '../shared/concurrency.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';
import {
  ReconcileInputSchema,
  ReconcileOutputSchema,
  type ReconcileInput,
  type ReconcileInputRaw,
  type ReconcileOutput,
} from './types.js';

/**
 * Group sources by trimmed companyId; ids are returned sorted.
 */
export function groupSourcesByCompany(sources: JobSource[]): {
  groups: Map<string, JobSource[]>;
  skippedSourceIds: string[];
} {
  const groups = new Map<string, JobSource[]>();
  const skipped = new Set<string>();
  for (const source of sources) {
    const companyId = source.companyId.trim();
    if (!companyId) {
      skipped.add(source.sourceId);
      continue;
    }
    const members = groups.get(companyId) ?? [];
    members.push(source);
    groups.set(companyId, members);
  }
  const sorted = new Map([...groups.entries()].sort(([a], [b]) => (a < b ? -1 : 1)));
  return { groups: sorted, skippedSourceIds: [...skipped].sort() };
}

function companyNameFor(
  companyId: string,
  names: Record<string, string>,
  sources: JobSource[],
): string {
  if (Object.hasOwn(names, companyId)) return names[companyId];
  const named = [...sources]
    .sort((a, b) => (a.sourceId < b.sourceId ? -1 : 1))
    .find((s) => s.companyName?.trim());
  return named?.companyName?.trim() ?? companyId;
}

export class SourceReconcilerAgent extends BaseAgent<
  ReconcileInput,
  ReconcileOutput,
  ReconcileInputRaw
> {
  config: AgentConfig = {
    name: 'SourceReconcilerAgent',
    description: 'Clusters duplicate postings, measures drift from primaries and scores employers',
    version: '1.0.0',
  };

  inputSchema = ReconcileInputSchema;
  outputSchema = ReconcileOutputSchema;

  private readonly reconcilerConfig: ReconcilerConfig;

  constructor(reconcilerConfig: ReconcilerConfig = DEFAULT_RECONCILER_CONFIG) {
    super();
    this.reconcilerConfig = reconcilerConfig;
  }

  protected async run(input: ReconcileInput, context: AgentContext): Promise<ReconcileOutput> {
    const now = input.now ?? context.timestamp;
    const { groups, skippedSourceIds } = groupSourcesByCompany(input.sources);

    if (skippedSourceIds.length > 0) {
      this.warn(`Skipping ${skippedSourceIds.length} source(s) without a company`, {
        skippedSourceIds,
      });
    }
    this.info(`Analyzing ${groups.size} companies`, {
      sources: input.sources.length,
      maxConcurrency: input.maxConcurrency,
    });

    const companies = await mapWithConcurrency(
      [...groups.entries()],
      input.maxConcurrency,
      async ([companyId, sources]) => {
        const analytics = analyzeCompanySources(
          companyId,
          companyNameFor(companyId, input.companyNames, sources),
          sources,
          this.reconcilerConfig,
          { now },
        );
        this.debug(`Scored ${companyId}`, {
          hrQualityScore: analytics.hrQualityScore,
          flags: analytics.sourceManagementFlags,
        });
        return analytics;
      },
    );

    const report = generateSourceAnalysisReport(companies);
    this.info('Report generated', {
      companies: companies.length,
      problematic: report?.problematicCompanies.length ?? 0,
    });

    return { companies, report, skippedSourceIds };
  }
}
