import { describe, it, expect } from 'vitest';
import { SourceReconcilerAgent, groupSourcesByCompany } from '@reconciler/agents';
import { createReconcilerConfig } from '@reconciler/core';
import { FIXED_NOW, makeSource } from '../fixtures/sources';
import { boardsOnly, seniorPm } from '../fixtures/scenarios';

const globexBoards = boardsOnly.map((s) => ({
  ...s,
  sourceId: `gx-${s.sourceId}`,
  companyId: 'globex',
  companyName: undefined,
}));
const orphan = makeSource({ sourceId: 'orphan', companyId: '' });
const snapshot = [seniorPm.secondary, ...globexBoards, orphan, seniorPm.primary];

describe('groupSourcesByCompany', () => {
  it('groups by trimmed company id and sets aside unattributed sources', () => {
    const { groups, skippedSourceIds } = groupSourcesByCompany([
      ...snapshot,
      makeSource({ sourceId: 'padded', companyId: ' acme ' }),
    ]);
    expect([...groups.keys()]).toEqual(['acme', 'globex']);
    expect(groups.get('acme')?.map((s) => s.sourceId)).toEqual(['li-pm', 'gh-pm', 'padded']);
    expect(skippedSourceIds).toEqual(['orphan']);
  });
});

describe('SourceReconcilerAgent', () => {
  it('analyzes every company and builds the report', async () => {
    const agent = new SourceReconcilerAgent();
    const result = await agent.execute({
      sources: snapshot,
      companyNames: { globex: 'Globex Inc' },
      now: FIXED_NOW,
    });

    expect(result.success).toBe(true);
    const data = result.data;
    expect(data?.companies.map((c) => [c.companyId, c.companyName])).toEqual([
      ['acme', 'Acme Corp'],
      ['globex', 'Globex Inc'],
    ]);
    expect(data?.companies[1].sourceManagementFlags).toEqual(['missing_primary_sources']);
    expect(data?.companies[0].computedAt).toEqual(FIXED_NOW);
    expect(data?.skippedSourceIds).toEqual(['orphan']);
    expect(data?.report?.summary).toEqual({
      totalCompaniesAnalyzed: 2,
      totalJobsTracked: 2,
      avgSourcesPerJob: 2,
      companiesWithMultiSourceJobs: 2,
    });
  });

  it('falls back to the company id when no name is known', async () => {
    const result = await new SourceReconcilerAgent().execute({ sources: globexBoards, now: FIXED_NOW });
    expect(result.data?.companies[0].companyName).toBe('globex');
  });

  it('gives the same result at any concurrency', async () => {
    const serial = await new SourceReconcilerAgent().execute({
      sources: snapshot,
      maxConcurrency: 1,
      now: FIXED_NOW,
    });
    const parallel = await new SourceReconcilerAgent().execute({
      sources: [...snapshot].reverse(),
      maxConcurrency: 8,
      now: FIXED_NOW,
    });
    expect(parallel.data).toEqual(serial.data);
  });

  it('applies the injected configuration', async () => {
    const strict = createReconcilerConfig({ duplicates: { threshold: 0.99 } });
    const result = await new SourceReconcilerAgent(strict).execute({
      sources: [seniorPm.primary, seniorPm.secondary],
      now: FIXED_NOW,
    });
    expect(result.data?.companies[0].totalJobsTracked).toBe(2);
  });

  it('logs skipped sources', async () => {
    const agent = new SourceReconcilerAgent();
    await agent.execute({ sources: snapshot, now: FIXED_NOW });
    expect(
      agent
        .getLogs()
        .some((l) => l.level === 'warn' && l.message === 'Skipping 1 source(s) without a company'),
    ).toBe(true);
  });

  it('returns an error result for invalid input', async () => {
    const result = await new SourceReconcilerAgent().execute({
      sources: [makeSource({ sourceId: '' })],
    });
    expect(result.success).toBe(false);
    expect(result.data).toBeUndefined();
    expect(result.error).toContain('sourceId');
  });
});
