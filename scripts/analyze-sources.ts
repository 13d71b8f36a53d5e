/**
 * Run source reconciliation over a JSON snapshot and print the report.
 *
 * Run: npm run analyze -- path/to/snapshot.json [--json]
 */
import './load-env';

import * as fs from 'fs';
import * as path from 'path';
import { SourceReconcilerAgent } from '@reconciler/agents';
import { configFromEnv } from './env-config';
import { parseSnapshot } from './snapshot';

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

async function main() {
  const args = process.argv.slice(2);
  const file = args.find((a) => !a.startsWith('--'));
  const asJson = args.includes('--json');
  if (!file) {
    console.error('Usage: npm run analyze -- <snapshot.json> [--json]');
    process.exit(1);
  }

  const snapshotPath = path.resolve(process.cwd(), file);
  if (!fs.existsSync(snapshotPath)) {
    console.error('Snapshot not found:', snapshotPath);
    process.exit(1);
  }

  const config = configFromEnv();
  const { sources, companyNames } = parseSnapshot(
    JSON.parse(fs.readFileSync(snapshotPath, 'utf-8')),
  );
  console.log(`Loaded ${sources.length} sources from ${path.basename(snapshotPath)}`);

  const agent = new SourceReconcilerAgent(config);
  const result = await agent.execute({ sources, companyNames });
  if (!result.success || !result.data) {
    console.error('Analysis failed:', result.error);
    process.exit(1);
  }

  const { companies, report, skippedSourceIds } = result.data;
  if (asJson) {
    console.log(JSON.stringify(result.data, null, 2));
    return;
  }

  if (skippedSourceIds.length > 0) {
    console.log(`Skipped ${skippedSourceIds.length} source(s) without a company`);
  }
  for (const c of companies) {
    const flags = c.sourceManagementFlags.length ? ` [${c.sourceManagementFlags.join(', ')}]` : '';
    console.log(
      `${c.companyName}: quality ${pct(c.hrQualityScore)}, consistency ${pct(c.contentConsistencyScore)}, ` +
        `${c.totalJobsTracked} job(s), ${c.outdatedSecondaryCount} outdated${flags}`,
    );
  }
  if (report) {
    const { summary, qualityDistribution } = report;
    console.log(
      `\n${summary.totalCompaniesAnalyzed} companies, ${summary.totalJobsTracked} jobs, ` +
        `${summary.avgSourcesPerJob.toFixed(2)} sources/job`,
    );
    console.log(
      `Quality: ${qualityDistribution.excellent} excellent, ${qualityDistribution.good} good, ` +
        `${qualityDistribution.fair} fair, ${qualityDistribution.poor} poor`,
    );
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
