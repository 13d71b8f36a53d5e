/**
 * Source classification: decide which platform a posting URL belongs to and whether
 * that platform is employer-controlled (primary) or a third-party board (secondary).
 * URL pattern matching only; used at ingestion, never by the reconciliation logic.
 */

import type { SourceType } from '@reconciler/schemas';

export type SourcePlatform =
  | 'company_careers'
  | 'greenhouse'
  | 'lever'
  | 'ashby'
  | 'smartrecruiters'
  | 'workable'
  | 'recruitee'
  | 'personio'
  | 'workday'
  | 'linkedin'
  | 'indeed'
  | 'glassdoor'
  | 'ziprecruiter'
  | 'monster'
  | 'careerbuilder'
  | 'dice'
  | 'wellfound'
  | 'builtin'
  | 'other';

export interface SourceClassification {
  platform: SourcePlatform;
  sourceType: SourceType;
}

const ATS_HOSTS: Array<[suffix: string, platform: SourcePlatform]> = [
  ['greenhouse.io', 'greenhouse'],
  ['lever.co', 'lever'],
  ['ashbyhq.com', 'ashby'],
  ['smartrecruiters.com', 'smartrecruiters'],
  ['workable.com', 'workable'],
  ['recruitee.com', 'recruitee'],
  ['jobs.personio.de', 'personio'],
  ['myworkdayjobs.com', 'workday'],
];

const BOARD_HOSTS: Array<[suffix: string, platform: SourcePlatform]> = [
  ['linkedin.com', 'linkedin'],
  ['indeed.com', 'indeed'],
  ['glassdoor.com', 'glassdoor'],
  ['ziprecruiter.com', 'ziprecruiter'],
  ['monster.com', 'monster'],
  ['careerbuilder.com', 'careerbuilder'],
  ['dice.com', 'dice'],
  ['wellfound.com', 'wellfound'],
  ['angel.co', 'wellfound'],
  ['builtin.com', 'builtin'],
];

function parseUrl(url: string): URL | null {
  try {
    const s = url.trim();
    if (!s) return null;
    const withProtocol = /^https?:\/\//i.test(s) ? s : `https://${s}`;
    return new URL(withProtocol);
  } catch {
    return null;
  }
}

function hostMatches(host: string, suffix: string): boolean {
  return host === suffix || host.endsWith(`.${suffix}`);
}

/**
 * Classify a posting URL. ATS hosts and `careers.` / `jobs.` / `/careers` pages count as
 * primary; known boards and anything unrecognised count as secondary.
 */
export function classifySourceUrl(sourceUrl: string): SourceClassification {
  const url = parseUrl(sourceUrl);
  if (!url) {
    return { platform: 'other', sourceType: 'secondary' };
  }

  const host = url.hostname.toLowerCase();
  const pathname = url.pathname.toLowerCase().replace(/\/+$/, '') || '/';

  for (const [suffix, platform] of ATS_HOSTS) {
    if (hostMatches(host, suffix)) return { platform, sourceType: 'primary' };
  }

  for (const [suffix, platform] of BOARD_HOSTS) {
    if (hostMatches(host, suffix)) return { platform, sourceType: 'secondary' };
  }

  // Company-run career sites: careers.acme.com, jobs.acme.com, acme.com/careers
  if (/^(careers|jobs)\./.test(host) || /^\/(careers|jobs)(\/|$)/.test(pathname)) {
    return { platform: 'company_careers', sourceType: 'primary' };
  }

  return { platform: 'other', sourceType: 'secondary' };
}
