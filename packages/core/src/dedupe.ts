/**
 * Duplicate detection: link postings that describe the same opening and group them
 * into clusters, one cluster per opening.
 *
 * Candidate pairs are gated to the same company and a posting-date window, so the
 * pairwise pass stays small. Every input posting ends up in exactly one cluster.
 */

import { createHash } from 'crypto';
import type {
  ClusterFlag,
  DuplicateCluster,
  DuplicatePair,
  JobSource,
  LinkReason,
} from '@reconciler/schemas';
import { DEFAULT_RECONCILER_CONFIG, type ReconcilerConfig } from './config';
import { prepareSource, type PreparedSource } from './fingerprint';
import { similarity } from './similarity';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Scores a gated candidate pair; null means "not comparable". */
export type PairScorer = (a: PreparedSource, b: PreparedSource) => number | null;

export interface DetectDuplicatesOptions {
  /** Timestamp stamped on every cluster; defaults to now. */
  now?: Date;
  /** Replaces the configured similarity blend for candidate pairs. */
  scorer?: PairScorer;
}

export interface DuplicateDetectionResult {
  clusters: DuplicateCluster[];
  duplicatePairs: DuplicatePair[];
  duplicatePairsFound: number;
}

export interface PreparedDetection extends DuplicateDetectionResult {
  /** Surviving postings by `sourceId`, in id order. */
  prepared: Map<string, PreparedSource>;
}

/**
 * Normalize URL for dedupe: https, lowercase host, no tracking params (utm_*), no trailing
 * slash, sorted query params. Returns the trimmed input when it does not parse.
 */
export function normalizeUrlForDedupe(url: string): string {
  try {
    const parsed = new URL(url.trim());
    parsed.protocol = 'https:';
    parsed.hostname = parsed.hostname.toLowerCase();
    parsed.hash = '';
    parsed.pathname = parsed.pathname.replace(/\/+$/, '') || '/';
    const searchParams = new URLSearchParams();
    for (const [k, v] of parsed.searchParams) {
      if (k.toLowerCase().startsWith('utm_')) continue;
      searchParams.set(k, v);
    }
    const sorted = Array.from(searchParams.entries()).sort(([a], [b]) => a.localeCompare(b));
    parsed.search = sorted.length ? '?' + new URLSearchParams(sorted).toString() : '';
    return parsed.toString();
  } catch {
    return url.trim();
  }
}

/**
 * Deterministic cluster id: the same member set always hashes to the same id.
 */
export function clusterIdFor(memberSourceIds: string[]): string {
  const sorted = [...memberSourceIds].sort();
  return `cl_${createHash('sha256').update(sorted.join('\n')).digest('hex').slice(0, 16)}`;
}

class UnionFind {
  private readonly parent = new Map<string, string>();

  constructor(ids: Iterable<string>) {
    for (const id of ids) this.parent.set(id, id);
  }

  find(id: string): string {
    let root = id;
    while (this.parent.get(root) !== root) {
      root = this.parent.get(root) ?? root;
    }
    let node = id;
    while (node !== root) {
      const next = this.parent.get(node) ?? root;
      this.parent.set(node, root);
      node = next;
    }
    return root;
  }

  union(a: string, b: string): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;
    // smaller id becomes the root so grouping never depends on link order
    if (rootA < rootB) this.parent.set(rootB, rootA);
    else this.parent.set(rootA, rootB);
  }

  groups(): string[][] {
    const byRoot = new Map<string, string[]>();
    for (const id of this.parent.keys()) {
      const root = this.find(id);
      const members = byRoot.get(root) ?? [];
      members.push(id);
      byRoot.set(root, members);
    }
    return [...byRoot.values()].map((members) => members.sort());
  }
}

function pairKey(a: string, b: string): string {
  return a < b ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}

function comparisonTime(source: JobSource): number {
  return (source.postedDate ?? source.discoveredAt).getTime();
}

function withinWindow(a: JobSource, b: JobSource, windowDays: number): boolean {
  return Math.abs(comparisonTime(a) - comparisonTime(b)) <= windowDays * DAY_MS;
}

function isClusterable(p: PreparedSource): boolean {
  return p.content.comparable && p.source.companyId.trim().length > 0;
}

function byDiscovery(a: PreparedSource, b: PreparedSource): number {
  const diff = a.source.discoveredAt.getTime() - b.source.discoveredAt.getTime();
  if (diff !== 0) return diff;
  return a.source.sourceId < b.source.sourceId ? -1 : 1;
}

function buildCluster(members: PreparedSource[], formedAt: Date): DuplicateCluster {
  const memberSourceIds = members.map((m) => m.source.sourceId).sort();
  const flags = new Set<ClusterFlag>();

  const comparable = members.every((m) => m.content.comparable);
  if (members.some((m) => !m.source.companyId.trim())) flags.add('missing_company');
  if (!comparable) flags.add('non_comparable_content');

  const primaries = members.filter((m) => m.source.sourceType === 'primary');
  let primarySourceId: string | null = null;
  if (primaries.length === 1) {
    primarySourceId = primaries[0].source.sourceId;
  } else if (primaries.length > 1) {
    primarySourceId = [...primaries].sort(byDiscovery)[0].source.sourceId;
    flags.add('ambiguous_primary_source');
  } else if (comparable) {
    // A blank posting says nothing about whether the opening has a primary
    flags.add('missing_primary_source');
  }

  return {
    clusterId: clusterIdFor(memberSourceIds),
    memberSourceIds,
    primarySourceId,
    flags: [...flags].sort(),
    formedAt,
  };
}

interface CompanyLinks {
  forced: Array<[string, string]>;
  linked: Set<string>;
  pairs: DuplicatePair[];
}

function linkCompany(
  members: PreparedSource[],
  config: ReconcilerConfig,
  score: PairScorer,
): CompanyLinks {
  const { threshold, gatingWindowDays, linkByRequisitionId, linkByUrl } = config.duplicates;
  const forced: Array<[string, string]> = [];
  const linked = new Set<string>();
  const pairs: DuplicatePair[] = [];

  const record = (a: PreparedSource, b: PreparedSource, similarityScore: number, reason: LinkReason) => {
    const [first, second] = a.source.sourceId < b.source.sourceId ? [a, b] : [b, a];
    const key = pairKey(first.source.sourceId, second.source.sourceId);
    if (linked.has(key)) return;
    linked.add(key);
    pairs.push({
      sourceIdA: first.source.sourceId,
      sourceIdB: second.source.sourceId,
      similarityScore,
      reason,
    });
  };

  // Known-same links: shared requisition id or URL
  const anchors = new Map<string, PreparedSource>();
  for (const m of members) {
    const keys: Array<[string, LinkReason]> = [];
    if (linkByRequisitionId && m.source.requisitionId?.trim()) {
      keys.push([`req:${m.source.requisitionId.trim().toLowerCase()}`, 'requisition']);
    }
    if (linkByUrl && m.source.url.trim()) {
      keys.push([`url:${normalizeUrlForDedupe(m.source.url)}`, 'url']);
    }
    for (const [key, reason] of keys) {
      const anchor = anchors.get(key);
      if (!anchor) {
        anchors.set(key, m);
        continue;
      }
      forced.push([anchor.source.sourceId, m.source.sourceId]);
      record(anchor, m, score(anchor, m) ?? 0, reason);
    }
  }

  for (let i = 0; i < members.length; i++) {
    for (let j = i + 1; j < members.length; j++) {
      const a = members[i];
      const b = members[j];
      if (!withinWindow(a.source, b.source, gatingWindowDays)) continue;
      const s = score(a, b);
      if (s !== null && s >= threshold) record(a, b, s, 'similarity');
    }
  }

  // Every pair inside a forced group counts as linked for complete-linkage checks
  const forcedGroups = new UnionFind(members.map((m) => m.source.sourceId));
  for (const [a, b] of forced) forcedGroups.union(a, b);
  for (const group of forcedGroups.groups()) {
    for (let i = 0; i < group.length; i++) {
      for (let j = i + 1; j < group.length; j++) linked.add(pairKey(group[i], group[j]));
    }
  }

  return { forced, linked, pairs };
}

function transitiveGroups(ids: string[], links: CompanyLinks): string[][] {
  const uf = new UnionFind(ids);
  for (const [a, b] of links.forced) uf.union(a, b);
  for (const pair of links.pairs) uf.union(pair.sourceIdA, pair.sourceIdB);
  return uf.groups();
}

function completeGroups(ids: string[], links: CompanyLinks): string[][] {
  const seeds = new UnionFind(ids);
  for (const [a, b] of links.forced) seeds.union(a, b);

  const clusters: string[][] = [];
  const ordered = seeds.groups().sort((x, y) => (x[0] < y[0] ? -1 : 1));
  for (const group of ordered) {
    const target = clusters.find((cluster) =>
      cluster.every((x) => group.every((y) => links.linked.has(pairKey(x, y)))),
    );
    if (target) target.push(...group);
    else clusters.push([...group]);
  }
  return clusters.map((cluster) => cluster.sort());
}

function verifiedAt(source: JobSource): number {
  return (source.lastVerifiedAt ?? source.discoveredAt).getTime();
}

function contentKey(p: PreparedSource): string {
  const s = p.source;
  return [
    p.features.fingerprint ?? '',
    s.descriptionText,
    s.title,
    s.locationText,
    s.salaryText ?? '',
    s.platform,
    s.sourceType,
    s.url,
    s.requisitionId ?? '',
    s.companyId,
    s.postedDate?.toISOString() ?? '',
  ].join('\u0000');
}

/**
 * Of two records sharing a `sourceId`, the one kept: most recently verified, then most
 * recently discovered, then the greater content key.
 */
function preferredCopy(a: PreparedSource, b: PreparedSource): PreparedSource {
  const verified = verifiedAt(a.source) - verifiedAt(b.source);
  if (verified !== 0) return verified > 0 ? a : b;
  const discovered = a.source.discoveredAt.getTime() - b.source.discoveredAt.getTime();
  if (discovered !== 0) return discovered > 0 ? a : b;
  return contentKey(a) >= contentKey(b) ? a : b;
}

/**
 * Prepare every posting once, keyed and ordered by `sourceId`. Repeated ids collapse to one
 * record chosen by content and dates alone, never by position in the input.
 */
export function prepareUnique(sources: JobSource[]): Map<string, PreparedSource> {
  const byId = new Map<string, PreparedSource>();
  for (const source of sources) {
    const candidate = prepareSource(source);
    const existing = byId.get(source.sourceId);
    byId.set(source.sourceId, existing ? preferredCopy(existing, candidate) : candidate);
  }
  return new Map([...byId.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/**
 * Detection over prepared postings; shared by the delta analyzer and the company scorer
 * so postings are only normalized once per run.
 */
export function detectPreparedDuplicates(
  sources: JobSource[],
  config: ReconcilerConfig = DEFAULT_RECONCILER_CONFIG,
  options: DetectDuplicatesOptions = {},
): PreparedDetection {
  const formedAt = options.now ?? new Date();
  const score: PairScorer =
    options.scorer ?? ((a, b) => similarity(a.features, b.features, config.similarity));

  const prepared = prepareUnique(sources);

  const byCompany = new Map<string, PreparedSource[]>();
  const groups: string[][] = [];
  for (const p of prepared.values()) {
    if (!isClusterable(p)) {
      groups.push([p.source.sourceId]);
      continue;
    }
    const companyId = p.source.companyId.trim();
    const members = byCompany.get(companyId) ?? [];
    members.push(p);
    byCompany.set(companyId, members);
  }

  const duplicatePairs: DuplicatePair[] = [];
  for (const companyId of [...byCompany.keys()].sort()) {
    const members = byCompany.get(companyId) ?? [];
    const links = linkCompany(members, config, score);
    const ids = members.map((m) => m.source.sourceId);
    const companyGroups =
      config.duplicates.clustering === 'complete'
        ? completeGroups(ids, links)
        : transitiveGroups(ids, links);
    groups.push(...companyGroups);
    duplicatePairs.push(...links.pairs);
  }

  const clusters = groups
    .map((ids) => buildCluster(ids.map((id) => prepared.get(id)).filter(isPrepared), formedAt))
    .sort((a, b) => (a.memberSourceIds[0] < b.memberSourceIds[0] ? -1 : 1));

  duplicatePairs.sort((x, y) =>
    pairKey(x.sourceIdA, x.sourceIdB) < pairKey(y.sourceIdA, y.sourceIdB) ? -1 : 1,
  );

  return { clusters, duplicatePairs, duplicatePairsFound: duplicatePairs.length, prepared };
}

function isPrepared(p: PreparedSource | undefined): p is PreparedSource {
  return p !== undefined;
}

/**
 * Group postings into duplicate clusters.
 */
export function detectDuplicates(
  sources: JobSource[],
  config: ReconcilerConfig = DEFAULT_RECONCILER_CONFIG,
  options: DetectDuplicatesOptions = {},
): DuplicateDetectionResult {
  const { clusters, duplicatePairs, duplicatePairsFound } = detectPreparedDuplicates(
    sources,
    config,
    options,
  );
  return { clusters, duplicatePairs, duplicatePairsFound };
}

/**
 * Copies of the postings with `jobClusterId` filled from the clusters.
 */
export function assignClusterIds(sources: JobSource[], clusters: DuplicateCluster[]): JobSource[] {
  const clusterOf = new Map<string, string>();
  for (const cluster of clusters) {
    for (const id of cluster.memberSourceIds) clusterOf.set(id, cluster.clusterId);
  }
  return sources.map((source) => ({
    ...source,
    jobClusterId: clusterOf.get(source.sourceId) ?? source.jobClusterId,
  }));
}
