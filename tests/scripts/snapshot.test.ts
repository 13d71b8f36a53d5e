import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { parseSnapshot } from '../../scripts/snapshot';

const samplePath = fileURLToPath(new URL('../fixtures/sample-snapshot.json', import.meta.url));

describe('parseSnapshot', () => {
  it('classifies rows that arrive without platform or source type', () => {
    const { sources } = parseSnapshot({
      sources: [
        {
          sourceId: 'a',
          companyId: 'acme',
          url: 'https://boards.greenhouse.io/acme/jobs/1',
          discoveredAt: '2024-03-01T00:00:00Z',
        },
        {
          sourceId: 'b',
          companyId: 'acme',
          platform: 'referral',
          sourceType: 'primary',
          url: 'https://www.linkedin.com/jobs/view/1',
          discoveredAt: '2024-03-01T00:00:00Z',
        },
      ],
    });
    expect(sources.map((s) => [s.platform, s.sourceType])).toEqual([
      ['greenhouse', 'primary'],
      ['referral', 'primary'],
    ]);
    expect(sources[0].discoveredAt).toEqual(new Date('2024-03-01T00:00:00Z'));
    expect(sources[0].postedDate).toBeNull();
  });

  it('reads the sample snapshot', () => {
    const { sources, companyNames } = parseSnapshot(JSON.parse(readFileSync(samplePath, 'utf-8')));
    expect(sources).toHaveLength(5);
    expect(companyNames).toEqual({ acme: 'Acme Corp', globex: 'Globex' });
    expect(sources.find((s) => s.sourceId === 'acme-li-1')?.sourceType).toBe('secondary');
  });

  it('rejects rows without a sourceId', () => {
    expect(() => parseSnapshot({ sources: [{ discoveredAt: '2024-03-01' }] })).toThrow();
  });
});
