import { describe, it, expect } from 'vitest';
import {
  shingle,
  computeContentFingerprint,
  buildFeatureVector,
  normalizeSource,
  prepareSource,
} from '@reconciler/core';
import { makeSource, PM_DESCRIPTION } from './fixtures/sources';

describe('shingle', () => {
  it('produces sorted unique word 3-grams', () => {
    expect(shingle(['a', 'b', 'c', 'a', 'b', 'c'])).toEqual(['a b c', 'b c a', 'c a b']);
  });

  it('keeps short sequences as one shingle', () => {
    expect(shingle(['data', 'engineer'])).toEqual(['data engineer']);
    expect(shingle([])).toEqual([]);
  });
});

describe('computeContentFingerprint', () => {
  it('ignores markup, case and boilerplate differences', () => {
    const plain = normalizeSource(makeSource());
    const decorated = normalizeSource(
      makeSource({
        title: 'SENIOR PRODUCT MANAGER',
        descriptionText: `<div>${PM_DESCRIPTION}</div><p>Acme is an equal opportunity employer.</p>`,
      }),
    );
    expect(computeContentFingerprint(decorated)).toBe(computeContentFingerprint(plain));
  });

  it('changes when the description changes', () => {
    const a = normalizeSource(makeSource());
    const b = normalizeSource(makeSource({ descriptionText: `${PM_DESCRIPTION} Travel required.` }));
    expect(computeContentFingerprint(a)).not.toBe(computeContentFingerprint(b));
  });

  it('is a sha-256 hex digest', () => {
    expect(computeContentFingerprint(normalizeSource(makeSource()))).toMatch(/^[0-9a-f]{64}$/);
  });

  it('is null for non-comparable content', () => {
    expect(computeContentFingerprint(normalizeSource(makeSource({ descriptionText: '' })))).toBeNull();
  });
});

describe('buildFeatureVector', () => {
  it('weights title terms double and drops stopwords', () => {
    const vector = buildFeatureVector(
      normalizeSource(makeSource({ title: 'Data Engineer', descriptionText: 'Build data pipelines for the team.' })),
    );
    expect(Object.fromEntries(vector.terms)).toEqual({
      data: 3,
      engineer: 2,
      build: 1,
      pipelines: 1,
    });
    expect(vector.norm).toBeCloseTo(Math.sqrt(15), 12);
  });

  it('carries location and salary through', () => {
    const { features } = prepareSource(makeSource({ salaryText: '$150k - $180k' }));
    expect(features.locationTokens).toEqual(['california', 'san francisco']);
    expect(features.salary).toEqual({ min: 150000, max: 180000, currency: 'USD', period: 'YEAR' });
  });
});
