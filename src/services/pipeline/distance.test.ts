import { describe, it, expect } from 'vitest';
import { maxDistanceFor, toSimilarity } from './distance.js';

describe('distance conversions', () => {
  it('maps cosine distance to similarity', () => {
    expect(toSimilarity(0.25, 'cosine')).toBe(0.75);
    expect(maxDistanceFor(0.7, 'cosine')).toBeCloseTo(0.3);
  });

  it('maps l2 distance between unit vectors to similarity', () => {
    expect(toSimilarity(1, 'l2')).toBe(0.5);
    expect(maxDistanceFor(0.5, 'l2')).toBe(1);
  });

  it('puts the threshold exactly at the maximum distance', () => {
    for (const metric of ['cosine', 'l2'] as const) {
      for (const threshold of [0, 0.3, 0.7, 1]) {
        expect(toSimilarity(maxDistanceFor(threshold, metric), metric)).toBeCloseTo(threshold);
      }
    }
  });
});
