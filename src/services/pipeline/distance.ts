/**
 * Conversions between vector-store distances and similarity.
 *
 * cosine: distance = 1 - cos(a, b), similarity = 1 - distance.
 * l2: Euclidean distance between unit-normalized embeddings, where d² = 2(1 - cos),
 * so similarity = 1 - d²/2. Unnormalized embeddings have no fixed similarity scale
 * under l2 and are not supported.
 */

export type DistanceMetric = 'cosine' | 'l2';

export function toSimilarity(distance: number, metric: DistanceMetric): number {
  switch (metric) {
    case 'cosine':
      return 1 - distance;
    case 'l2':
      return 1 - (distance * distance) / 2;
  }
}

/**
 * Largest distance that still meets the similarity threshold.
 */
export function maxDistanceFor(threshold: number, metric: DistanceMetric): number {
  switch (metric) {
    case 'cosine':
      return 1 - threshold;
    case 'l2':
      return Math.sqrt(2 * (1 - threshold));
  }
}
