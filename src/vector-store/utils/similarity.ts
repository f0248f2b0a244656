import type { SimilarityMetric } from '../../config/rag-config.types';

export type QdrantDistance = 'Cosine' | 'Dot' | 'Euclid';

export const QDRANT_DISTANCE: Record<SimilarityMetric, QdrantDistance> = {
  cosine: 'Cosine',
  dot: 'Dot',
  euclid: 'Euclid',
};

export interface ScoreDistance {
  score: number;
  distance: number;
}

/**
 * Map a raw Qdrant score to (similarity, distance).
 *
 * Cosine and Dot scores are similarities (higher is closer). Euclid scores are
 * distances (lower is closer) and are turned into a similarity in (0, 1].
 */
export function toScoreDistance(
  metric: SimilarityMetric,
  raw: number,
): ScoreDistance {
  switch (metric) {
    case 'cosine':
      return { score: raw, distance: 1 - raw };
    case 'dot':
      return { score: raw, distance: -raw };
    case 'euclid':
      return { score: 1 / (1 + raw), distance: raw };
  }
}
