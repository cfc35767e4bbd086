/**
 * Match Scoring
 *
 * The three signals the matcher fuses, and the weighted sum.
 *
 * Weights (defaults, unit-sum scale):
 * - Name similarity: 0.7
 * - Distance bucket: 0.2
 * - Postcode corroboration: 0.1
 */

import { distanceBetween } from './geo-utils.js';
import { nameSimilarity } from './token-ratio.js';
import type { MatchConfig, SignalWeights } from './config.js';
import type { NormalizedEntity } from './records.js';

export interface ScoreBreakdown {
  combinedScore: number;
  nameScore: number;
  distanceScore: number;
  postcodeScore: number;
  /** Exact haversine distance, null when either side lacks coordinates */
  distanceMeters: number | null;
}

/**
 * Piecewise-constant distance score.
 *
 * With the defaults: 1.0 ≤ 50 m, 0.7 ≤ 150 m, 0.4 ≤ 300 m,
 * 0.2 ≤ maxDistanceMeters, otherwise 0. Missing distance scores 0.
 * Past maxDistanceMeters the score is 0 whatever the breakpoints say.
 */
export function distanceScore(
  distanceMeters: number | null,
  config: Pick<MatchConfig, 'distanceBuckets' | 'outerDistanceScore' | 'maxDistanceMeters'>
): number {
  if (distanceMeters === null || distanceMeters > config.maxDistanceMeters) return 0;

  for (const bucket of config.distanceBuckets) {
    if (distanceMeters <= bucket.maxMeters) {
      return bucket.score;
    }
  }

  return config.outerDistanceScore;
}

/**
 * Postcode corroboration: 1 when one side's postcode appears inside the
 * other side's compacted address, otherwise 0.
 */
export function postcodeScore(a: NormalizedEntity, b: NormalizedEntity): number {
  const contains = (postcodeKey: string, addressKey: string): boolean =>
    postcodeKey.length > 0 && addressKey.length > 0 && addressKey.includes(postcodeKey);

  return contains(b.postcodeKey, a.addressKey) || contains(a.postcodeKey, b.addressKey) ? 1 : 0;
}

/**
 * Weighted sum of the three signals.
 */
export function combineScores(
  signals: { name: number; distance: number; postcode: number },
  weights: SignalWeights
): number {
  return (
    weights.name * signals.name +
    weights.distance * signals.distance +
    weights.postcode * signals.postcode
  );
}

/**
 * Score one probe/candidate pair.
 */
export function scorePair(
  probe: NormalizedEntity,
  candidate: NormalizedEntity,
  config: MatchConfig
): ScoreBreakdown {
  const distanceMeters = distanceBetween(probe.coordinates, candidate.coordinates);

  const name = nameSimilarity(probe.nameKey, candidate.nameKey, config.nameScorer);
  const distance = distanceScore(distanceMeters, config);
  const postcode = postcodeScore(probe, candidate);

  return {
    combinedScore: combineScores({ name, distance, postcode }, config.weights),
    nameScore: name,
    distanceScore: distance,
    postcodeScore: postcode,
    distanceMeters,
  };
}
