/**
 * Matching Engine
 *
 * For every probe entity, finds the single best candidate under combined
 * name, distance and postcode similarity, or reports no match.
 *
 * Per probe:
 * 1. Prune candidates to the window around the probe (all candidates when the
 *    probe has no coordinates)
 * 2. Score each survivor (name, distance bucket, postcode corroboration)
 * 3. Reject anything beyond maxDistanceMeters by exact distance
 * 4. Keep the first maximum combined score
 * 5. Accept when the best score reaches minMatchScore
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { resolveMatchConfig, type MatchConfig, type MatchConfigInput } from './config.js';
import { scorePair, type ScoreBreakdown } from './scoring.js';
import { SpatialIndex } from './spatial-index.js';
import {
  normalizeRecords,
  type EntityId,
  type NormalizedEntity,
  type VenueRecord,
} from './records.js';

// ============================================================================
// TYPES
// ============================================================================

export interface MatchResult<P extends VenueRecord = VenueRecord, C extends VenueRecord = VenueRecord> {
  probeId: EntityId;
  probe: P;

  /** Matched candidate id, null when nothing reached the floor */
  candidateId: EntityId | null;

  /** Full candidate record for enrichment, null when unmatched */
  candidate: C | null;

  /** Best combined score seen (kept for diagnostics when unmatched) */
  combinedScore: number;
  nameScore: number;
  distanceScore: number;
  postcodeScore: number;
  distanceMeters: number | null;

  /** Candidates that survived spatial pruning */
  poolSize: number;
}

/**
 * Everything built once per run and shared read-only by every probe search.
 */
export interface PreparedCandidates<C extends VenueRecord> {
  config: MatchConfig;
  index: SpatialIndex<NormalizedEntity<C>>;
}

export interface MatchProgress {
  done: number;
  total: number;
  matched: number;
}

export interface MatchAllAsyncOptions {
  /** Checked between probes; aborting rejects with the signal's reason */
  signal?: AbortSignal;

  /** Probes scored before yielding to the event loop */
  batchSize?: number;

  /** Called after every batch */
  onProgress?: (progress: MatchProgress) => void;
}

const DEFAULT_BATCH_SIZE = 250;

// ============================================================================
// PREPARATION
// ============================================================================

/**
 * Normalize candidates and build the spatial index.
 */
export function prepareCandidates<C extends VenueRecord>(
  candidates: readonly C[],
  config: MatchConfig
): PreparedCandidates<C> {
  const normalized = normalizeRecords(candidates);
  return {
    config,
    index: new SpatialIndex(normalized, {
      radiusMeters: config.maxDistanceMeters,
      margin: config.pruneMargin,
    }),
  };
}

/**
 * Candidate pool for one probe.
 */
export function candidatePool<C extends VenueRecord>(
  probe: NormalizedEntity,
  prepared: PreparedCandidates<C>
): readonly NormalizedEntity<C>[] {
  if (!probe.coordinates) {
    return prepared.index.all();
  }
  return prepared.index.query(probe.coordinates);
}

// ============================================================================
// SINGLE PROBE
// ============================================================================

/**
 * Find the best candidate for one normalized probe.
 */
export function matchEntity<P extends VenueRecord, C extends VenueRecord>(
  probe: NormalizedEntity<P>,
  prepared: PreparedCandidates<C>
): MatchResult<P, C> {
  const { config } = prepared;
  const pool = candidatePool(probe, prepared);

  let best: { candidate: NormalizedEntity<C>; scores: ScoreBreakdown } | null = null;

  for (const candidate of pool) {
    const scores = scorePair(probe, candidate, config);

    // Exact distance is authoritative over the coarse window
    if (scores.distanceMeters !== null && scores.distanceMeters > config.maxDistanceMeters) {
      continue;
    }

    if (scores.nameScore < config.minNameScore) {
      continue;
    }

    // Strictly greater: the first maximum wins ties
    if (!best || scores.combinedScore > best.scores.combinedScore) {
      best = { candidate, scores };
    }
  }

  if (!best) {
    return {
      probeId: probe.id,
      probe: probe.record,
      candidateId: null,
      candidate: null,
      combinedScore: 0,
      nameScore: 0,
      distanceScore: 0,
      postcodeScore: 0,
      distanceMeters: null,
      poolSize: pool.length,
    };
  }

  const accepted = best.scores.combinedScore >= config.minMatchScore;

  return {
    probeId: probe.id,
    probe: probe.record,
    candidateId: accepted ? best.candidate.id : null,
    candidate: accepted ? best.candidate.record : null,
    ...best.scores,
    poolSize: pool.length,
  };
}

// ============================================================================
// BATCH
// ============================================================================

/**
 * Match every probe against the candidate collection.
 * Results come back in probe order; neither input is modified.
 *
 * @throws MatchConfigError before any record is processed
 */
export function matchAll<P extends VenueRecord, C extends VenueRecord>(
  probes: readonly P[],
  candidates: readonly C[],
  config?: MatchConfig | MatchConfigInput
): MatchResult<P, C>[] {
  const resolved = resolveMatchConfig(config);
  const prepared = prepareCandidates(candidates, resolved);

  return normalizeRecords(probes).map((probe) => matchEntity(probe, prepared));
}

/**
 * Same as `matchAll`, but yields to the event loop between batches, reports
 * progress and can be cancelled between probes.
 *
 * @throws MatchConfigError before any record is processed
 */
export async function matchAllAsync<P extends VenueRecord, C extends VenueRecord>(
  probes: readonly P[],
  candidates: readonly C[],
  config?: MatchConfig | MatchConfigInput,
  options: MatchAllAsyncOptions = {}
): Promise<MatchResult<P, C>[]> {
  const resolved = resolveMatchConfig(config);
  const batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
  const prepared = prepareCandidates(candidates, resolved);
  const normalized = normalizeRecords(probes);

  const results: MatchResult<P, C>[] = new Array(normalized.length);
  let matched = 0;

  for (let start = 0; start < normalized.length; start += batchSize) {
    const end = Math.min(start + batchSize, normalized.length);

    for (let i = start; i < end; i++) {
      options.signal?.throwIfAborted();
      const result = matchEntity(normalized[i], prepared);
      if (result.candidateId !== null) matched++;
      results[i] = result;
    }

    options.onProgress?.({ done: end, total: normalized.length, matched });

    if (end < normalized.length) {
      await yieldToEventLoop();
    }
  }

  return results;
}
