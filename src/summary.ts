/**
 * Match Summary
 *
 * Match rate and high-confidence counts, either from in-memory results or
 * from a joined CSV written earlier.
 */

import type { MatchResult } from './matcher.js';
import type { FlatRow } from './records.js';

export const DEFAULT_HIGH_CONFIDENCE_SCORE = 0.8;

export interface MatchSummary {
  total: number;
  matched: number;
  highConfidence: number;
  highConfidenceScore: number;

  /** matched / total, 0 when there are no rows */
  matchRate: number;

  /** highConfidence / total, 0 when there are no rows */
  highConfidenceRate: number;
}

export interface SummaryOptions {
  /** Matched rows scoring at or above this count as high confidence */
  highConfidenceScore?: number;
}

function rate(count: number, total: number): number {
  return total > 0 ? count / total : 0;
}

function buildSummary(
  total: number,
  matchedScores: readonly (number | null)[],
  highConfidenceScore: number
): MatchSummary {
  const highConfidence = matchedScores.filter(
    (score) => score !== null && score >= highConfidenceScore
  ).length;

  return {
    total,
    matched: matchedScores.length,
    highConfidence,
    highConfidenceScore,
    matchRate: rate(matchedScores.length, total),
    highConfidenceRate: rate(highConfidence, total),
  };
}

/**
 * Summarize results straight from the matcher.
 */
export function summarizeMatches(
  results: readonly MatchResult[],
  options: SummaryOptions = {}
): MatchSummary {
  const threshold = options.highConfidenceScore ?? DEFAULT_HIGH_CONFIDENCE_SCORE;
  const matchedScores = results
    .filter((result) => result.candidateId !== null)
    .map((result) => result.combinedScore);

  return buildSummary(results.length, matchedScores, threshold);
}

/**
 * Summarize rows of a joined CSV.
 *
 * A row counts as matched when its `matched` column is "true". An unparseable
 * `match_score` keeps the row matched but never high confidence.
 */
export function summarizeJoinedRows(
  rows: readonly FlatRow[],
  options: SummaryOptions = {}
): MatchSummary {
  const threshold = options.highConfidenceScore ?? DEFAULT_HIGH_CONFIDENCE_SCORE;
  const matchedScores: (number | null)[] = [];

  for (const row of rows) {
    if ((row.matched ?? '').trim().toLowerCase() !== 'true') continue;

    const raw = (row.match_score ?? '').trim();
    const score = raw === '' ? NaN : Number(raw);
    matchedScores.push(Number.isFinite(score) ? score : null);
  }

  return buildSummary(rows.length, matchedScores, threshold);
}

/**
 * Human-readable summary lines.
 */
export function formatSummary(summary: MatchSummary, probeLabel = 'probes'): string[] {
  const percent = (value: number): string => `${(value * 100).toFixed(1)}%`;

  return [
    `Total ${probeLabel}: ${summary.total}`,
    `Matched: ${summary.matched} (${percent(summary.matchRate)})`,
    `High-confidence matches (score >= ${summary.highConfidenceScore}): ` +
      `${summary.highConfidence} (${percent(summary.highConfidenceRate)})`,
  ];
}
