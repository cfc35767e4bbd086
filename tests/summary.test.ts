import { describe, it, expect } from 'vitest';
import { matchAll } from '../src/matcher.js';
import {
  DEFAULT_HIGH_CONFIDENCE_SCORE,
  formatSummary,
  summarizeJoinedRows,
  summarizeMatches,
} from '../src/summary.js';
import { CROWN_CANDIDATE, CROWN_PROBE, makePlace } from './helpers.js';

describe('summarizeMatches', () => {
  it('counts matched and high-confidence results', () => {
    const probes = [CROWN_PROBE, makePlace({ id: 'g2', name: 'Sushi Kyo' })];
    const summary = summarizeMatches(matchAll(probes, [CROWN_CANDIDATE]));

    expect(summary).toEqual({
      total: 2,
      matched: 1,
      highConfidence: 1,
      highConfidenceScore: DEFAULT_HIGH_CONFIDENCE_SCORE,
      matchRate: 0.5,
      highConfidenceRate: 0.5,
    });
  });

  it('reports zero rates for no results', () => {
    const summary = summarizeMatches([]);
    expect(summary.matchRate).toBe(0);
    expect(summary.highConfidenceRate).toBe(0);
  });
});

describe('summarizeJoinedRows', () => {
  const rows = [
    { matched: 'true', match_score: '0.900' },
    { matched: 'true', match_score: '0.600' },
    { matched: 'false', match_score: '0.300' },
    { matched: 'true', match_score: '' },
  ];

  it('reads the matched and score columns', () => {
    const summary = summarizeJoinedRows(rows);

    expect(summary.total).toBe(4);
    expect(summary.matched).toBe(3);
    expect(summary.highConfidence).toBe(1);
    expect(summary.matchRate).toBe(0.75);
    expect(summary.highConfidenceRate).toBe(0.25);
  });

  it('honours a custom threshold', () => {
    expect(summarizeJoinedRows(rows, { highConfidenceScore: 0.5 }).highConfidence).toBe(2);
  });
});

describe('formatSummary', () => {
  it('prints counts with percentages', () => {
    const summary = summarizeJoinedRows([
      { matched: 'true', match_score: '0.900' },
      { matched: 'true', match_score: '0.600' },
      { matched: 'false', match_score: '0.300' },
      { matched: 'true', match_score: '' },
    ]);

    expect(formatSummary(summary, 'rows')).toEqual([
      'Total rows: 4',
      'Matched: 3 (75.0%)',
      'High-confidence matches (score >= 0.8): 1 (25.0%)',
    ]);
  });
});
