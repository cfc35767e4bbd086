/**
 * Matching Configuration
 *
 * Every threshold and weight the engine uses, with defaults and Zod
 * validation. An invalid configuration throws before any record is scored.
 *
 * Scale: the three signals are each 0-1 and the weights sum to `weightTotal`
 * (1 by default), so the combined score lives in [0, weightTotal] and
 * `minMatchScore` is read on that same scale.
 */

import * as fsPromises from 'fs/promises';
import { z } from 'zod';
import { NAME_SCORER_NAMES, type NameScorer } from './token-ratio.js';

// ============================================================================
// TYPES
// ============================================================================

export interface DistanceBucket {
  /** Upper bound of the bucket in meters (inclusive) */
  maxMeters: number;

  /** Score awarded for distances up to `maxMeters` (0-1) */
  score: number;
}

export interface SignalWeights {
  name: number;
  distance: number;
  postcode: number;
}

export interface MatchConfig {
  /** Hard spatial cutoff; candidates further away are never accepted (meters) */
  maxDistanceMeters: number;

  /** Acceptance floor on the combined score */
  minMatchScore: number;

  /** Signal weights */
  weights: SignalWeights;

  /** Fixed total the weights must sum to */
  weightTotal: number;

  /**
   * Distance-score breakpoints, ascending. Breakpoints past
   * maxDistanceMeters never apply, since the cutoff rejects first.
   */
  distanceBuckets: DistanceBucket[];

  /** Score between the last breakpoint and maxDistanceMeters */
  outerDistanceScore: number;

  /** Factor (>= 1) widening the coarse pruning window */
  pruneMargin: number;

  /** Name similarity algorithm */
  nameScorer: NameScorer;

  /** Candidates scoring below this on name alone are skipped (0 disables) */
  minNameScore: number;
}

export const DEFAULT_MATCH_CONFIG: MatchConfig = {
  maxDistanceMeters: 500,
  minMatchScore: 0.5,
  weights: { name: 0.7, distance: 0.2, postcode: 0.1 },
  weightTotal: 1,
  distanceBuckets: [
    { maxMeters: 50, score: 1.0 },
    { maxMeters: 150, score: 0.7 },
    { maxMeters: 300, score: 0.4 },
  ],
  outerDistanceScore: 0.2,
  pruneMargin: 1.1,
  nameScorer: 'token-sort',
  minNameScore: 0,
};

const WEIGHT_TOLERANCE = 1e-9;

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Thrown when a configuration cannot produce meaningful scores.
 */
export class MatchConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid match configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'MatchConfigError';
    this.issues = issues;
  }
}

// ============================================================================
// SCHEMA
// ============================================================================

const finite = z.number().finite();
const unitScore = finite.min(0).max(1);

const distanceBucketSchema = z.object({
  maxMeters: finite.positive(),
  score: unitScore,
});

const matchConfigSchema = z
  .object({
    maxDistanceMeters: finite.positive(),
    minMatchScore: finite.min(0),
    weights: z.object({
      name: finite.min(0),
      distance: finite.min(0),
      postcode: finite.min(0),
    }),
    weightTotal: finite.positive(),
    distanceBuckets: z.array(distanceBucketSchema),
    outerDistanceScore: unitScore,
    pruneMargin: finite.min(1),
    nameScorer: z.enum(NAME_SCORER_NAMES),
    minNameScore: unitScore,
  })
  .strict()
  .superRefine((config, ctx) => {
    const { name, distance, postcode } = config.weights;
    const sum = name + distance + postcode;
    if (Math.abs(sum - config.weightTotal) > WEIGHT_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['weights'],
        message: `weights sum to ${sum}, expected ${config.weightTotal}`,
      });
    }

    if (config.minMatchScore > config.weightTotal) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minMatchScore'],
        message: `minMatchScore ${config.minMatchScore} exceeds weightTotal ${config.weightTotal}`,
      });
    }

    config.distanceBuckets.forEach((bucket, i) => {
      if (bucket.score < config.outerDistanceScore) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['distanceBuckets', i, 'score'],
          message: `score ${bucket.score} is below outerDistanceScore ${config.outerDistanceScore}`,
        });
      }

      if (i === 0) return;
      const previous = config.distanceBuckets[i - 1];
      if (bucket.maxMeters <= previous.maxMeters) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['distanceBuckets', i, 'maxMeters'],
          message: 'breakpoints must be strictly increasing',
        });
      }
      if (bucket.score > previous.score) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['distanceBuckets', i, 'score'],
          message: 'bucket scores must not increase with distance',
        });
      }
    });
  });

/**
 * Partial configuration accepted from callers and JSON files.
 * `weights` may itself be partial.
 */
export type MatchConfigInput = Partial<Omit<MatchConfig, 'weights'>> & {
  weights?: Partial<SignalWeights>;
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `${where}: ${issue.message}`;
  });
}

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Validate a complete configuration.
 *
 * @throws MatchConfigError listing every problem found
 */
export function validateMatchConfig(config: unknown): MatchConfig {
  const result = matchConfigSchema.safeParse(config);
  if (!result.success) {
    throw new MatchConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Merge caller overrides over the defaults and validate the result.
 * Keys left undefined keep their default.
 *
 * @throws MatchConfigError
 */
export function resolveMatchConfig(overrides: MatchConfigInput = {}): MatchConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );

  return validateMatchConfig({
    ...DEFAULT_MATCH_CONFIG,
    ...defined,
    weights: { ...DEFAULT_MATCH_CONFIG.weights, ...overrides.weights },
  });
}

/**
 * Read a JSON configuration file and resolve it over the defaults.
 *
 * @throws MatchConfigError when the file is not a JSON object or fails validation
 */
export async function loadMatchConfigFile(filePath: string): Promise<MatchConfig> {
  const content = await fsPromises.readFile(filePath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MatchConfigError([`${filePath}: not valid JSON (${reason})`]);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new MatchConfigError([`${filePath}: expected a JSON object`]);
  }

  return mergeUnknownOverrides(parsed);
}

function mergeUnknownOverrides(overrides: object): MatchConfig {
  const weights = 'weights' in overrides ? overrides.weights : undefined;
  const mergedWeights =
    typeof weights === 'object' && weights !== null && !Array.isArray(weights)
      ? { ...DEFAULT_MATCH_CONFIG.weights, ...weights }
      : weights ?? DEFAULT_MATCH_CONFIG.weights;

  return validateMatchConfig({
    ...DEFAULT_MATCH_CONFIG,
    ...overrides,
    weights: mergedWeights,
  });
}
