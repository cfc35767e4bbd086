/**
 * venuelink - record linkage between a restaurant directory and hygiene
 * inspection records
 *
 * @packageDocumentation
 */

// ============================================================================
// GEO UTILITIES
// ============================================================================

export {
  type Coordinates,
  type BoundingBox,
  EARTH_RADIUS_METERS,
  haversineDistance,
  distanceBetween,
  getBoundingBox,
  longitudeDelta,
  isInsideBoundingBox,
  isValidCoordinate,
  parseCoordinates,
} from './geo-utils.js';

// ============================================================================
// NORMALIZATION & NAME SIMILARITY
// ============================================================================

export { normalizeName, normalizePostcode, compactAddress } from './normalize.js';

export { indelDistance, indelRatio } from './edit-ratio.js';

export { jaroSimilarity, jaroWinklerSimilarity } from './jaro-winkler.js';

export {
  type NameScorer,
  NAME_SCORER_NAMES,
  tokenize,
  tokenSortRatio,
  tokenSetRatio,
  nameSimilarity,
  scoreWithAllScorers,
} from './token-ratio.js';

// ============================================================================
// RECORDS & CONFIGURATION
// ============================================================================

export {
  type EntityId,
  type FlatRow,
  type PlaceRecord,
  type InspectionRecord,
  type VenueRecord,
  type NormalizedEntity,
  placeFromRow,
  inspectionFromRow,
  recordName,
  normalizeRecord,
  normalizeRecords,
} from './records.js';

export {
  type DistanceBucket,
  type SignalWeights,
  type MatchConfig,
  type MatchConfigInput,
  DEFAULT_MATCH_CONFIG,
  MatchConfigError,
  validateMatchConfig,
  resolveMatchConfig,
  loadMatchConfigFile,
} from './config.js';

// ============================================================================
// MATCHING
// ============================================================================

export { type ScoreBreakdown, distanceScore, postcodeScore, combineScores, scorePair } from './scoring.js';

export { SpatialIndex, type SpatialIndexOptions } from './spatial-index.js';

export {
  type MatchResult,
  type MatchProgress,
  type MatchAllAsyncOptions,
  type PreparedCandidates,
  prepareCandidates,
  matchEntity,
  matchAll,
  matchAllAsync,
} from './matcher.js';

// ============================================================================
// CSV & SUMMARY
// ============================================================================

export {
  type VenueKind,
  type LoadedVenues,
  type JoinedColumnOptions,
  PLACE_COLUMNS,
  INSPECTION_COLUMNS,
  MATCH_COLUMNS,
  joinedColumns,
  sourceColumns,
  parseCsv,
  recordsFromRows,
  readPlacesCsv,
  readInspectionsCsv,
  recordToRow,
  flattenMatch,
  formatJoinedCsv,
} from './csv-io.js';

export {
  type MatchSummary,
  DEFAULT_HIGH_CONFIDENCE_SCORE,
  summarizeMatches,
  summarizeJoinedRows,
  formatSummary,
} from './summary.js';
