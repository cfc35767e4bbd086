/**
 * CSV Input/Output
 *
 * Reads the two directory exports into typed records and flattens match
 * results into joined CSV rows.
 */

import * as fsPromises from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { MatchResult } from './matcher.js';
import {
  inspectionFromRow,
  placeFromRow,
  type EntityId,
  type FlatRow,
  type InspectionRecord,
  type PlaceRecord,
  type VenueRecord,
} from './records.js';

// ============================================================================
// COLUMNS
// ============================================================================

export type VenueKind = VenueRecord['kind'];

export const PLACE_COLUMNS = [
  'place_id',
  'name',
  'address',
  'latitude',
  'longitude',
  'rating',
  'num_reviews',
  'food_types',
  'price_level',
] as const;

export const INSPECTION_COLUMNS = [
  'fhrs_id',
  'business_name',
  'business_type',
  'address1',
  'address2',
  'address3',
  'address4',
  'postcode',
  'rating_value',
  'rating_date',
  'local_authority_name',
  'hygiene_score',
  'structural_score',
  'confidence_in_management_score',
  'latitude',
  'longitude',
] as const;

export const MATCH_COLUMNS = [
  'matched',
  'match_score',
  'match_name_score',
  'match_distance_score',
  'match_postcode_score',
  'match_distance_m',
] as const;

/** Prefix applied to the matched candidate's columns */
export const CANDIDATE_PREFIX = 'match_';

export function columnsFor(kind: VenueKind): readonly string[] {
  return kind === 'place' ? PLACE_COLUMNS : INSPECTION_COLUMNS;
}

/**
 * Known columns of a kind followed by any other column the rows carry,
 * in first-seen order.
 */
export function sourceColumns(kind: VenueKind, rows: Iterable<FlatRow>): string[] {
  const columns = [...columnsFor(kind)];
  const seen = new Set(columns);
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (seen.has(key)) continue;
      seen.add(key);
      columns.push(key);
    }
  }
  return columns;
}

export interface JoinedColumnOptions {
  /** Probe columns; defaults to the kind's known columns */
  probeColumns?: readonly string[];
  /** Candidate columns before prefixing; defaults to the kind's known columns */
  candidateColumns?: readonly string[];
}

/**
 * Header of the joined CSV for a probe/candidate pairing.
 */
export function joinedColumns(
  probeKind: VenueKind,
  candidateKind: VenueKind,
  options: JoinedColumnOptions = {}
): string[] {
  const probeColumns = options.probeColumns ?? columnsFor(probeKind);
  const candidateColumns = options.candidateColumns ?? columnsFor(candidateKind);
  return [
    ...probeColumns,
    ...candidateColumns.map((column) => `${CANDIDATE_PREFIX}${column}`),
    ...MATCH_COLUMNS,
  ];
}

// ============================================================================
// PARSING
// ============================================================================

/**
 * Parse CSV text with a header row into flat rows.
 * Non-string cells are dropped rather than trusted.
 */
export function parseCsv(content: string): FlatRow[] {
  const parsed: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });

  if (!Array.isArray(parsed)) return [];

  const rows: FlatRow[] = [];
  for (const entry of parsed) {
    if (typeof entry !== 'object' || entry === null) continue;
    const row: Record<string, string> = {};
    for (const [key, value] of Object.entries(entry)) {
      if (typeof value === 'string') row[key] = value;
    }
    rows.push(row);
  }
  return rows;
}

export interface LoadedVenues<T extends VenueRecord> {
  records: T[];

  /** Rows read from the file */
  rowCount: number;

  /** Known columns, then any extra columns found in the file */
  columns: string[];

  /** Ids seen more than once; only the first row of each is kept */
  duplicateIds: EntityId[];
}

/**
 * Keep the first record for every id. Records with an empty id are all kept.
 */
export function dedupeById<T extends VenueRecord>(
  records: readonly T[]
): { records: T[]; duplicateIds: EntityId[] } {
  const byId = new Map<EntityId, T>();
  const kept: T[] = [];
  const duplicateIds: EntityId[] = [];

  for (const record of records) {
    if (record.id === '') {
      kept.push(record);
      continue;
    }
    if (byId.has(record.id)) {
      duplicateIds.push(record.id);
      continue;
    }
    byId.set(record.id, record);
    kept.push(record);
  }

  return { records: kept, duplicateIds };
}

/**
 * Convert flat rows into typed records of one kind.
 */
export function recordsFromRows(rows: readonly FlatRow[], kind: 'place'): LoadedVenues<PlaceRecord>;
export function recordsFromRows(rows: readonly FlatRow[], kind: 'inspection'): LoadedVenues<InspectionRecord>;
export function recordsFromRows(rows: readonly FlatRow[], kind: VenueKind): LoadedVenues<VenueRecord>;
export function recordsFromRows(rows: readonly FlatRow[], kind: VenueKind): LoadedVenues<VenueRecord> {
  const records: VenueRecord[] = rows.map((row) =>
    kind === 'place' ? placeFromRow(row) : inspectionFromRow(row)
  );
  const deduped = dedupeById(records);

  return {
    records: deduped.records,
    rowCount: rows.length,
    columns: sourceColumns(kind, rows),
    duplicateIds: deduped.duplicateIds,
  };
}

/**
 * Read a places directory export.
 */
export async function readPlacesCsv(filePath: string): Promise<LoadedVenues<PlaceRecord>> {
  const content = await fsPromises.readFile(filePath, 'utf-8');
  return recordsFromRows(parseCsv(content), 'place');
}

/**
 * Read a hygiene-inspection registry export.
 */
export async function readInspectionsCsv(filePath: string): Promise<LoadedVenues<InspectionRecord>> {
  const content = await fsPromises.readFile(filePath, 'utf-8');
  return recordsFromRows(parseCsv(content), 'inspection');
}

// ============================================================================
// FLATTENING
// ============================================================================

function cell(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

/**
 * Flatten a record back into its export columns. Cells of the source row are
 * written back verbatim, extra columns included; the typed fields fill in
 * only what the source row lacks.
 */
export function recordToRow(record: VenueRecord): Record<string, string> {
  const row = typedRow(record);
  for (const [key, value] of Object.entries(record.source)) {
    if (value !== undefined) row[key] = value;
  }
  return row;
}

function typedRow(record: VenueRecord): Record<string, string> {
  if (record.kind === 'place') {
    return {
      place_id: cell(record.id),
      name: record.name,
      address: record.address,
      latitude: cell(record.coordinates?.lat),
      longitude: cell(record.coordinates?.lng),
      rating: cell(record.rating),
      num_reviews: cell(record.reviewCount),
      food_types: record.foodTypes.join(';'),
      price_level: cell(record.priceLevel),
    };
  }

  return {
    fhrs_id: cell(record.id),
    business_name: record.businessName,
    business_type: cell(record.businessType),
    address1: cell(record.addressLines[0]),
    address2: cell(record.addressLines[1]),
    address3: cell(record.addressLines[2]),
    address4: cell(record.addressLines[3]),
    postcode: record.postcode,
    rating_value: cell(record.ratingValue),
    rating_date: cell(record.ratingDate),
    local_authority_name: cell(record.localAuthorityName),
    hygiene_score: cell(record.hygieneScore),
    structural_score: cell(record.structuralScore),
    confidence_in_management_score: cell(record.confidenceInManagementScore),
    latitude: cell(record.coordinates?.lat),
    longitude: cell(record.coordinates?.lng),
  };
}

/**
 * Flatten one match result: probe columns, prefixed candidate columns
 * (empty when unmatched) and the score columns.
 */
export function flattenMatch(
  result: MatchResult,
  candidateKind: VenueKind,
  candidateColumns: readonly string[] = columnsFor(candidateKind)
): Record<string, string> {
  const row: Record<string, string> = { ...recordToRow(result.probe) };

  const candidateRow: Record<string, string> = result.candidate ? recordToRow(result.candidate) : {};
  for (const column of candidateColumns) {
    row[`${CANDIDATE_PREFIX}${column}`] = candidateRow[column] ?? '';
  }

  row.matched = result.candidateId !== null ? 'true' : 'false';
  row.match_score = result.combinedScore.toFixed(3);
  row.match_name_score = result.nameScore.toFixed(3);
  row.match_distance_score = result.distanceScore.toFixed(3);
  row.match_postcode_score = result.postcodeScore.toFixed(3);
  row.match_distance_m = result.distanceMeters !== null ? result.distanceMeters.toFixed(1) : '';

  return row;
}

/**
 * Render match results as joined CSV text.
 *
 * Without explicit columns, extra source columns are taken from the probes
 * and matched candidates in `results`; pass the loaded files' `columns` to
 * keep the header stable whatever matched.
 */
export function formatJoinedCsv(
  results: readonly MatchResult[],
  probeKind: VenueKind,
  candidateKind: VenueKind,
  options: JoinedColumnOptions = {}
): string {
  const probeColumns =
    options.probeColumns ?? sourceColumns(probeKind, results.map((result) => result.probe.source));
  const candidateColumns =
    options.candidateColumns ??
    sourceColumns(
      candidateKind,
      results.flatMap((result) => (result.candidate ? [result.candidate.source] : []))
    );

  return stringify(
    results.map((result) => flattenMatch(result, candidateKind, candidateColumns)),
    {
      header: true,
      columns: joinedColumns(probeKind, candidateKind, { probeColumns, candidateColumns }),
    }
  );
}
