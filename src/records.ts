/**
 * Venue Records
 *
 * Typed records for both sources, adapters from flat CSV rows, and the
 * normalized form the matcher compares.
 */

import { parseCoordinates, parseOptionalNumber, type Coordinates } from './geo-utils.js';
import { compactAddress, normalizeName, normalizePostcode } from './normalize.js';

// ============================================================================
// TYPES
// ============================================================================

export type EntityId = string | number;

/** Flat key-value row as read from a CSV export */
export type FlatRow = Readonly<Record<string, string | undefined>>;

/**
 * A venue from the commercial places directory.
 */
export interface PlaceRecord {
  readonly kind: 'place';
  readonly id: EntityId;
  readonly name: string;
  readonly address: string;
  readonly coordinates: Coordinates | null;
  readonly rating: number | null;
  readonly reviewCount: number | null;
  readonly foodTypes: readonly string[];
  readonly priceLevel: string | null;
  /** Export row as read; written back verbatim in the joined output */
  readonly source: FlatRow;
}

/**
 * An establishment from the hygiene-inspection registry.
 */
export interface InspectionRecord {
  readonly kind: 'inspection';
  readonly id: EntityId;
  readonly businessName: string;
  readonly businessType: string | null;
  /** address1-address4 by position; empty slots stay as '' */
  readonly addressLines: readonly string[];
  readonly postcode: string;
  readonly coordinates: Coordinates | null;
  readonly ratingValue: string | null;
  readonly ratingDate: string | null;
  readonly localAuthorityName: string | null;
  readonly hygieneScore: number | null;
  readonly structuralScore: number | null;
  readonly confidenceInManagementScore: number | null;
  readonly source: FlatRow;
}

export type VenueRecord = PlaceRecord | InspectionRecord;

/**
 * Comparable form of a record. Built once per run, never mutated.
 */
export interface NormalizedEntity<T extends VenueRecord = VenueRecord> {
  readonly id: EntityId;
  readonly record: T;
  readonly nameKey: string;
  /** Normalized postcode, empty when the source carries none */
  readonly postcodeKey: string;
  /** Address with whitespace removed and uppercased, empty when absent */
  readonly addressKey: string;
  readonly coordinates: Coordinates | null;
}

// ============================================================================
// ROW ADAPTERS
// ============================================================================

const ADDRESS_LINE_COLUMNS = ['address1', 'address2', 'address3', 'address4'];

function text(row: FlatRow, key: string): string {
  return (row[key] ?? '').trim();
}

function optionalText(row: FlatRow, key: string): string | null {
  return text(row, key) || null;
}

function splitList(raw: string): string[] {
  return raw
    .split(/[;|,]/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Build a place from a directory export row.
 * Expected columns: place_id, name, address, latitude, longitude, rating,
 * num_reviews, food_types, price_level. Any other column (hours, say)
 * survives only in `source`.
 */
export function placeFromRow(row: FlatRow): PlaceRecord {
  return {
    kind: 'place',
    id: text(row, 'place_id'),
    name: text(row, 'name'),
    address: text(row, 'address'),
    coordinates: parseCoordinates(row.latitude, row.longitude),
    rating: parseOptionalNumber(row.rating),
    reviewCount: parseOptionalNumber(row.num_reviews),
    foodTypes: splitList(text(row, 'food_types')),
    priceLevel: optionalText(row, 'price_level'),
    source: row,
  };
}

/**
 * Build an establishment from a registry export row.
 * Expected columns: fhrs_id, business_name, business_type, address1-4,
 * postcode, rating_value, rating_date, local_authority_name, hygiene_score,
 * structural_score, confidence_in_management_score, latitude, longitude
 */
export function inspectionFromRow(row: FlatRow): InspectionRecord {
  return {
    kind: 'inspection',
    id: text(row, 'fhrs_id'),
    businessName: text(row, 'business_name'),
    businessType: optionalText(row, 'business_type'),
    addressLines: ADDRESS_LINE_COLUMNS.map((key) => text(row, key)),
    postcode: text(row, 'postcode'),
    coordinates: parseCoordinates(row.latitude, row.longitude),
    ratingValue: optionalText(row, 'rating_value'),
    ratingDate: optionalText(row, 'rating_date'),
    localAuthorityName: optionalText(row, 'local_authority_name'),
    hygieneScore: parseOptionalNumber(row.hygiene_score),
    structuralScore: parseOptionalNumber(row.structural_score),
    confidenceInManagementScore: parseOptionalNumber(row.confidence_in_management_score),
    source: row,
  };
}

// ============================================================================
// NORMALIZATION
// ============================================================================

/**
 * Display name of either record kind.
 */
export function recordName(record: VenueRecord): string {
  return record.kind === 'place' ? record.name : record.businessName;
}

/**
 * Derive the comparable keys for one record.
 */
export function normalizeRecord<T extends VenueRecord>(record: T): NormalizedEntity<T> {
  if (record.kind === 'place') {
    return {
      id: record.id,
      record,
      nameKey: normalizeName(record.name),
      postcodeKey: '',
      addressKey: compactAddress(record.address),
      coordinates: record.coordinates,
    };
  }

  return {
    id: record.id,
    record,
    nameKey: normalizeName(record.businessName),
    postcodeKey: normalizePostcode(record.postcode),
    addressKey: compactAddress(record.addressLines.filter((line) => line.length > 0).join(' ')),
    coordinates: record.coordinates,
  };
}

/**
 * Normalize a whole collection. The input array is left untouched.
 */
export function normalizeRecords<T extends VenueRecord>(
  records: readonly T[]
): NormalizedEntity<T>[] {
  return records.map((record) => normalizeRecord(record));
}
