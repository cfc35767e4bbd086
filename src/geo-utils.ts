/**
 * Geographic Utility Functions
 *
 * Haversine distance, coordinate parsing and the conservative pruning
 * window used by the matcher before exact distance checks.
 */

// ============================================================================
// TYPES
// ============================================================================

export interface Coordinates {
  readonly lat: number;
  readonly lng: number;
}

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  /** Longitude half-width in degrees; >= 180 means every longitude */
  lngDelta: number;
  centerLng: number;
}

/** Earth's radius in meters */
export const EARTH_RADIUS_METERS = 6371000;

/** Meters covered by one degree of arc on the haversine sphere */
export const METERS_PER_DEGREE = EARTH_RADIUS_METERS * Math.PI / 180;

const toRad = (deg: number): number => deg * Math.PI / 180;
const toDeg = (rad: number): number => rad * 180 / Math.PI;

// ============================================================================
// DISTANCE
// ============================================================================

/**
 * Calculate distance between two GPS coordinates in meters.
 * Uses the Haversine formula for great-circle distance on a sphere.
 *
 * @param lat1 - Latitude of first point (decimal degrees)
 * @param lng1 - Longitude of first point (decimal degrees)
 * @param lat2 - Latitude of second point (decimal degrees)
 * @param lng2 - Longitude of second point (decimal degrees)
 * @returns Distance in meters
 */
export function haversineDistance(
  lat1: number,
  lng1: number,
  lat2: number,
  lng2: number
): number {
  const dLat = toRad(lat2 - lat1);
  const dLng = toRad(lng2 - lng1);

  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) * Math.sin(dLng / 2) ** 2;

  // Rounding can push `a` a hair past 1 for antipodal points
  const c = 2 * Math.asin(Math.sqrt(Math.min(1, a)));

  return EARTH_RADIUS_METERS * c;
}

/**
 * Distance between two optional coordinate pairs, or null when either is missing.
 */
export function distanceBetween(
  a: Coordinates | null,
  b: Coordinates | null
): number | null {
  if (!a || !b) return null;
  return haversineDistance(a.lat, a.lng, b.lat, b.lng);
}

// ============================================================================
// PRUNING WINDOW
// ============================================================================

/**
 * Calculate a bounding window that contains every point within `radiusMeters`
 * of the center.
 *
 * The latitude half-height is the angular radius itself. The longitude
 * half-width is the exact great-circle bound asin(sin(d) / cos(lat)), which is
 * never narrower than the true circle. Both are multiplied by `margin`.
 * Windows that reach a pole cover every longitude.
 *
 * @param lat - Center latitude
 * @param lng - Center longitude
 * @param radiusMeters - Radius in meters
 * @param margin - Widening factor, at least 1
 */
export function getBoundingBox(
  lat: number,
  lng: number,
  radiusMeters: number,
  margin: number = 1
): BoundingBox {
  const angular = radiusMeters / EARTH_RADIUS_METERS;
  const latDelta = toDeg(angular) * margin;

  const minLat = lat - latDelta;
  const maxLat = lat + latDelta;

  let lngDelta = 180;
  const cosLat = Math.cos(toRad(lat));
  if (minLat > -90 && maxLat < 90 && angular < Math.PI / 2) {
    const ratio = Math.sin(angular) / cosLat;
    if (ratio < 1) {
      lngDelta = Math.min(180, toDeg(Math.asin(ratio)) * margin);
    }
  }

  return {
    minLat,
    maxLat,
    lngDelta,
    centerLng: lng,
  };
}

/**
 * Absolute longitude difference in degrees, wrapped across the antimeridian.
 */
export function longitudeDelta(lng1: number, lng2: number): number {
  const diff = Math.abs(lng1 - lng2) % 360;
  return diff > 180 ? 360 - diff : diff;
}

/**
 * Check whether a point falls inside a pruning window.
 */
export function isInsideBoundingBox(box: BoundingBox, point: Coordinates): boolean {
  if (point.lat < box.minLat || point.lat > box.maxLat) return false;
  if (box.lngDelta >= 180) return true;
  return longitudeDelta(point.lng, box.centerLng) <= box.lngDelta;
}

// ============================================================================
// VALIDATION & PARSING
// ============================================================================

/**
 * Validate GPS coordinates.
 *
 * @param lat - Latitude
 * @param lng - Longitude
 * @returns True if valid
 */
export function isValidCoordinate(lat: number, lng: number): boolean {
  return (
    Number.isFinite(lat) &&
    Number.isFinite(lng) &&
    lat >= -90 &&
    lat <= 90 &&
    lng >= -180 &&
    lng <= 180
  );
}

/** Plain decimal notation; exponents and hex are rejected */
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parse a decimal number from a raw field.
 * Empty, blank or unparseable values come back as null, never as 0 or NaN.
 */
export function parseOptionalNumber(raw: string | number | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;

  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Build a coordinate pair from raw latitude/longitude fields.
 * Returns null unless both parse and lie within the valid range.
 */
export function parseCoordinates(
  rawLat: string | number | null | undefined,
  rawLng: string | number | null | undefined
): Coordinates | null {
  const lat = parseOptionalNumber(rawLat);
  const lng = parseOptionalNumber(rawLng);

  if (lat === null || lng === null) return null;
  if (!isValidCoordinate(lat, lng)) return null;

  return { lat, lng };
}
