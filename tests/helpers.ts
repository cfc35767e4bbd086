/**
 * Shared test builders.
 */

import type { InspectionRecord, PlaceRecord } from '../src/records.js';

export function makePlace(overrides: Partial<Omit<PlaceRecord, 'kind'>> = {}): PlaceRecord {
  return {
    kind: 'place',
    id: 'p1',
    name: '',
    address: '',
    coordinates: null,
    rating: null,
    reviewCount: null,
    foodTypes: [],
    priceLevel: null,
    source: {},
    ...overrides,
  };
}

export function makeInspection(
  overrides: Partial<Omit<InspectionRecord, 'kind'>> = {}
): InspectionRecord {
  return {
    kind: 'inspection',
    id: 'i1',
    businessName: '',
    businessType: null,
    addressLines: [],
    postcode: '',
    coordinates: null,
    ratingValue: null,
    ratingDate: null,
    localAuthorityName: null,
    hygieneScore: null,
    structuralScore: null,
    confidenceInManagementScore: null,
    source: {},
    ...overrides,
  };
}

/**
 * Deterministic PRNG (mulberry32) so randomized tests are repeatable.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Point reached by travelling `meters` from a start on an initial bearing.
 */
export function destinationPoint(
  lat: number,
  lng: number,
  meters: number,
  bearingDegrees: number
): { lat: number; lng: number } {
  const toRad = (deg: number): number => (deg * Math.PI) / 180;
  const toDeg = (rad: number): number => (rad * 180) / Math.PI;

  const angular = meters / 6371000;
  const bearing = toRad(bearingDegrees);
  const lat1 = toRad(lat);
  const lng1 = toRad(lng);

  const lat2 = Math.asin(
    Math.sin(lat1) * Math.cos(angular) + Math.cos(lat1) * Math.sin(angular) * Math.cos(bearing)
  );
  const lng2 =
    lng1 +
    Math.atan2(
      Math.sin(bearing) * Math.sin(angular) * Math.cos(lat1),
      Math.cos(angular) - Math.sin(lat1) * Math.sin(lat2)
    );

  const wrapped = ((toDeg(lng2) + 540) % 360) - 180;
  return { lat: toDeg(lat2), lng: wrapped };
}

/** London test venues */
export const CROWN_PROBE = makePlace({
  id: 'g1',
  name: 'The Crown & Anchor LTD',
  address: '1 SW1A 1AA',
  coordinates: { lat: 51.5007, lng: -0.1246 },
});

export const CROWN_CANDIDATE = makeInspection({
  id: 'f1',
  businessName: 'THE CROWN AND ANCHOR',
  addressLines: ['1 Test Street', 'London'],
  postcode: 'SW1A1AA',
  coordinates: { lat: 51.5008, lng: -0.1247 },
});

/** Roughly 3 km north of the Crown & Anchor probe */
export const RED_LION_CANDIDATE = makeInspection({
  id: 'f2',
  businessName: 'Red Lion',
  addressLines: ['3 Sample Lane'],
  postcode: 'N1 9AA',
  coordinates: { lat: 51.5277, lng: -0.1246 },
});
