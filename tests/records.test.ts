import { describe, it, expect } from 'vitest';
import {
  inspectionFromRow,
  normalizeRecord,
  normalizeRecords,
  placeFromRow,
  recordName,
} from '../src/records.js';
import { CROWN_CANDIDATE, CROWN_PROBE } from './helpers.js';

describe('placeFromRow', () => {
  it('reads a directory export row', () => {
    const row = {
      place_id: 'p1',
      name: 'The Crown & Anchor',
      address: '1 SW1A 1AA',
      latitude: '51.5007',
      longitude: '-0.1246',
      rating: '4.5',
      num_reviews: '120',
      food_types: 'pub; british',
      price_level: 'PRICE_LEVEL_MODERATE',
      hours: 'Monday: 11:00 AM – 11:00 PM',
    };
    const place = placeFromRow(row);

    expect(place).toEqual({
      kind: 'place',
      id: 'p1',
      name: 'The Crown & Anchor',
      address: '1 SW1A 1AA',
      coordinates: { lat: 51.5007, lng: -0.1246 },
      rating: 4.5,
      reviewCount: 120,
      foodTypes: ['pub', 'british'],
      priceLevel: 'PRICE_LEVEL_MODERATE',
      source: row,
    });
    expect(place.source).toBe(row);
  });

  it('turns missing and malformed fields into null', () => {
    const place = placeFromRow({ place_id: 'p2', name: 'Red Lion', latitude: 'n/a', longitude: '-0.1', rating: '' });

    expect(place.coordinates).toBeNull();
    expect(place.rating).toBeNull();
    expect(place.reviewCount).toBeNull();
    expect(place.priceLevel).toBeNull();
    expect(place.address).toBe('');
    expect(place.foodTypes).toEqual([]);
  });
});

describe('inspectionFromRow', () => {
  it('reads a registry export row, keeping address lines by position', () => {
    const inspection = inspectionFromRow({
      fhrs_id: '1001',
      business_name: 'THE CROWN AND ANCHOR',
      business_type: 'Pub/bar/nightclub',
      address1: '1 Test Street',
      address2: '',
      address3: 'London',
      address4: '',
      postcode: 'SW1A 1AA',
      rating_value: '5',
      rating_date: '2024-03-01',
      local_authority_name: 'Westminster',
      hygiene_score: '0',
      structural_score: '5',
      confidence_in_management_score: '',
      latitude: '51.5008',
      longitude: '-0.1247',
    });

    expect(inspection.id).toBe('1001');
    expect(inspection.addressLines).toEqual(['1 Test Street', '', 'London', '']);
    expect(inspection.hygieneScore).toBe(0);
    expect(inspection.structuralScore).toBe(5);
    expect(inspection.confidenceInManagementScore).toBeNull();
    expect(inspection.ratingValue).toBe('5');
    expect(inspection.coordinates).toEqual({ lat: 51.5008, lng: -0.1247 });
  });

  it('keeps out-of-range coordinates out', () => {
    const inspection = inspectionFromRow({ fhrs_id: '1', latitude: '191', longitude: '0' });
    expect(inspection.coordinates).toBeNull();
  });
});

describe('recordName', () => {
  it('returns the display name of either kind', () => {
    expect(recordName(CROWN_PROBE)).toBe('The Crown & Anchor LTD');
    expect(recordName(CROWN_CANDIDATE)).toBe('THE CROWN AND ANCHOR');
  });
});

describe('normalizeRecord', () => {
  it('derives keys for a place', () => {
    const entity = normalizeRecord(CROWN_PROBE);

    expect(entity.id).toBe('g1');
    expect(entity.record).toBe(CROWN_PROBE);
    expect(entity.nameKey).toBe('THE CROWN AND ANCHOR');
    expect(entity.postcodeKey).toBe('');
    expect(entity.addressKey).toBe('1SW1A1AA');
    expect(entity.coordinates).toEqual({ lat: 51.5007, lng: -0.1246 });
  });

  it('derives keys for an inspection, joining its address lines', () => {
    const entity = normalizeRecord(CROWN_CANDIDATE);

    expect(entity.nameKey).toBe('THE CROWN AND ANCHOR');
    expect(entity.postcodeKey).toBe('SW1A1AA');
    expect(entity.addressKey).toBe('1TESTSTREETLONDON');
  });

  it('skips empty address slots when compacting', () => {
    const entity = normalizeRecord(inspectionFromRow({ address1: '1 Test Street', address3: 'London' }));
    expect(entity.addressKey).toBe('1TESTSTREETLONDON');
  });
});

describe('normalizeRecords', () => {
  it('keeps order and leaves the input untouched', () => {
    const records = Object.freeze([CROWN_PROBE, CROWN_CANDIDATE]);
    const entities = normalizeRecords(records);

    expect(entities.map((entity) => entity.id)).toEqual(['g1', 'f1']);
    expect(records).toEqual([CROWN_PROBE, CROWN_CANDIDATE]);
  });
});
