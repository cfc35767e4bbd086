import { describe, it, expect } from 'vitest';
import { haversineDistance, type Coordinates } from '../src/geo-utils.js';
import { SpatialIndex } from '../src/spatial-index.js';
import { seededRandom } from './helpers.js';

interface Item {
  id: string;
  coordinates: Coordinates | null;
}

const OPTIONS = { radiusMeters: 500, margin: 1.1 };

describe('SpatialIndex', () => {
  it('returns nearby items in input order', () => {
    const items: Item[] = [
      { id: 'east', coordinates: { lat: 51.5, lng: -0.099 } },
      { id: 'far', coordinates: { lat: 52.5, lng: -0.1 } },
      { id: 'west', coordinates: { lat: 51.5, lng: -0.101 } },
      { id: 'centre', coordinates: { lat: 51.5, lng: -0.1 } },
    ];
    const index = new SpatialIndex(items, OPTIONS);

    expect(index.query({ lat: 51.5, lng: -0.1 }).map((item) => item.id)).toEqual([
      'east',
      'west',
      'centre',
    ]);
  });

  it('never returns items without coordinates from a query', () => {
    const items: Item[] = [
      { id: 'unknown', coordinates: null },
      { id: 'here', coordinates: { lat: 51.5, lng: -0.1 } },
    ];
    const index = new SpatialIndex(items, OPTIONS);

    expect(index.query({ lat: 51.5, lng: -0.1 }).map((item) => item.id)).toEqual(['here']);
    expect(index.all()).toBe(items);
    expect(index.size).toBe(2);
  });

  it('finds neighbours across the antimeridian', () => {
    const items: Item[] = [{ id: 'date-line', coordinates: { lat: 0, lng: 179.9995 } }];
    const index = new SpatialIndex(items, OPTIONS);

    expect(index.query({ lat: 0, lng: -179.9995 })).toHaveLength(1);
  });

  it('finds neighbours near a pole on any longitude', () => {
    const items: Item[] = [{ id: 'polar', coordinates: { lat: 89.999, lng: 100 } }];
    const index = new SpatialIndex(items, OPTIONS);

    expect(index.query({ lat: 89.999, lng: 0 })).toHaveLength(1);
  });

  it('keeps every item within the radius (randomized)', () => {
    const random = seededRandom(7);
    const items: Item[] = Array.from({ length: 400 }, (_, i) => ({
      id: `item-${i}`,
      coordinates: { lat: 51.45 + random() * 0.1, lng: -0.2 + random() * 0.2 },
    }));
    const index = new SpatialIndex(items, OPTIONS);

    for (let q = 0; q < 100; q++) {
      const center = { lat: 51.45 + random() * 0.1, lng: -0.2 + random() * 0.2 };
      const found = new Set(index.query(center).map((item) => item.id));

      for (const item of items) {
        if (!item.coordinates) continue;
        const meters = haversineDistance(center.lat, center.lng, item.coordinates.lat, item.coordinates.lng);
        if (meters <= OPTIONS.radiusMeters) {
          expect(found.has(item.id)).toBe(true);
        }
      }
    }
  });

  it('exposes the pruning window', () => {
    const index = new SpatialIndex<Item>([], OPTIONS);
    const box = index.windowAround({ lat: 51.5, lng: -0.1 });

    expect(box.centerLng).toBe(-0.1);
    expect(box.minLat).toBeLessThan(51.5);
    expect(box.maxLat).toBeGreaterThan(51.5);
  });
});
