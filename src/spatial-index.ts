/**
 * Spatial Index
 *
 * Fixed-size grid over candidate coordinates, built once per run and only read
 * afterwards. Queries return every candidate inside the pruning window around
 * a probe, in the candidates' original order, so the best-of selection sees
 * the same iteration order as a linear scan would.
 */

import {
  getBoundingBox,
  isInsideBoundingBox,
  type BoundingBox,
  type Coordinates,
  METERS_PER_DEGREE,
} from './geo-utils.js';

export interface SpatialIndexOptions {
  /** Query radius in meters (the matcher's hard cutoff) */
  radiusMeters: number;

  /** Window widening factor, at least 1 */
  margin: number;
}

interface Located {
  coordinates: Coordinates | null;
}

const GRID_COLUMNS_FLOOR = 1;

export class SpatialIndex<T extends Located> {
  private readonly items: readonly T[];
  private readonly cells = new Map<string, number[]>();
  private readonly cellDegrees: number;
  private readonly columns: number;
  private readonly radiusMeters: number;
  private readonly margin: number;

  constructor(items: readonly T[], options: SpatialIndexOptions) {
    this.items = items;
    this.radiusMeters = options.radiusMeters;
    this.margin = options.margin;

    // Roughly one cell per window height; the column count must divide 360
    // exactly so that wrapped columns line up across the antimeridian
    const windowDegrees = (options.radiusMeters * options.margin) / METERS_PER_DEGREE;
    this.columns = Math.max(Math.ceil(360 / Math.max(windowDegrees, 1e-6)), GRID_COLUMNS_FLOOR);
    this.cellDegrees = 360 / this.columns;

    items.forEach((item, index) => {
      if (!item.coordinates) return;
      const key = this.cellKey(this.row(item.coordinates.lat), this.column(item.coordinates.lng));
      const bucket = this.cells.get(key);
      if (bucket) {
        bucket.push(index);
      } else {
        this.cells.set(key, [index]);
      }
    });
  }

  /** Number of indexed items (with or without coordinates) */
  get size(): number {
    return this.items.length;
  }

  /** Every item, in input order */
  all(): readonly T[] {
    return this.items;
  }

  /**
   * Pruning window used for a probe at `center`.
   */
  windowAround(center: Coordinates): BoundingBox {
    return getBoundingBox(center.lat, center.lng, this.radiusMeters, this.margin);
  }

  /**
   * Items with coordinates inside the window around `center`, in input order.
   * Items without coordinates are never returned.
   */
  query(center: Coordinates): T[] {
    const box = this.windowAround(center);
    const indices: number[] = [];

    // One extra cell on each side absorbs rounding at cell edges
    const firstRow = this.row(box.minLat) - 1;
    const lastRow = this.row(box.maxLat) + 1;

    for (const column of this.columnsFor(box)) {
      for (let row = firstRow; row <= lastRow; row++) {
        const bucket = this.cells.get(this.cellKey(row, column));
        if (!bucket) continue;
        for (const index of bucket) {
          const coordinates = this.items[index].coordinates;
          if (coordinates && isInsideBoundingBox(box, coordinates)) {
            indices.push(index);
          }
        }
      }
    }

    return indices.sort((a, b) => a - b).map((index) => this.items[index]);
  }

  private columnsFor(box: BoundingBox): Iterable<number> {
    const spanColumns = Math.ceil((2 * box.lngDelta) / this.cellDegrees) + 3;
    if (box.lngDelta >= 180 || spanColumns >= this.columns) {
      return Array.from({ length: this.columns }, (_, i) => i);
    }

    const first = Math.floor((box.centerLng - box.lngDelta + 180) / this.cellDegrees) - 1;
    const last = Math.floor((box.centerLng + box.lngDelta + 180) / this.cellDegrees) + 1;

    const columns = new Set<number>();
    for (let raw = first; raw <= last; raw++) {
      columns.add(((raw % this.columns) + this.columns) % this.columns);
    }
    return columns;
  }

  private row(lat: number): number {
    return Math.floor((lat + 90) / this.cellDegrees);
  }

  private column(lng: number): number {
    const raw = Math.floor((lng + 180) / this.cellDegrees);
    return ((raw % this.columns) + this.columns) % this.columns;
  }

  private cellKey(row: number, column: number): string {
    return `${row}:${column}`;
  }
}
