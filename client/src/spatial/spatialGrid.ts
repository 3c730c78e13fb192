/**
 * Uniform cell grid. Cheaper to build than the quadtree and just as fast
 * for evenly spread data; degrades when features cluster.
 */

import { GRID_CELL_SIZE } from '../config';
import { ConfigurationError, IndexNotBuiltError } from '../core/errors';
import { createLogger } from '../core/logger';
import { cellKey } from '../core/math';
import type { PlanarPoint } from '../types';
import { BoundingBox } from './boundingBox';
import { DEFAULT_MAP_BOUNDS } from './quadtree';
import { isFinitePoint, type SpatialIndex } from './spatialIndex';

const log = createLogger('SpatialGrid');

export interface SpatialGridOptions {
  cellSize?: number;
  /** Cell (0, 0) starts at this box's minimum corner. */
  bounds?: BoundingBox;
}

export interface SpatialGridStats {
  cells: number;
  items: number;
  unindexed: number;
  maxPerCell: number;
  avgPerCell: number;
}

interface CellRange {
  gx0: number;
  gx1: number;
  gz0: number;
  gz1: number;
}

export class SpatialGrid<T extends PlanarPoint> implements SpatialIndex<T> {
  readonly kind = 'grid' as const;
  readonly cellSize: number;
  private readonly origin: BoundingBox;
  private cells: Map<string, T[]> | null = null;
  /** Occupied cell range; queries never scan beyond it. */
  private occupied: CellRange | null = null;
  /** Non-finite points: counted, never returned by a query. */
  private unindexed = 0;
  private itemCount = 0;
  private revision: number | null = null;

  constructor(options: SpatialGridOptions = {}) {
    const cellSize = options.cellSize ?? GRID_CELL_SIZE;
    if (!Number.isFinite(cellSize) || cellSize <= 0) {
      throw new ConfigurationError('cellSize', `must be a positive number, got ${cellSize}`);
    }
    this.cellSize = cellSize;
    this.origin = options.bounds ?? DEFAULT_MAP_BOUNDS;
  }

  get isBuilt(): boolean {
    return this.cells !== null;
  }

  get size(): number {
    return this.itemCount;
  }

  get sourceRevision(): number | null {
    return this.revision;
  }

  cellOf(x: number, z: number): [number, number] {
    return [
      Math.floor((x - this.origin.xMin) / this.cellSize),
      Math.floor((z - this.origin.zMin) / this.cellSize),
    ];
  }

  build(features: readonly T[], sourceRevision?: number): void {
    const cells = new Map<string, T[]>();
    let occupied: CellRange | null = null;
    let unindexed = 0;
    for (const feature of features) {
      if (!isFinitePoint(feature)) {
        unindexed++;
        continue;
      }
      occupied = this.place(cells, occupied, feature);
    }
    this.cells = cells;
    this.occupied = occupied;
    this.unindexed = unindexed;
    this.itemCount = features.length;
    this.revision = sourceRevision ?? null;
    log.debug('built', { items: features.length, cells: cells.size });
  }

  insert(feature: T, sourceRevision?: number): void {
    const cells = this.cells ?? new Map<string, T[]>();
    this.cells = cells;
    if (isFinitePoint(feature)) {
      this.occupied = this.place(cells, this.occupied, feature);
    } else {
      this.unindexed++;
    }
    this.itemCount++;
    if (sourceRevision !== undefined) this.revision = sourceRevision;
  }

  query(box: BoundingBox): T[] {
    const out: T[] = [];
    this.scan(box, (item) => {
      if (box.containsPoint(item)) out.push(item);
    });
    return out;
  }

  count(box: BoundingBox): number {
    let total = 0;
    this.scan(box, (item) => {
      if (box.containsPoint(item)) total++;
    });
    return total;
  }

  queryRadius(x: number, z: number, radius: number): T[] {
    if (!this.cells) throw new IndexNotBuiltError('SpatialGrid');
    if (!(radius >= 0)) return [];
    const out: T[] = [];
    const r2 = radius * radius;
    this.scan(BoundingBox.around(x, z, radius), (item) => {
      const dx = item.x - x;
      const dz = item.z - z;
      if (dx * dx + dz * dz <= r2) out.push(item);
    });
    return out;
  }

  getStats(): SpatialGridStats {
    let maxPerCell = 0;
    let indexed = 0;
    for (const bucket of this.cells?.values() ?? []) {
      indexed += bucket.length;
      if (bucket.length > maxPerCell) maxPerCell = bucket.length;
    }
    const cells = this.cells?.size ?? 0;
    return {
      cells,
      items: this.itemCount,
      unindexed: this.unindexed,
      maxPerCell,
      avgPerCell: cells > 0 ? indexed / cells : 0,
    };
  }

  private place(cells: Map<string, T[]>, occupied: CellRange | null, feature: T): CellRange {
    const [gx, gz] = this.cellOf(feature.x, feature.z);
    const key = cellKey(gx, gz);
    const bucket = cells.get(key);
    if (bucket) bucket.push(feature);
    else cells.set(key, [feature]);
    if (!occupied) return { gx0: gx, gx1: gx, gz0: gz, gz1: gz };
    return {
      gx0: Math.min(occupied.gx0, gx),
      gx1: Math.max(occupied.gx1, gx),
      gz0: Math.min(occupied.gz0, gz),
      gz1: Math.max(occupied.gz1, gz),
    };
  }

  private scan(box: BoundingBox, fn: (item: T) => void): void {
    const cells = this.cells;
    if (!cells) throw new IndexNotBuiltError('SpatialGrid');
    const occupied = this.occupied;
    if (!occupied) return;
    const [qx0, qz0] = this.cellOf(box.xMin, box.zMin);
    const [qx1, qz1] = this.cellOf(box.xMax, box.zMax);
    const gx0 = Math.max(qx0, occupied.gx0);
    const gx1 = Math.min(qx1, occupied.gx1);
    const gz0 = Math.max(qz0, occupied.gz0);
    const gz1 = Math.min(qz1, occupied.gz1);
    for (let gx = gx0; gx <= gx1; gx++) {
      for (let gz = gz0; gz <= gz1; gz++) {
        const bucket = cells.get(cellKey(gx, gz));
        if (!bucket) continue;
        for (const item of bucket) fn(item);
      }
    }
  }
}
