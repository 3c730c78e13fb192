import type { PlanarPoint } from '../types';
import type { BoundingBox } from './boundingBox';

export type SpatialIndexKind = 'quadtree' | 'grid';

/**
 * Window queries over ground-plane points. Implementations are rebuilt
 * wholesale; `sourceRevision` records which revision of the owning feature
 * set the last build saw, so callers can detect a stale index.
 */
export interface SpatialIndex<T extends PlanarPoint> {
  readonly kind: SpatialIndexKind;
  readonly isBuilt: boolean;
  readonly size: number;
  readonly sourceRevision: number | null;
  build(features: readonly T[], sourceRevision?: number): void;
  insert(feature: T, sourceRevision?: number): void;
  query(box: BoundingBox): T[];
  count(box: BoundingBox): number;
  /** Points within `radius` of (x, z); a negative or NaN radius matches nothing. */
  queryRadius(x: number, z: number, radius: number): T[];
}

export function isFinitePoint(point: PlanarPoint): boolean {
  return Number.isFinite(point.x) && Number.isFinite(point.z);
}
