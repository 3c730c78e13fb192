/**
 * Region quadtree over the ground plane.
 *
 * Leaves hold up to `leafCapacity` features and split into four quadrants
 * once exceeded, unless already at `maxDepth`. Inside a node a point goes
 * west when x < midX (else east) and north when z < midZ (else south), so
 * each child owns [min, mid) or [mid, max] along each axis and every point
 * lands in exactly one leaf.
 */

import { MAP_X_MAX, MAP_X_MIN, MAP_Z_MAX, MAP_Z_MIN, QUADTREE_LEAF_CAPACITY, QUADTREE_MAX_DEPTH } from '../config';
import { ConfigurationError, IndexNotBuiltError } from '../core/errors';
import { createLogger } from '../core/logger';
import type { PlanarPoint } from '../types';
import { BoundingBox } from './boundingBox';
import { isFinitePoint, type SpatialIndex } from './spatialIndex';

const log = createLogger('Quadtree');

export const DEFAULT_MAP_BOUNDS = new BoundingBox(MAP_X_MIN, MAP_X_MAX, MAP_Z_MIN, MAP_Z_MAX);

export interface QuadtreeOptions {
  bounds?: BoundingBox;
  leafCapacity?: number;
  maxDepth?: number;
  /** Drop features with non-finite coordinates at insertion instead of indexing them. */
  rejectNonFinite?: boolean;
}

export interface QuadtreeStats {
  nodes: number;
  leaves: number;
  items: number;
  outOfBounds: number;
  rejected: number;
  maxDepth: number;
  avgPerLeaf: number;
  buildTimeMs: number;
  queryCount: number;
}

/** NW, NE, SW, SE. */
export type QuadChildren<T extends PlanarPoint> = readonly [
  QuadtreeNode<T>,
  QuadtreeNode<T>,
  QuadtreeNode<T>,
  QuadtreeNode<T>,
];

function childFor<T extends PlanarPoint>(node: QuadtreeNode<T>, kids: QuadChildren<T>, item: T): QuadtreeNode<T> {
  const west = item.x < node.bounds.centerX;
  const north = item.z < node.bounds.centerZ;
  if (north) return west ? kids[0] : kids[1];
  return west ? kids[2] : kids[3];
}

export class QuadtreeNode<T extends PlanarPoint> {
  readonly bounds: BoundingBox;
  readonly depth: number;
  private items: T[] = [];
  private kids: QuadChildren<T> | null = null;
  private readonly capacity: number;
  private readonly maxDepth: number;

  constructor(bounds: BoundingBox, depth: number, capacity: number, maxDepth: number) {
    this.bounds = bounds;
    this.depth = depth;
    this.capacity = capacity;
    this.maxDepth = maxDepth;
  }

  get isLeaf(): boolean {
    return this.kids === null;
  }

  get children(): QuadChildren<T> | null {
    return this.kids;
  }

  /** Features held directly by this node; always empty for internal nodes. */
  get features(): readonly T[] {
    return this.items;
  }

  insert(item: T): void {
    if (this.kids) {
      childFor(this, this.kids, item).insert(item);
      return;
    }
    this.items.push(item);
    if (this.items.length > this.capacity && this.depth < this.maxDepth) {
      this.split();
    }
  }

  private split(): void {
    const { xMin, xMax, zMin, zMax, centerX: cx, centerZ: cz } = this.bounds;
    const depth = this.depth + 1;
    const kids: QuadChildren<T> = [
      new QuadtreeNode<T>(new BoundingBox(xMin, cx, zMin, cz), depth, this.capacity, this.maxDepth),
      new QuadtreeNode<T>(new BoundingBox(cx, xMax, zMin, cz), depth, this.capacity, this.maxDepth),
      new QuadtreeNode<T>(new BoundingBox(xMin, cx, cz, zMax), depth, this.capacity, this.maxDepth),
      new QuadtreeNode<T>(new BoundingBox(cx, xMax, cz, zMax), depth, this.capacity, this.maxDepth),
    ];
    const items = this.items;
    this.items = [];
    this.kids = kids;
    for (const item of items) {
      childFor(this, kids, item).insert(item);
    }
  }

  collect(box: BoundingBox, out: T[]): void {
    if (!this.bounds.intersects(box)) return;
    if (this.kids) {
      for (const kid of this.kids) kid.collect(box, out);
      return;
    }
    for (const item of this.items) {
      if (box.containsPoint(item)) out.push(item);
    }
  }

  countIn(box: BoundingBox): number {
    if (!this.bounds.intersects(box)) return 0;
    if (this.kids) {
      let total = 0;
      for (const kid of this.kids) total += kid.countIn(box);
      return total;
    }
    let total = 0;
    for (const item of this.items) {
      if (box.containsPoint(item)) total++;
    }
    return total;
  }

  collectRadius(x: number, z: number, radius: number, out: T[]): void {
    if (!this.bounds.intersectsCircle(x, z, radius)) return;
    if (this.kids) {
      for (const kid of this.kids) kid.collectRadius(x, z, radius, out);
      return;
    }
    const r2 = radius * radius;
    for (const item of this.items) {
      const dx = item.x - x;
      const dz = item.z - z;
      if (dx * dx + dz * dz <= r2) out.push(item);
    }
  }

  /** Depth-first visit of this node and every descendant. */
  visit(fn: (node: QuadtreeNode<T>) => void): void {
    fn(this);
    if (this.kids) {
      for (const kid of this.kids) kid.visit(fn);
    }
  }
}

export class Quadtree<T extends PlanarPoint> implements SpatialIndex<T> {
  readonly kind = 'quadtree' as const;
  readonly leafCapacity: number;
  readonly maxDepth: number;
  private readonly configuredBounds: BoundingBox;
  private readonly rejectNonFinite: boolean;
  private root: QuadtreeNode<T> | null = null;
  private outliers: T[] = [];
  private itemCount = 0;
  private rejected = 0;
  private revision: number | null = null;
  private buildTimeMs = 0;
  private queryCount = 0;

  constructor(options: QuadtreeOptions = {}) {
    const leafCapacity = options.leafCapacity ?? QUADTREE_LEAF_CAPACITY;
    const maxDepth = options.maxDepth ?? QUADTREE_MAX_DEPTH;
    if (!Number.isInteger(leafCapacity) || leafCapacity <= 0) {
      throw new ConfigurationError('leafCapacity', `must be a positive integer, got ${leafCapacity}`);
    }
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new ConfigurationError('maxDepth', `must be a non-negative integer, got ${maxDepth}`);
    }
    this.leafCapacity = leafCapacity;
    this.maxDepth = maxDepth;
    this.configuredBounds = options.bounds ?? DEFAULT_MAP_BOUNDS;
    this.rejectNonFinite = options.rejectNonFinite ?? false;
  }

  get isBuilt(): boolean {
    return this.root !== null;
  }

  get size(): number {
    return this.itemCount;
  }

  get sourceRevision(): number | null {
    return this.revision;
  }

  /** Root box: the configured bounds grown to cover the last build's features. */
  get bounds(): BoundingBox {
    return this.root?.bounds ?? this.configuredBounds;
  }

  get rootNode(): QuadtreeNode<T> | null {
    return this.root;
  }

  /**
   * Replace the whole tree. The new tree is assembled off to the side and
   * swapped in only once complete.
   */
  build(features: readonly T[], sourceRevision?: number): void {
    const start = performance.now();
    const extent = BoundingBox.enclosing(features);
    const bounds = extent ? this.configuredBounds.union(extent) : this.configuredBounds;
    const root = new QuadtreeNode<T>(bounds, 0, this.leafCapacity, this.maxDepth);
    const outliers: T[] = [];
    let count = 0;
    let rejected = 0;

    for (const feature of features) {
      if (this.rejectNonFinite && !isFinitePoint(feature)) {
        rejected++;
        continue;
      }
      if (bounds.containsPoint(feature)) root.insert(feature);
      else outliers.push(feature);
      count++;
    }

    this.root = root;
    this.outliers = outliers;
    this.itemCount = count;
    this.rejected = rejected;
    this.revision = sourceRevision ?? null;
    this.buildTimeMs = performance.now() - start;

    if (rejected > 0) {
      log.warn('dropped features with non-finite coordinates', { rejected });
    }
    log.debug('built', { items: count, buildTimeMs: this.buildTimeMs });
  }

  insert(feature: T, sourceRevision?: number): void {
    if (this.rejectNonFinite && !isFinitePoint(feature)) {
      this.rejected++;
      log.warn('dropped feature with non-finite coordinates', { x: feature.x, z: feature.z });
      return;
    }
    const root = this.root ?? new QuadtreeNode<T>(this.configuredBounds, 0, this.leafCapacity, this.maxDepth);
    this.root = root;
    if (root.bounds.containsPoint(feature)) {
      root.insert(feature);
    } else {
      this.outliers.push(feature);
      log.debug('feature outside root bounds', { x: feature.x, z: feature.z });
    }
    this.itemCount++;
    if (sourceRevision !== undefined) this.revision = sourceRevision;
  }

  query(box: BoundingBox): T[] {
    const root = this.requireRoot();
    this.queryCount++;
    const out: T[] = [];
    root.collect(box, out);
    for (const item of this.outliers) {
      if (box.containsPoint(item)) out.push(item);
    }
    return out;
  }

  count(box: BoundingBox): number {
    const root = this.requireRoot();
    let total = root.countIn(box);
    for (const item of this.outliers) {
      if (box.containsPoint(item)) total++;
    }
    return total;
  }

  queryRadius(x: number, z: number, radius: number): T[] {
    const root = this.requireRoot();
    this.queryCount++;
    if (!(radius >= 0)) return [];
    const out: T[] = [];
    root.collectRadius(x, z, radius, out);
    const r2 = radius * radius;
    for (const item of this.outliers) {
      const dx = item.x - x;
      const dz = item.z - z;
      if (dx * dx + dz * dz <= r2) out.push(item);
    }
    return out;
  }

  getStats(): QuadtreeStats {
    let nodes = 0;
    let leaves = 0;
    let maxDepth = 0;
    this.root?.visit((node) => {
      nodes++;
      if (node.isLeaf) leaves++;
      if (node.depth > maxDepth) maxDepth = node.depth;
    });
    return {
      nodes,
      leaves,
      items: this.itemCount,
      outOfBounds: this.outliers.length,
      rejected: this.rejected,
      maxDepth,
      avgPerLeaf: leaves > 0 ? (this.itemCount - this.outliers.length) / leaves : 0,
      buildTimeMs: this.buildTimeMs,
      queryCount: this.queryCount,
    };
  }

  private requireRoot(): QuadtreeNode<T> {
    if (!this.root) throw new IndexNotBuiltError('Quadtree');
    return this.root;
  }
}

/** Build a quadtree over `features` with the default map bounds. */
export function buildSpatialIndex<T extends PlanarPoint>(
  features: readonly T[],
  options: QuadtreeOptions = {},
  sourceRevision?: number,
): Quadtree<T> {
  const tree = new Quadtree<T>(options);
  tree.build(features, sourceRevision);
  return tree;
}
