import { describe, expect, it } from 'vitest';

import { ConfigurationError, IndexNotBuiltError } from '../core/errors';
import { BoundingBox } from '../spatial/boundingBox';
import { Quadtree } from '../spatial/quadtree';
import { SpatialGrid } from '../spatial/spatialGrid';
import { ids, mulberry32, uniformPoints, type TestPoint } from './fixtures';

const UNIT_BOUNDS = new BoundingBox(0, 10, 0, 10);

describe('SpatialGrid', () => {
  it('maps coordinates to cells from the bounds origin', () => {
    const grid = new SpatialGrid<TestPoint>({ bounds: UNIT_BOUNDS, cellSize: 1 });
    expect(grid.cellOf(2.5, 3.5)).toEqual([2, 3]);
    expect(grid.cellOf(-0.5, 0)).toEqual([-1, 0]);
  });

  it('matches a brute-force scan', () => {
    const points = uniformPoints(2000, 11);
    const grid = new SpatialGrid<TestPoint>();
    grid.build(points);
    const rand = mulberry32(5);
    for (let i = 0; i < 30; i++) {
      const x0 = -2 + rand() * 4;
      const z0 = -2.2 + rand() * 4.4;
      const box = new BoundingBox(x0, x0 + rand(), z0, z0 + rand());
      expect(ids(grid.query(box))).toEqual(ids(points.filter((p) => box.containsPoint(p))));
    }
  });

  it('agrees with the quadtree on every query', () => {
    const points = uniformPoints(3000, 21);
    const grid = new SpatialGrid<TestPoint>();
    const tree = new Quadtree<TestPoint>();
    grid.build(points);
    tree.build(points);
    const rand = mulberry32(9);
    for (let i = 0; i < 30; i++) {
      const x0 = -1.8 + rand() * 3.6;
      const z0 = -2.1 + rand() * 4.2;
      const box = new BoundingBox(x0, x0 + rand() * 0.8, z0, z0 + rand() * 0.8);
      expect(ids(grid.query(box))).toEqual(ids(tree.query(box)));
    }
  });

  it('finds features outside its bounds', () => {
    const grid = new SpatialGrid<TestPoint>({ bounds: UNIT_BOUNDS, cellSize: 1 });
    grid.build([
      { id: 0, x: -3, z: -3 },
      { id: 1, x: 5, z: 5 },
    ]);
    expect(grid.query(new BoundingBox(-4, -2, -4, -2)).map((p) => p.id)).toEqual([0]);
    expect(grid.count(new BoundingBox(-10, 20, -10, 20))).toBe(2);
  });

  it('returns nothing from an empty build and throws before one', () => {
    const grid = new SpatialGrid<TestPoint>();
    expect(() => grid.query(UNIT_BOUNDS)).toThrow(IndexNotBuiltError);
    grid.build([]);
    expect(grid.query(UNIT_BOUNDS)).toEqual([]);
    expect(grid.queryRadius(0, 0, 5)).toEqual([]);
  });

  it('counts non-finite points without indexing them', () => {
    const grid = new SpatialGrid<TestPoint>({ bounds: UNIT_BOUNDS, cellSize: 1 });
    grid.build([
      { id: 0, x: 1, z: 1 },
      { id: 1, x: Number.POSITIVE_INFINITY, z: 1 },
    ]);
    expect(grid.size).toBe(2);
    expect(grid.getStats().unindexed).toBe(1);
    expect(grid.query(new BoundingBox(0, 10, 0, 10)).map((p) => p.id)).toEqual([0]);
  });

  it('reports cell occupancy', () => {
    const grid = new SpatialGrid<TestPoint>({ bounds: UNIT_BOUNDS, cellSize: 1 });
    grid.build([
      { id: 0, x: 0.5, z: 0.5 },
      { id: 1, x: 0.6, z: 0.6 },
      { id: 2, x: 5.5, z: 5.5 },
    ]);
    expect(grid.getStats()).toEqual({ cells: 2, items: 3, unindexed: 0, maxPerCell: 2, avgPerCell: 1.5 });
  });

  it('supports incremental inserts and radius queries', () => {
    const grid = new SpatialGrid<TestPoint>({ bounds: UNIT_BOUNDS, cellSize: 1 });
    grid.insert({ id: 0, x: 2, z: 2 }, 4);
    grid.insert({ id: 1, x: 2.4, z: 2 });
    grid.insert({ id: 2, x: 4, z: 4 });
    expect(grid.isBuilt).toBe(true);
    expect(grid.sourceRevision).toBe(4);
    expect(ids(grid.queryRadius(2, 2, 0.5))).toEqual([0, 1]);
  });

  it('matches nothing for a negative radius, like the quadtree', () => {
    const points: TestPoint[] = [
      { id: 0, x: 0, z: 0 },
      { id: 1, x: 0.3, z: 0 },
    ];
    const grid = new SpatialGrid<TestPoint>();
    grid.build(points);
    const tree = new Quadtree<TestPoint>();
    tree.build(points);
    tree.insert({ id: 2, x: 50, z: 50 });

    for (const index of [grid, tree]) {
      expect(index.queryRadius(0, 0, -1)).toEqual([]);
      expect(index.queryRadius(50, 50, -0.5)).toEqual([]);
      expect(index.queryRadius(0, 0, Number.NaN)).toEqual([]);
    }
    expect(() => new SpatialGrid<TestPoint>().queryRadius(0, 0, -1)).toThrow(IndexNotBuiltError);
  });

  it('rejects a non-positive cell size', () => {
    expect(() => new SpatialGrid({ cellSize: 0 })).toThrow(ConfigurationError);
  });
});
