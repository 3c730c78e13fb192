/**
 * Axis-aligned rectangle on the ground plane (x, z).
 *
 * Closed on every edge: a point on any edge is contained. Quadtree children
 * use their own half-open convention, see quadtree.ts.
 */

import { ConfigurationError } from '../core/errors';
import type { PlanarPoint } from '../types';

export class BoundingBox {
  readonly xMin: number;
  readonly xMax: number;
  readonly zMin: number;
  readonly zMax: number;

  constructor(xMin: number, xMax: number, zMin: number, zMax: number) {
    if (![xMin, xMax, zMin, zMax].every(Number.isFinite)) {
      throw new ConfigurationError('BoundingBox', `edges must be finite, got (${xMin}, ${xMax}, ${zMin}, ${zMax})`);
    }
    if (xMin > xMax || zMin > zMax) {
      throw new ConfigurationError('BoundingBox', `min must not exceed max, got (${xMin}, ${xMax}, ${zMin}, ${zMax})`);
    }
    this.xMin = xMin;
    this.xMax = xMax;
    this.zMin = zMin;
    this.zMax = zMax;
  }

  /** Box centred on (cx, cz) reaching `halfX`/`halfZ` to either side. */
  static around(cx: number, cz: number, halfX: number, halfZ: number = halfX): BoundingBox {
    return new BoundingBox(cx - halfX, cx + halfX, cz - halfZ, cz + halfZ);
  }

  /** Smallest box covering every finite point; null for none. */
  static enclosing(points: Iterable<PlanarPoint>): BoundingBox | null {
    let xMin = Infinity;
    let xMax = -Infinity;
    let zMin = Infinity;
    let zMax = -Infinity;
    for (const p of points) {
      if (!Number.isFinite(p.x) || !Number.isFinite(p.z)) continue;
      if (p.x < xMin) xMin = p.x;
      if (p.x > xMax) xMax = p.x;
      if (p.z < zMin) zMin = p.z;
      if (p.z > zMax) zMax = p.z;
    }
    return xMin === Infinity ? null : new BoundingBox(xMin, xMax, zMin, zMax);
  }

  get width(): number {
    return this.xMax - this.xMin;
  }

  get depth(): number {
    return this.zMax - this.zMin;
  }

  get centerX(): number {
    return (this.xMin + this.xMax) / 2;
  }

  get centerZ(): number {
    return (this.zMin + this.zMax) / 2;
  }

  contains(x: number, z: number): boolean {
    return x >= this.xMin && x <= this.xMax && z >= this.zMin && z <= this.zMax;
  }

  containsPoint(point: PlanarPoint): boolean {
    return this.contains(point.x, point.z);
  }

  /** True when the closed boxes share at least one point. */
  intersects(other: BoundingBox): boolean {
    return !(
      other.xMin > this.xMax ||
      other.xMax < this.xMin ||
      other.zMin > this.zMax ||
      other.zMax < this.zMin
    );
  }

  /** True when `other` lies entirely inside this box. */
  encloses(other: BoundingBox): boolean {
    return (
      other.xMin >= this.xMin &&
      other.xMax <= this.xMax &&
      other.zMin >= this.zMin &&
      other.zMax <= this.zMax
    );
  }

  /** True when the disc of radius `r` around (cx, cz) touches the box. */
  intersectsCircle(cx: number, cz: number, r: number): boolean {
    const nx = cx < this.xMin ? this.xMin : cx > this.xMax ? this.xMax : cx;
    const nz = cz < this.zMin ? this.zMin : cz > this.zMax ? this.zMax : cz;
    const dx = cx - nx;
    const dz = cz - nz;
    return dx * dx + dz * dz <= r * r;
  }

  union(other: BoundingBox): BoundingBox {
    return new BoundingBox(
      Math.min(this.xMin, other.xMin),
      Math.max(this.xMax, other.xMax),
      Math.min(this.zMin, other.zMin),
      Math.max(this.zMax, other.zMax),
    );
  }

  expand(margin: number): BoundingBox {
    return new BoundingBox(this.xMin - margin, this.xMax + margin, this.zMin - margin, this.zMax + margin);
  }

  equals(other: BoundingBox): boolean {
    return (
      this.xMin === other.xMin &&
      this.xMax === other.xMax &&
      this.zMin === other.zMin &&
      this.zMax === other.zMax
    );
  }

  toString(): string {
    return `BoundingBox(${this.xMin}, ${this.xMax}, ${this.zMin}, ${this.zMax})`;
  }
}
