/**
 * Scalar helpers for planar distances and sorted lookups.
 * Zero allocations - all functions return primitives.
 */

/** Clamp value between min and max inclusive. */
export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

/** Euclidean distance between two points on the ground plane. */
export function distance(x1: number, z1: number, x2: number, z2: number): number {
  const dx = x2 - x1;
  const dz = z2 - z1;
  return Math.sqrt(dx * dx + dz * dz);
}

/**
 * Index of the last element <= value in an ascending array, or -1 when
 * every element is greater. NaN yields -1.
 */
export function floorIndex(sorted: ArrayLike<number>, value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((sorted[mid] ?? Infinity) <= value) lo = mid + 1;
    else hi = mid;
  }
  return lo - 1;
}

/** Stable string key for a grid cell. */
export function cellKey(gx: number, gz: number): string {
  return `${gx},${gz}`;
}
