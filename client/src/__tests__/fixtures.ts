import type { FeatureInput } from '../types';

/** Small seeded PRNG so randomized tests replay identically. */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface TestPoint {
  id: number;
  x: number;
  z: number;
}

export function uniformPoints(count: number, seed: number, xMin = -1.6, xMax = 1.6, zMin = -1.9, zMax = 1.9): TestPoint[] {
  const rand = mulberry32(seed);
  const points: TestPoint[] = [];
  for (let id = 0; id < count; id++) {
    points.push({ id, x: xMin + rand() * (xMax - xMin), z: zMin + rand() * (zMax - zMin) });
  }
  return points;
}

export function ids(points: readonly { id: number }[]): number[] {
  return points.map((p) => p.id).sort((a, b) => a - b);
}

export function turbineInputs(count: number, seed: number, yearFrom = 1990, yearTo = 2025): FeatureInput[] {
  const rand = mulberry32(seed);
  const inputs: FeatureInput[] = [];
  for (let i = 0; i < count; i++) {
    inputs.push({
      x: -1.6 + rand() * 3.2,
      z: -1.9 + rand() * 3.8,
      year: yearFrom + Math.floor(rand() * (yearTo - yearFrom + 1)),
      magnitude: 500 + Math.floor(rand() * 6000),
    });
  }
  return inputs;
}
