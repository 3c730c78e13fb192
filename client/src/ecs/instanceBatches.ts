/**
 * Packs the visible turbines of one tier into an interleaved instance
 * buffer: x, y, z, scale, r, g, b per instance. The renderer uploads one
 * buffer per tier and draws it with a single instanced call.
 */

import { query } from 'bitecs';

import { powerColorRGB } from '../core/powerColors';
import type { FeatureStore } from './featureStore';

export const INSTANCE_STRIDE = 7;

/** Uniform scale per tier ordinal; tiers past the table reuse its last entry. */
export const TIER_SCALES: readonly number[] = [1.0, 0.7, 0.4];

export interface InstanceBatch {
  tierOrdinal: number;
  count: number;
  /** `count * INSTANCE_STRIDE` floats are meaningful; the rest is spare capacity. */
  data: Float32Array;
}

export function tierScale(ordinal: number): number {
  return TIER_SCALES[Math.min(ordinal, TIER_SCALES.length - 1)] ?? 1;
}

/**
 * Reads Position, Magnitude, LODState and Visible straight from the ECS
 * columns. Pass `target` to reuse a buffer between frames; it is replaced
 * when too small.
 */
export function packTierInstances(store: FeatureStore, tierOrdinal: number, target?: Float32Array): InstanceBatch {
  const { IsTurbine, Position, Magnitude, LODState, Visible } = store.components;
  const eids = query(store.world, [IsTurbine, Position, Magnitude, LODState, Visible]);

  const selected: number[] = [];
  for (const eid of eids) {
    if (Visible.value[eid] === 1 && LODState.tier[eid] === tierOrdinal) selected.push(eid);
  }

  const needed = selected.length * INSTANCE_STRIDE;
  const data = target && target.length >= needed ? target : new Float32Array(needed);
  const scale = tierScale(tierOrdinal);

  selected.forEach((eid, i) => {
    const [r, g, b] = powerColorRGB(Magnitude.kw[eid] ?? 0);
    data.set([Position.x[eid] ?? 0, Position.y[eid] ?? 0, Position.z[eid] ?? 0, scale, r, g, b], i * INSTANCE_STRIDE);
  });

  return { tierOrdinal, count: selected.length, data };
}
