/**
 * ECS component definitions (bitECS v0.4.0 API).
 *
 * Components are plain objects with TypedArray columns indexed by entity
 * ID (eid). No Three.js objects, data only. Columns are per store and grow
 * in place, so the component objects keep their identity for queries.
 *
 * Convention: Float64Array for positions (matching the feature objects),
 *             Float32Array for sizes and per-frame distances,
 *             Uint8Array for tiers and booleans.
 */

import { INITIAL_ENTITY_CAPACITY } from './world';

export interface FeatureComponents {
  /** Tag: the entity is a turbine. */
  IsTurbine: Record<string, never>;
  /** Ground position; y is the base height the tower stands on. */
  Position: { x: Float64Array; y: Float64Array; z: Float64Array };
  /** Commissioning year. */
  Activation: { year: Float64Array };
  /** Rated power in kW. */
  Magnitude: { kw: Float32Array };
  /** Tower height and rotor radius in world units. */
  Extent: { height: Float32Array; rotorRadius: Float32Array };
  /** Tier ordinal and normalized camera distance from the last frame that saw the entity. */
  LODState: { tier: Uint8Array; distance: Float32Array };
  /** 1 when the last frame emitted the entity. */
  Visible: { value: Uint8Array };
}

export function createFeatureComponents(capacity: number = INITIAL_ENTITY_CAPACITY): FeatureComponents {
  return {
    IsTurbine: {},
    Position: {
      x: new Float64Array(capacity),
      y: new Float64Array(capacity),
      z: new Float64Array(capacity),
    },
    Activation: { year: new Float64Array(capacity) },
    Magnitude: { kw: new Float32Array(capacity) },
    Extent: {
      height: new Float32Array(capacity),
      rotorRadius: new Float32Array(capacity),
    },
    LODState: {
      tier: new Uint8Array(capacity),
      distance: new Float32Array(capacity),
    },
    Visible: { value: new Uint8Array(capacity) },
  };
}

function grown<A extends Float64Array | Float32Array | Uint8Array>(column: A, length: number, make: (n: number) => A): A {
  const next = make(length);
  next.set(column);
  return next;
}

/** Current column length. */
export function componentCapacity(c: FeatureComponents): number {
  return c.Visible.value.length;
}

/** Grow every column so `eid` is a valid index. */
export function ensureCapacity(c: FeatureComponents, eid: number): void {
  let length = componentCapacity(c);
  if (eid < length) return;
  while (length <= eid) length = Math.max(1, length * 2);

  const f64 = (n: number) => new Float64Array(n);
  const f32 = (n: number) => new Float32Array(n);
  const u8 = (n: number) => new Uint8Array(n);

  c.Position.x = grown(c.Position.x, length, f64);
  c.Position.y = grown(c.Position.y, length, f64);
  c.Position.z = grown(c.Position.z, length, f64);
  c.Activation.year = grown(c.Activation.year, length, f64);
  c.Magnitude.kw = grown(c.Magnitude.kw, length, f32);
  c.Extent.height = grown(c.Extent.height, length, f32);
  c.Extent.rotorRadius = grown(c.Extent.rotorRadius, length, f32);
  c.LODState.tier = grown(c.LODState.tier, length, u8);
  c.LODState.distance = grown(c.LODState.distance, length, f32);
  c.Visible.value = grown(c.Visible.value, length, u8);
}
