/**
 * Core type definitions for the Windfield turbine viewer.
 */

// ── Features ────────────────────────────────────────────────────

/** Anything positioned on the ground plane. */
export interface PlanarPoint {
  readonly x: number;
  readonly z: number;
}

/** Anything stamped with an activation year. */
export interface Dated {
  readonly year: number;
}

/** Raw turbine record as handed over by the data importer. */
export interface FeatureInput {
  x: number;
  z: number;
  year?: number;
  /** Rated power in kW. */
  magnitude?: number;
  height?: number;
  rotorRadius?: number;
  baseHeight?: number;
}

/**
 * A turbine owned by a FeatureStore. Every field is resolved at creation;
 * per-frame state (tier, distance, visibility) lives in the store's ECS columns.
 */
export interface Feature extends PlanarPoint, Dated {
  /** Arena index, stable for the lifetime of the store. */
  readonly id: number;
  /** bitECS entity carrying the per-frame columns. */
  readonly eid: number;
  readonly magnitude: number;
  readonly height: number;
  readonly rotorRadius: number;
  readonly baseHeight: number;
}

// ── Camera ──────────────────────────────────────────────────────

/** Orbit camera around the map origin. Angles in degrees. */
export interface CameraPose {
  rotX: number;
  rotY: number;
  zoom: number;
  fov: number;
  aspect: number;
  near: number;
  far: number;
}

// ── Quality ─────────────────────────────────────────────────────

export type QualityPreset = 'high' | 'medium' | 'low' | 'minimal';

export type LODPresetName = 'standard' | 'aggressive' | 'extreme';

export interface QualityPresetConfig {
  preset: QualityPreset;
  label: string;
  targetFps: number;
  lodPreset: LODPresetName;
  prefilterThreshold: number;
  /** Multiplies the LOD normalization range; below 1 reaches coarse tiers sooner. */
  lodDistanceScale: number;
}

// ── Frame Diagnostics ───────────────────────────────────────────

export type DegradedStage =
  | 'spatial-index-unbuilt'
  | 'spatial-index-stale'
  | 'footprint-unavailable'
  | 'frustum-permissive';

export interface FrameStats {
  year: number;
  total: number;
  afterTemporal: number;
  afterPrefilter: number;
  culledBySpatial: number;
  culledByFrustum: number;
  visible: number;
  prefilterApplied: boolean;
  lodDistribution: Record<string, number>;
  estimatedPolygons: number;
  frameTimeMs: number;
  degraded: DegradedStage[];
}

// ── Result Type ─────────────────────────────────────────────────

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T, E = Error>(value: T): Result<T, E> {
  return { ok: true, value };
}

export function err<T, E = Error>(error: E): Result<T, E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw result.error instanceof Error ? result.error : new Error(String(result.error));
}
