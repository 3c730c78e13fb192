/**
 * Per-frame state threaded through the culling systems.
 */

import {
  BASE_POLYGON_COUNT, BOUNDING_SPHERE_SCALE, MAX_LOD_DISTANCE, PREFILTER_MARGIN, PREFILTER_THRESHOLD,
} from '../config';
import { ConfigurationError } from '../core/errors';
import type { Logger } from '../core/logger';
import type { ViewFrustum } from '../culling/viewFrustum';
import type { LODLevel } from '../lod/lodLevel';
import type { LODManager } from '../lod/lodManager';
import type { SpatialIndex } from '../spatial/spatialIndex';
import type { YearIndex } from '../temporal/yearIndex';
import type { DegradedStage, Feature, FrameStats } from '../types';
import type { FeatureStore } from './featureStore';

export interface PipelineOptions {
  /** The spatial prefilter runs only above this many temporal candidates. */
  prefilterThreshold?: number;
  /** Slack added around the view footprint before querying the spatial index. */
  prefilterMargin?: number;
  /** Planar distance that maps to normalized distance 1. */
  maxLodDistance?: number;
  sphereScale?: number;
  basePolygons?: number;
  /**
   * Revision of the feature set the caller considers current. A spatial
   * index built from any other revision is skipped as stale.
   */
  expectedRevision?: number;
  /** Receives tier, distance and visibility in its ECS columns. */
  store?: FeatureStore;
}

export type PipelineSettings = Required<Omit<PipelineOptions, 'expectedRevision' | 'store'>>;

export const DEFAULT_PIPELINE_SETTINGS: Readonly<PipelineSettings> = {
  prefilterThreshold: PREFILTER_THRESHOLD,
  prefilterMargin: PREFILTER_MARGIN,
  maxLodDistance: MAX_LOD_DISTANCE,
  sphereScale: BOUNDING_SPHERE_SCALE,
  basePolygons: BASE_POLYGON_COUNT,
};

/** Fill in defaults. Throws ConfigurationError for a range or scale the systems cannot divide by. */
export function resolvePipelineSettings(options: PipelineOptions): PipelineSettings {
  const d = DEFAULT_PIPELINE_SETTINGS;
  const settings: PipelineSettings = {
    prefilterThreshold: options.prefilterThreshold ?? d.prefilterThreshold,
    prefilterMargin: options.prefilterMargin ?? d.prefilterMargin,
    maxLodDistance: options.maxLodDistance ?? d.maxLodDistance,
    sphereScale: options.sphereScale ?? d.sphereScale,
    basePolygons: options.basePolygons ?? d.basePolygons,
  };
  if (!(settings.maxLodDistance > 0) || !Number.isFinite(settings.maxLodDistance)) {
    throw new ConfigurationError('maxLodDistance', `must be a positive finite number, got ${settings.maxLodDistance}`);
  }
  if (!(settings.sphereScale >= 0) || !Number.isFinite(settings.sphereScale)) {
    throw new ConfigurationError('sphereScale', `must be a non-negative finite number, got ${settings.sphereScale}`);
  }
  return settings;
}

/** Visible features sharing one tier; the renderer draws one batch per tier. */
export interface TierBatch {
  tier: LODLevel;
  features: Feature[];
}

export interface FrameResult {
  /** One batch per tier in ordinal order, empty batches included. */
  batches: TierBatch[];
  stats: FrameStats;
}

export interface TierAssignment {
  feature: Feature;
  tier: LODLevel;
  distance: number;
}

export interface FrameState {
  readonly year: number;
  readonly frustum: ViewFrustum;
  readonly spatialIndex: SpatialIndex<Feature> | null;
  readonly yearIndex: YearIndex<Feature>;
  readonly lodManager: LODManager;
  readonly settings: PipelineSettings;
  readonly expectedRevision: number | undefined;
  readonly store: FeatureStore | null;
  readonly log: Logger;
  candidates: Feature[];
  assignments: TierAssignment[];
  batches: TierBatch[];
  stats: FrameStats;
}

export function emptyStats(year: number): FrameStats {
  return {
    year,
    total: 0,
    afterTemporal: 0,
    afterPrefilter: 0,
    culledBySpatial: 0,
    culledByFrustum: 0,
    visible: 0,
    prefilterApplied: false,
    lodDistribution: {},
    estimatedPolygons: 0,
    frameTimeMs: 0,
    degraded: [],
  };
}

export function markDegraded(frame: FrameState, stage: DegradedStage): void {
  if (!frame.stats.degraded.includes(stage)) frame.stats.degraded.push(stage);
}
