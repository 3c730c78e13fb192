/**
 * Culling pipeline.
 *
 * All systems execute in fixed order, synchronously, on the caller's
 * thread. Frustum, indices and LOD manager are parameters of the call;
 * nothing here holds state between frames.
 */

import { createLogger } from '../core/logger';
import type { ViewFrustum } from '../culling/viewFrustum';
import type { LODManager } from '../lod/lodManager';
import type { SpatialIndex } from '../spatial/spatialIndex';
import type { YearIndex } from '../temporal/yearIndex';
import type { Feature } from '../types';
import {
  emptyStats, resolvePipelineSettings,
  type FrameResult, type FrameState, type PipelineOptions,
} from './frame';
import { emitSystem } from './systems/emitSystem';
import { frustumCullSystem } from './systems/frustumCullSystem';
import { lodAssignSystem } from './systems/lodAssignSystem';
import { spatialPrefilterSystem } from './systems/spatialPrefilterSystem';
import { temporalFilterSystem } from './systems/temporalFilterSystem';

const log = createLogger('Pipeline');

type PipelineSystem = (frame: FrameState) => void;

/**
 * Ordered system list. Index = execution priority.
 *
 * System 1: temporal filter (year index)
 * System 2: spatial prefilter (quadtree or grid), large sets only
 * System 3: frustum cull (bounding spheres)
 * System 4: LOD assignment (normalized planar distance)
 * System 5: emit (per-tier batches, counters)
 */
const systems: readonly PipelineSystem[] = [
  /* 1 */ temporalFilterSystem,
  /* 2 */ spatialPrefilterSystem,
  /* 3 */ frustumCullSystem,
  /* 4 */ lodAssignSystem,
  /* 5 */ emitSystem,
];

/**
 * Run one frame: features active by `year`, inside `frustum`, grouped by
 * the tier `lodManager` assigns them.
 */
export function runPipeline(
  year: number,
  frustum: ViewFrustum,
  spatialIndex: SpatialIndex<Feature> | null,
  yearIndex: YearIndex<Feature>,
  lodManager: LODManager,
  options: PipelineOptions = {},
): FrameResult {
  const start = performance.now();
  const frame: FrameState = {
    year,
    frustum,
    spatialIndex,
    yearIndex,
    lodManager,
    settings: resolvePipelineSettings(options),
    expectedRevision: options.expectedRevision,
    store: options.store ?? null,
    log,
    candidates: [],
    assignments: [],
    batches: [],
    stats: emptyStats(year),
  };

  for (const system of systems) {
    system(frame);
  }

  frame.stats.frameTimeMs = performance.now() - start;
  return { batches: frame.batches, stats: frame.stats };
}
