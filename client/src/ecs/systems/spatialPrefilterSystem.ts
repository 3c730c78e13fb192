/**
 * System #2: SpatialPrefilterSystem
 *
 * Narrows large candidate sets to the features under the camera's ground
 * footprint with one spatial index query, keeping the temporal order.
 * Small sets go straight to the frustum test, which is cheaper than the
 * query for them.
 *
 * The footprint is taken over the height range of the candidates' cull
 * spheres and widened by the largest sphere radius, so it never drops a
 * feature the sphere test would keep. Features without a finite sphere
 * bypass the query the same way they pass the sphere test.
 *
 * Skipped, with everything kept, when the index is missing, unbuilt or built
 * from another revision, or when the frustum has no bounded view volume to
 * project. The reason lands in stats.degraded.
 *
 * Frequency: every frame, above the prefilter threshold
 */

import { featureSphere } from '../../culling/frustumCuller';
import type { Feature } from '../../types';
import { markDegraded, type FrameState } from '../frame';

interface CandidateExtent {
  /** Lowest and highest sphere centre. */
  minY: number;
  maxY: number;
  /** Largest sphere radius. */
  reach: number;
  unplaced: Set<Feature>;
}

function candidateExtent(candidates: readonly Feature[], sphereScale: number): CandidateExtent {
  const extent: CandidateExtent = { minY: Infinity, maxY: -Infinity, reach: 0, unplaced: new Set() };
  for (const feature of candidates) {
    const s = featureSphere(feature, sphereScale);
    if (!Number.isFinite(s.x) || !Number.isFinite(s.y) || !Number.isFinite(s.z) || !Number.isFinite(s.radius)) {
      extent.unplaced.add(feature);
      continue;
    }
    extent.minY = Math.min(extent.minY, s.y);
    extent.maxY = Math.max(extent.maxY, s.y);
    extent.reach = Math.max(extent.reach, s.radius);
  }
  return extent;
}

export function spatialPrefilterSystem(frame: FrameState): void {
  const { candidates, settings, spatialIndex, frustum } = frame;
  if (candidates.length <= settings.prefilterThreshold) return;

  if (!spatialIndex || !spatialIndex.isBuilt) {
    markDegraded(frame, 'spatial-index-unbuilt');
    frame.log.debug('prefilter skipped: no spatial index');
    return;
  }

  if (frame.expectedRevision !== undefined && spatialIndex.sourceRevision !== frame.expectedRevision) {
    markDegraded(frame, 'spatial-index-stale');
    frame.log.debug('prefilter skipped: stale spatial index', {
      indexRevision: spatialIndex.sourceRevision,
      expectedRevision: frame.expectedRevision,
    });
    return;
  }

  const extent = candidateExtent(candidates, settings.sphereScale);
  if (extent.unplaced.size === candidates.length) return;

  const footprint = frustum.groundFootprint(extent.minY, extent.maxY, settings.prefilterMargin, extent.reach);
  if (footprint.kind === 'unknown') {
    markDegraded(frame, frustum.extracted ? 'footprint-unavailable' : 'frustum-permissive');
    frame.log.debug('prefilter skipped: no bounded view volume');
    return;
  }

  // An empty footprint means no candidate's sphere can reach the view volume.
  const inView = new Set(footprint.kind === 'box' ? spatialIndex.query(footprint.box) : []);
  const kept = candidates.filter((feature) => inView.has(feature) || extent.unplaced.has(feature));

  frame.stats.prefilterApplied = true;
  frame.stats.culledBySpatial = candidates.length - kept.length;
  frame.stats.afterPrefilter = kept.length;
  frame.candidates = kept;
}
