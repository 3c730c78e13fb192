/**
 * System #5: EmitSystem
 *
 * Groups the assigned features into one batch per tier and closes the
 * frame's counters.
 *
 * Frequency: every frame
 */

import type { FrameState, TierBatch } from '../frame';

export function emitSystem(frame: FrameState): void {
  const batches: TierBatch[] = frame.lodManager.levels.map((tier) => ({ tier, features: [] }));
  const distribution: Record<string, number> = {};
  for (const tier of frame.lodManager.levels) distribution[tier.name] = 0;

  let polygons = 0;
  for (const { feature, tier } of frame.assignments) {
    batches[tier.ordinal]?.features.push(feature);
    distribution[tier.name] = (distribution[tier.name] ?? 0) + 1;
    polygons += Math.floor(frame.settings.basePolygons * tier.polygonRatio);
  }

  frame.batches = batches;
  frame.stats.visible = frame.assignments.length;
  frame.stats.lodDistribution = distribution;
  frame.stats.estimatedPolygons = polygons;
}
