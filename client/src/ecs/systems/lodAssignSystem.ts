/**
 * System #4: LODAssignSystem
 *
 * Normalizes each visible feature's planar distance to the eye by
 * maxLodDistance (clamped to [0, 1]) and looks up its tier. With no known
 * eye every feature gets distance 0, the finest tier.
 *
 * Writes LODState.tier, LODState.distance and Visible.value when the frame
 * has a store; every other turbine's Visible.value is cleared.
 *
 * Frequency: every frame
 */

import { clamp, distance } from '../../core/math';
import type { FrameState, TierAssignment } from '../frame';

export function lodAssignSystem(frame: FrameState): void {
  const { frustum, lodManager, settings, store } = frame;
  const eye = frustum.eye;
  const assignments: TierAssignment[] = [];

  for (const feature of frame.candidates) {
    const normalized = eye
      ? clamp(distance(eye.x, eye.z, feature.x, feature.z) / settings.maxLodDistance, 0, 1)
      : 0;
    assignments.push({ feature, tier: lodManager.getLodForDistance(normalized), distance: normalized });
  }

  if (store) {
    store.clearVisibility();
    for (const { feature, tier, distance: d } of assignments) {
      store.markVisible(feature, tier.ordinal, d);
    }
  }

  frame.assignments = assignments;
}
