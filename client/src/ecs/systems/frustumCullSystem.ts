/**
 * System #3: FrustumCullSystem
 *
 * Bounding-sphere test of every remaining candidate against the frustum.
 *
 * Frequency: every frame
 */

import { FrustumCuller } from '../../culling/frustumCuller';
import { markDegraded, type FrameState } from '../frame';

export function frustumCullSystem(frame: FrameState): void {
  if (!frame.frustum.extracted) markDegraded(frame, 'frustum-permissive');

  const culler = new FrustumCuller(frame.settings.sphereScale);
  const visible = culler.cull(frame.frustum, frame.candidates);
  frame.stats.culledByFrustum = culler.stats.culled;
  frame.candidates = visible;
}
