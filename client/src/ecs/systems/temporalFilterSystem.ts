/**
 * System #1: TemporalFilterSystem
 *
 * Seeds the frame with every feature commissioned in or before the frame's
 * year. The year index rebuilds itself first if the feature set changed.
 *
 * Frequency: every frame
 */

import type { FrameState } from '../frame';

export function temporalFilterSystem(frame: FrameState): void {
  frame.candidates = frame.yearIndex.getUntil(frame.year);
  frame.stats.total = frame.yearIndex.countUntil(Infinity);
  frame.stats.afterTemporal = frame.candidates.length;
  frame.stats.afterPrefilter = frame.candidates.length;
}
