import * as THREE from 'three';

import { CAMERA_FOV, MIN_SCREEN_DISTANCE, SCREEN_HEIGHT, SCREEN_SIZE_PIXEL_THRESHOLDS } from '../config';

/**
 * Projected on-screen height of an object: h · screenHeight / (2 · tan(fov/2)) / d.
 * The factor depends only on the viewport, so it is computed once.
 */
export class ScreenSizeSelector {
  readonly screenHeight: number;
  readonly fov: number;
  private readonly screenFactor: number;

  constructor(screenHeight: number = SCREEN_HEIGHT, fov: number = CAMERA_FOV) {
    this.screenHeight = screenHeight;
    this.fov = fov;
    this.screenFactor = screenHeight / (2 * Math.tan(THREE.MathUtils.degToRad(fov) / 2));
  }

  /** Height in pixels; unbounded for objects at the camera. */
  screenSize(objectHeight: number, distance: number): number {
    if (distance < MIN_SCREEN_DISTANCE) return Infinity;
    return (objectHeight * this.screenFactor) / distance;
  }

  /**
   * Tier ordinal for a projected size, 0 for anything at least as tall as
   * the first threshold, one more for each threshold it falls below.
   */
  targetOrdinal(objectHeight: number, distance: number): number {
    const size = this.screenSize(objectHeight, distance);
    let ordinal = 0;
    for (const pixels of SCREEN_SIZE_PIXEL_THRESHOLDS) {
      if (size < pixels) ordinal++;
    }
    return ordinal;
  }
}
