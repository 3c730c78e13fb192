import { BOUNDING_SPHERE_SCALE } from '../config';
import type { Feature } from '../types';
import type { ViewFrustum } from './viewFrustum';

export interface BoundingSphere {
  x: number;
  y: number;
  z: number;
  radius: number;
}

export interface CullerStats {
  tested: number;
  culled: number;
}

/**
 * Sphere around the whole turbine: centred halfway up the tower, wide
 * enough for the rotor, padded by `scale`.
 */
export function featureSphere(feature: Feature, scale: number = BOUNDING_SPHERE_SCALE): BoundingSphere {
  return {
    x: feature.x,
    y: feature.baseHeight + feature.height / 2,
    z: feature.z,
    radius: Math.max(feature.height, feature.rotorRadius) * scale,
  };
}

/** Batch sphere culling with running counters. */
export class FrustumCuller {
  readonly sphereScale: number;
  private tested = 0;
  private culled = 0;

  constructor(sphereScale: number = BOUNDING_SPHERE_SCALE) {
    this.sphereScale = sphereScale;
  }

  isFeatureVisible(frustum: ViewFrustum, feature: Feature): boolean {
    const s = featureSphere(feature, this.sphereScale);
    return frustum.isSphereVisible(s.x, s.y, s.z, s.radius);
  }

  /** Visible features in input order. */
  cull(frustum: ViewFrustum, features: readonly Feature[]): Feature[] {
    const visible: Feature[] = [];
    for (const feature of features) {
      if (this.isFeatureVisible(frustum, feature)) visible.push(feature);
    }
    this.tested += features.length;
    this.culled += features.length - visible.length;
    return visible;
  }

  get stats(): CullerStats {
    return { tested: this.tested, culled: this.culled };
  }

  resetStats(): void {
    this.tested = 0;
    this.culled = 0;
  }
}
