/**
 * Detail tiers. A tier applies from its distance threshold (normalized,
 * 0 = at the camera, 1 = at the LOD range) up to the next tier's threshold.
 */

import { ConfigurationError } from '../core/errors';

export interface LODLevelSpec {
  name?: string;
  polygonRatio: number;
  distanceThreshold: number;
  /** Sides of the tower and nacelle cylinders. */
  segmentCount?: number;
  bladeCount?: number;
  skipNacelle?: boolean;
  skipBlades?: boolean;
  useBillboard?: boolean;
}

export interface LODLevel {
  readonly name: string;
  /** Position in ascending threshold order, 0 = finest. */
  readonly ordinal: number;
  readonly polygonRatio: number;
  readonly distanceThreshold: number;
  readonly segmentCount: number;
  readonly bladeCount: number;
  readonly skipNacelle: boolean;
  readonly skipBlades: boolean;
  readonly useBillboard: boolean;
}

export interface BuildLevelsOptions {
  /** Reject tables where a farther tier keeps more polygons than a nearer one. */
  enforceMonotonicRatios?: boolean;
}

function validateSpec(spec: LODLevelSpec, index: number): void {
  const field = spec.name ?? `levels[${index}]`;
  const { polygonRatio, distanceThreshold } = spec;
  if (!(polygonRatio >= 0 && polygonRatio <= 1)) {
    throw new ConfigurationError(field, `polygonRatio must be within [0, 1], got ${polygonRatio}`);
  }
  if (!(distanceThreshold >= 0) || !Number.isFinite(distanceThreshold)) {
    throw new ConfigurationError(field, `distanceThreshold must be a finite number >= 0, got ${distanceThreshold}`);
  }
  const segments = spec.segmentCount ?? 8;
  if (!Number.isInteger(segments) || segments < 3) {
    throw new ConfigurationError(field, `segmentCount must be an integer >= 3, got ${segments}`);
  }
  const blades = spec.bladeCount ?? 3;
  if (!Number.isInteger(blades) || blades < 0 || blades > 3) {
    throw new ConfigurationError(field, `bladeCount must be an integer within [0, 3], got ${blades}`);
  }
}

/**
 * Validate and freeze a tier table. Tiers come back sorted ascending by
 * threshold with ordinals assigned in that order; unnamed tiers are named
 * after their ordinal.
 */
export function buildLevels(specs: readonly LODLevelSpec[], options: BuildLevelsOptions = {}): readonly LODLevel[] {
  if (specs.length === 0) {
    throw new ConfigurationError('levels', 'at least one tier is required');
  }
  specs.forEach(validateSpec);

  const sorted = [...specs].sort((a, b) => a.distanceThreshold - b.distanceThreshold);
  const levels = sorted.map((spec, ordinal): LODLevel => Object.freeze({
    name: spec.name ?? `LOD${ordinal}`,
    ordinal,
    polygonRatio: spec.polygonRatio,
    distanceThreshold: spec.distanceThreshold,
    segmentCount: spec.segmentCount ?? 8,
    bladeCount: spec.bladeCount ?? 3,
    skipNacelle: spec.skipNacelle ?? false,
    skipBlades: spec.skipBlades ?? false,
    useBillboard: spec.useBillboard ?? false,
  }));

  const names = new Set<string>();
  for (let i = 0; i < levels.length; i++) {
    const level = levels[i];
    const previous = levels[i - 1];
    if (!level) continue;
    if (names.has(level.name)) {
      throw new ConfigurationError(level.name, 'tier names must be unique');
    }
    names.add(level.name);
    if (!previous) continue;
    if (level.distanceThreshold === previous.distanceThreshold) {
      throw new ConfigurationError(level.name, `distanceThreshold ${level.distanceThreshold} is used by ${previous.name} too`);
    }
    if ((options.enforceMonotonicRatios ?? true) && level.polygonRatio > previous.polygonRatio) {
      throw new ConfigurationError(
        level.name,
        `polygonRatio ${level.polygonRatio} exceeds the nearer tier ${previous.name} (${previous.polygonRatio})`,
      );
    }
  }

  return Object.freeze(levels);
}
