/**
 * Distance-keyed tier selection.
 *
 * Selection is pure: the same normalized distance always yields the same
 * frozen LODLevel object, found by binary search over the thresholds.
 */

import {
  AGGRESSIVE_LOD_FEATURE_COUNT, BASE_POLYGON_COUNT, EXTREME_LOD_FEATURE_COUNT,
} from '../config';
import { ConfigurationError } from '../core/errors';
import { floorIndex } from '../core/math';
import { err, ok, type LODPresetName, type Result } from '../types';
import { buildLevels, type BuildLevelsOptions, type LODLevel, type LODLevelSpec } from './lodLevel';
import { LOD_PRESETS } from './lodPresets';
import { ScreenSizeSelector } from './screenSizeSelector';

export type LODManagerOptions = BuildLevelsOptions;

export interface PolygonSavings {
  basePolygons: number;
  lodPolygons: number;
  /** 0-100; 0 for an empty distance list. */
  savingsPercent: number;
  distribution: Record<string, number>;
}

export interface LODSummaryRow {
  name: string;
  polygonRatio: number;
  distanceThreshold: number;
  segmentCount: number;
  bladeCount: number;
  flags: string[];
}

export interface LODSummary {
  preset: LODPresetName | 'custom';
  levels: LODSummaryRow[];
}

function levelFlags(level: LODLevel): string[] {
  const flags: string[] = [];
  if (level.skipNacelle) flags.push('no-nacelle');
  if (level.skipBlades) flags.push('no-blades');
  if (level.useBillboard) flags.push('billboard');
  return flags;
}

export class LODManager {
  readonly preset: LODPresetName | 'custom';
  readonly levels: readonly LODLevel[];
  private readonly thresholds: Float64Array;

  constructor(source: LODPresetName | readonly LODLevelSpec[] = 'aggressive', options: LODManagerOptions = {}) {
    const specs = typeof source === 'string' ? LOD_PRESETS[source] : source;
    this.preset = typeof source === 'string' ? source : 'custom';
    this.levels = buildLevels(specs, options);
    this.thresholds = Float64Array.from(this.levels, (level) => level.distanceThreshold);
  }

  /** Validate without throwing. */
  static tryCreate(
    source: LODPresetName | readonly LODLevelSpec[],
    options: LODManagerOptions = {},
  ): Result<LODManager, ConfigurationError> {
    try {
      return ok(new LODManager(source, options));
    } catch (error) {
      if (error instanceof ConfigurationError) return err(error);
      throw error;
    }
  }

  get tierCount(): number {
    return this.levels.length;
  }

  get finest(): LODLevel {
    return this.level(0);
  }

  get coarsest(): LODLevel {
    return this.level(this.levels.length - 1);
  }

  /** Tier by ordinal, clamped into range. */
  level(ordinal: number): LODLevel {
    const index = Math.min(Math.max(Math.trunc(ordinal) || 0, 0), this.levels.length - 1);
    const level = this.levels[index];
    if (!level) throw new ConfigurationError('levels', 'tier table is empty');
    return level;
  }

  /**
   * Tier whose threshold is the greatest one <= `distance`. Distances below
   * the first threshold, and NaN, select the first tier.
   */
  getLodForDistance(distance: number): LODLevel {
    return this.level(Math.max(0, floorIndex(this.thresholds, distance)));
  }

  /** Same as getLodForDistance(min(1, sqrt(dSq / maxDSq))), without the caller's sqrt. */
  getLodForDistanceSquared(distanceSq: number, maxDistanceSq = 1): LODLevel {
    const normalized = maxDistanceSq > 0
      ? Math.min(1, Math.sqrt(distanceSq / maxDistanceSq))
      : (distanceSq > 0 ? 1 : 0);
    return this.getLodForDistance(normalized);
  }

  /** Coarser tiers for smaller projected sizes, capped at the last tier. */
  selectByScreenSize(
    objectHeight: number,
    distance: number,
    screenHeight?: number,
    fov?: number,
  ): LODLevel {
    const selector = new ScreenSizeSelector(screenHeight, fov);
    return this.level(selector.targetOrdinal(objectHeight, distance));
  }

  polygonCount(basePolygons: number, distance: number): number {
    return Math.floor(basePolygons * this.getLodForDistance(distance).polygonRatio);
  }

  /** Expected polygon budget for a set of normalized distances. */
  polygonSavings(distances: readonly number[], basePolygons: number = BASE_POLYGON_COUNT): PolygonSavings {
    const distribution: Record<string, number> = {};
    let lodPolygons = 0;
    for (const d of distances) {
      const level = this.getLodForDistance(d);
      lodPolygons += basePolygons * level.polygonRatio;
      distribution[level.name] = (distribution[level.name] ?? 0) + 1;
    }
    const base = distances.length * basePolygons;
    return {
      basePolygons: base,
      lodPolygons,
      savingsPercent: base > 0 ? (1 - lodPolygons / base) * 100 : 0,
      distribution,
    };
  }

  summary(): LODSummary {
    return {
      preset: this.preset,
      levels: this.levels.map((level) => ({
        name: level.name,
        polygonRatio: level.polygonRatio,
        distanceThreshold: level.distanceThreshold,
        segmentCount: level.segmentCount,
        bladeCount: level.bladeCount,
        flags: levelFlags(level),
      })),
    };
  }

  /** One line per tier, e.g. `LOD3:   8.0% @ dist=0.55 (seg=4, blades=1) [no-nacelle]`. */
  describe(): string {
    const lines = [`LOD configuration (${this.preset}):`];
    for (const row of this.summary().levels) {
      const flags = row.flags.length > 0 ? ` [${row.flags.join(', ')}]` : '';
      lines.push(
        `  ${row.name}: ${(row.polygonRatio * 100).toFixed(1).padStart(5)}% @ dist=${row.distanceThreshold.toFixed(2)}` +
          ` (seg=${row.segmentCount}, blades=${row.bladeCount})${flags}`,
      );
    }
    return lines.join('\n');
  }
}

/** Coarser presets for denser fields. */
export function presetForFeatureCount(count: number): LODPresetName {
  if (count > EXTREME_LOD_FEATURE_COUNT) return 'extreme';
  if (count > AGGRESSIVE_LOD_FEATURE_COUNT) return 'aggressive';
  return 'standard';
}
