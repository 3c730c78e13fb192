import type { LODPresetName } from '../types';
import type { LODLevelSpec } from './lodLevel';

export const LOD_PRESET_NAMES: readonly LODPresetName[] = ['standard', 'aggressive', 'extreme'];

export const LOD_PRESETS: Readonly<Record<LODPresetName, readonly LODLevelSpec[]>> = {
  standard: [
    { name: 'LOD0', polygonRatio: 1.0, distanceThreshold: 0.0 },
    { name: 'LOD1', polygonRatio: 0.5, distanceThreshold: 0.3 },
    { name: 'LOD2', polygonRatio: 0.1, distanceThreshold: 0.8 },
  ],
  aggressive: [
    { name: 'LOD0', polygonRatio: 1.0, distanceThreshold: 0.0, segmentCount: 8, bladeCount: 3 },
    { name: 'LOD1', polygonRatio: 0.6, distanceThreshold: 0.15, segmentCount: 6, bladeCount: 3 },
    { name: 'LOD2', polygonRatio: 0.25, distanceThreshold: 0.35, segmentCount: 4, bladeCount: 3 },
    { name: 'LOD3', polygonRatio: 0.08, distanceThreshold: 0.55, segmentCount: 4, bladeCount: 1, skipNacelle: true },
    {
      name: 'LOD4', polygonRatio: 0.02, distanceThreshold: 0.85, segmentCount: 3, bladeCount: 0,
      skipNacelle: true, skipBlades: true, useBillboard: true,
    },
  ],
  extreme: [
    { name: 'LOD0', polygonRatio: 1.0, distanceThreshold: 0.0, segmentCount: 6, bladeCount: 3 },
    { name: 'LOD1', polygonRatio: 0.4, distanceThreshold: 0.1, segmentCount: 4, bladeCount: 2 },
    { name: 'LOD2', polygonRatio: 0.15, distanceThreshold: 0.25, segmentCount: 4, bladeCount: 1, skipNacelle: true },
    { name: 'LOD3', polygonRatio: 0.05, distanceThreshold: 0.45, segmentCount: 3, bladeCount: 0, skipNacelle: true, skipBlades: true },
    {
      name: 'LOD4', polygonRatio: 0.01, distanceThreshold: 0.7, segmentCount: 3, bladeCount: 0,
      skipNacelle: true, skipBlades: true, useBillboard: true,
    },
  ],
};

export function isLodPresetName(value: unknown): value is LODPresetName {
  return value === 'standard' || value === 'aggressive' || value === 'extreme';
}
