import { describe, expect, it } from 'vitest';

import { ConfigurationError } from '../core/errors';
import { buildLevels } from '../lod/lodLevel';
import { LODManager, presetForFeatureCount } from '../lod/lodManager';
import { LOD_PRESETS, LOD_PRESET_NAMES, isLodPresetName } from '../lod/lodPresets';
import { ScreenSizeSelector } from '../lod/screenSizeSelector';

describe('LODManager', () => {
  it('selects the finest and coarsest aggressive tiers', () => {
    const lod = new LODManager('aggressive');
    expect(lod.getLodForDistance(0).polygonRatio).toBe(1.0);
    const far = lod.getLodForDistance(0.95);
    expect(far.polygonRatio).toBe(0.02);
    expect(far).toBe(lod.coarsest);
  });

  it('defaults to the aggressive preset', () => {
    const lod = new LODManager();
    expect(lod.preset).toBe('aggressive');
    expect(lod.tierCount).toBe(5);
    expect(lod.finest.name).toBe('LOD0');
    expect(lod.coarsest.name).toBe('LOD4');
  });

  it('applies a tier from its threshold onwards', () => {
    const lod = new LODManager('aggressive');
    expect(lod.getLodForDistance(0.1499).name).toBe('LOD0');
    expect(lod.getLodForDistance(0.15).name).toBe('LOD1');
    expect(lod.getLodForDistance(0.5).name).toBe('LOD2');
    expect(lod.getLodForDistance(0.55).name).toBe('LOD3');
  });

  it('clamps out-of-range and NaN distances', () => {
    const lod = new LODManager('aggressive');
    expect(lod.getLodForDistance(-1).name).toBe('LOD0');
    expect(lod.getLodForDistance(Number.NaN).name).toBe('LOD0');
    expect(lod.getLodForDistance(5).name).toBe('LOD4');
  });

  it('never increases the polygon ratio with distance', () => {
    for (const preset of LOD_PRESET_NAMES) {
      const lod = new LODManager(preset);
      let previous = Infinity;
      for (let step = 0; step <= 100; step++) {
        const ratio = lod.getLodForDistance(step / 100).polygonRatio;
        expect(ratio).toBeLessThanOrEqual(previous);
        previous = ratio;
      }
    }
    expect(new LODManager('standard').getLodForDistance(0).polygonRatio).toBe(1.0);
  });

  it('selects from squared distances', () => {
    const lod = new LODManager('aggressive');
    expect(lod.getLodForDistanceSquared(0.25).name).toBe('LOD2');
    expect(lod.getLodForDistanceSquared(4, 1).name).toBe('LOD4');
    expect(lod.getLodForDistanceSquared(1, 4).name).toBe('LOD2');
    expect(lod.getLodForDistanceSquared(0, 0).name).toBe('LOD0');
  });

  it('clamps tier lookups by ordinal', () => {
    const lod = new LODManager('aggressive');
    expect(lod.level(-3).name).toBe('LOD0');
    expect(lod.level(99).name).toBe('LOD4');
    expect(lod.level(1.7).name).toBe('LOD1');
  });

  it('freezes its tiers', () => {
    const lod = new LODManager('standard');
    expect(Object.isFrozen(lod.levels)).toBe(true);
    expect(Object.isFrozen(lod.levels[0])).toBe(true);
  });

  it('counts polygons per tier', () => {
    const lod = new LODManager('standard');
    expect(lod.polygonCount(500, 0)).toBe(500);
    expect(lod.polygonCount(500, 0.5)).toBe(250);
    expect(lod.polygonCount(500, 0.9)).toBe(50);
  });

  it('estimates savings over a set of distances', () => {
    const savings = new LODManager('standard').polygonSavings([0, 0.5, 0.9, 0.95], 100);
    expect(savings.basePolygons).toBe(400);
    expect(savings.lodPolygons).toBeCloseTo(170, 10);
    expect(savings.savingsPercent).toBeCloseTo(57.5, 10);
    expect(savings.distribution).toEqual({ LOD0: 1, LOD1: 1, LOD2: 2 });

    const empty = new LODManager('standard').polygonSavings([]);
    expect(empty).toEqual({ basePolygons: 0, lodPolygons: 0, savingsPercent: 0, distribution: {} });
  });

  it('describes its tiers', () => {
    expect(new LODManager('aggressive').describe()).toBe([
      'LOD configuration (aggressive):',
      '  LOD0: 100.0% @ dist=0.00 (seg=8, blades=3)',
      '  LOD1:  60.0% @ dist=0.15 (seg=6, blades=3)',
      '  LOD2:  25.0% @ dist=0.35 (seg=4, blades=3)',
      '  LOD3:   8.0% @ dist=0.55 (seg=4, blades=1) [no-nacelle]',
      '  LOD4:   2.0% @ dist=0.85 (seg=3, blades=0) [no-nacelle, no-blades, billboard]',
    ].join('\n'));
  });

  it('summarizes a preset', () => {
    const summary = new LODManager('standard').summary();
    expect(summary.preset).toBe('standard');
    expect(summary.levels).toHaveLength(3);
    expect(summary.levels[2]).toEqual({
      name: 'LOD2', polygonRatio: 0.1, distanceThreshold: 0.8, segmentCount: 8, bladeCount: 3, flags: [],
    });
  });

  it('labels custom tables', () => {
    const lod = new LODManager([{ polygonRatio: 1, distanceThreshold: 0 }, { polygonRatio: 0.3, distanceThreshold: 0.5 }]);
    expect(lod.preset).toBe('custom');
    expect(lod.levels.map((l) => l.name)).toEqual(['LOD0', 'LOD1']);
  });

  it('reports invalid tables through tryCreate', () => {
    expect(LODManager.tryCreate('standard').ok).toBe(true);
    const result = LODManager.tryCreate([]);
    if (result.ok) throw new Error('expected an error result');
    expect(result.error.field).toBe('levels');
  });

  it('selects coarser tiers for smaller projected sizes', () => {
    const aggressive = new LODManager('aggressive');
    expect(aggressive.selectByScreenSize(0.1, 1).name).toBe('LOD0');
    expect(aggressive.selectByScreenSize(0.1, 100).name).toBe('LOD4');
    expect(new LODManager('standard').selectByScreenSize(0.1, 100).name).toBe('LOD2');
  });
});

describe('buildLevels', () => {
  it('sorts tiers by threshold and assigns ordinals', () => {
    const levels = buildLevels([
      { name: 'far', polygonRatio: 0.1, distanceThreshold: 0.8 },
      { name: 'near', polygonRatio: 1, distanceThreshold: 0 },
    ]);
    expect(levels.map((l) => [l.name, l.ordinal])).toEqual([['near', 0], ['far', 1]]);
    expect(levels[0]?.segmentCount).toBe(8);
    expect(levels[0]?.bladeCount).toBe(3);
  });

  it('rejects invalid tiers', () => {
    expect(() => buildLevels([])).toThrow('levels: at least one tier is required');
    expect(() => buildLevels([{ name: 'bad', polygonRatio: 1.5, distanceThreshold: 0 }]))
      .toThrow('bad: polygonRatio must be within [0, 1], got 1.5');
    expect(() => buildLevels([{ polygonRatio: 1, distanceThreshold: -0.1 }])).toThrow(ConfigurationError);
    expect(() => buildLevels([{ polygonRatio: 1, distanceThreshold: 0, segmentCount: 2 }])).toThrow(ConfigurationError);
    expect(() => buildLevels([{ polygonRatio: 1, distanceThreshold: 0, bladeCount: 4 }])).toThrow(ConfigurationError);
  });

  it('rejects duplicate names and thresholds', () => {
    expect(() => buildLevels([
      { name: 'a', polygonRatio: 1, distanceThreshold: 0 },
      { name: 'a', polygonRatio: 0.5, distanceThreshold: 0.5 },
    ])).toThrow('a: tier names must be unique');
    expect(() => buildLevels([
      { polygonRatio: 1, distanceThreshold: 0.5 },
      { polygonRatio: 0.5, distanceThreshold: 0.5 },
    ])).toThrow(ConfigurationError);
  });

  it('enforces monotonic ratios unless disabled', () => {
    const specs = [
      { polygonRatio: 1, distanceThreshold: 0 },
      { polygonRatio: 0.2, distanceThreshold: 0.3 },
      { polygonRatio: 0.5, distanceThreshold: 0.6 },
    ];
    expect(() => buildLevels(specs)).toThrow('LOD2: polygonRatio 0.5 exceeds the nearer tier LOD1 (0.2)');
    expect(buildLevels(specs, { enforceMonotonicRatios: false })).toHaveLength(3);
  });
});

describe('LOD presets', () => {
  it('ships three valid presets', () => {
    expect(LOD_PRESET_NAMES).toEqual(['standard', 'aggressive', 'extreme']);
    for (const name of LOD_PRESET_NAMES) {
      expect(() => buildLevels(LOD_PRESETS[name])).not.toThrow();
    }
    expect(isLodPresetName('extreme')).toBe(true);
    expect(isLodPresetName('ultra')).toBe(false);
  });

  it('picks coarser presets for denser fields', () => {
    expect(presetForFeatureCount(0)).toBe('standard');
    expect(presetForFeatureCount(10_000)).toBe('standard');
    expect(presetForFeatureCount(10_001)).toBe('aggressive');
    expect(presetForFeatureCount(25_001)).toBe('extreme');
  });
});

describe('ScreenSizeSelector', () => {
  it('projects heights onto the viewport', () => {
    const selector = new ScreenSizeSelector(1080, 45);
    const factor = 1080 / (2 * Math.tan(Math.PI / 8));
    expect(selector.screenSize(0.1, 2)).toBeCloseTo((0.1 * factor) / 2, 10);
    expect(selector.screenSize(0.1, 0.0005)).toBe(Infinity);
  });

  it('adds one tier per pixel threshold the size falls below', () => {
    const selector = new ScreenSizeSelector(1080, 45);
    expect(selector.targetOrdinal(0.1, 1)).toBe(0);
    expect(selector.targetOrdinal(0.1, 2)).toBe(1);
    expect(selector.targetOrdinal(0.1, 10)).toBe(3);
    expect(selector.targetOrdinal(0.1, 100)).toBe(4);
    expect(selector.targetOrdinal(0.1, 0)).toBe(0);
  });
});
