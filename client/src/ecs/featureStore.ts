/**
 * Arena of features plus the bitECS world carrying their per-frame columns.
 *
 * Features are appended and never removed one at a time; replaceAll() swaps
 * the whole set. Every structural change bumps `revision`, which indices
 * record at build time to detect staleness.
 */

import type { World } from 'bitecs';
import { query, removeEntity } from 'bitecs';

import {
  DEFAULT_BASE_HEIGHT, DEFAULT_FEATURE_HEIGHT, DEFAULT_FEATURE_MAGNITUDE_KW,
  DEFAULT_FEATURE_YEAR, DEFAULT_ROTOR_RADIUS,
} from '../config';
import { createLogger } from '../core/logger';
import type { Feature, FeatureInput } from '../types';
import { createTurbineEntity, type TurbineData } from './archetypes';
import { createFeatureComponents, type FeatureComponents } from './components';
import { createFeatureWorld } from './world';

const log = createLogger('FeatureStore');

/** Fill in every optional field of an importer record. */
export function resolveFeatureInput(input: FeatureInput): TurbineData {
  return {
    x: input.x,
    z: input.z,
    year: input.year ?? DEFAULT_FEATURE_YEAR,
    magnitude: input.magnitude ?? DEFAULT_FEATURE_MAGNITUDE_KW,
    height: input.height ?? DEFAULT_FEATURE_HEIGHT,
    rotorRadius: input.rotorRadius ?? DEFAULT_ROTOR_RADIUS,
    baseHeight: input.baseHeight ?? DEFAULT_BASE_HEIGHT,
  };
}

export class FeatureStore {
  readonly world: World;
  readonly components: FeatureComponents;
  private items: Feature[] = [];
  private rev = 0;

  constructor(initialCapacity?: number) {
    this.world = createFeatureWorld();
    this.components = createFeatureComponents(initialCapacity);
  }

  get features(): readonly Feature[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  /** Bumped on every add or replace. */
  get revision(): number {
    return this.rev;
  }

  get(id: number): Feature | undefined {
    return this.items[id];
  }

  add(input: FeatureInput): Feature {
    const feature = this.append(input);
    this.rev++;
    return feature;
  }

  /** Append a batch under a single revision bump. */
  addMany(inputs: Iterable<FeatureInput>): Feature[] {
    const added: Feature[] = [];
    for (const input of inputs) added.push(this.append(input));
    if (added.length > 0) {
      this.rev++;
      log.debug('added features', { added: added.length, total: this.items.length });
    }
    return added;
  }

  /** Drop every feature and its entity, then load `inputs`. */
  replaceAll(inputs: Iterable<FeatureInput>): Feature[] {
    for (const feature of this.items) removeEntity(this.world, feature.eid);
    this.items = [];
    const added: Feature[] = [];
    for (const input of inputs) added.push(this.append(input));
    this.rev++;
    log.info('replaced feature set', { total: added.length });
    return added;
  }

  tierOrdinal(feature: Feature): number {
    return this.components.LODState.tier[feature.eid] ?? 0;
  }

  distanceOf(feature: Feature): number {
    return this.components.LODState.distance[feature.eid] ?? 0;
  }

  isVisible(feature: Feature): boolean {
    return this.components.Visible.value[feature.eid] === 1;
  }

  /** Record one frame's outcome for a feature that survived culling. */
  markVisible(feature: Feature, tierOrdinal: number, distance: number): void {
    const { LODState, Visible } = this.components;
    LODState.tier[feature.eid] = tierOrdinal;
    LODState.distance[feature.eid] = distance;
    Visible.value[feature.eid] = 1;
  }

  /** Clear the visibility column of every turbine ahead of a new frame. */
  clearVisibility(): void {
    const { IsTurbine, Visible } = this.components;
    for (const eid of query(this.world, [IsTurbine, Visible])) {
      Visible.value[eid] = 0;
    }
  }

  private append(input: FeatureInput): Feature {
    const data = resolveFeatureInput(input);
    const eid = createTurbineEntity(this.world, this.components, data);
    const feature: Feature = Object.freeze({ id: this.items.length, eid, ...data });
    this.items.push(feature);
    return feature;
  }
}
