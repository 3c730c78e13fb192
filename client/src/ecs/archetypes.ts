/**
 * Entity archetype factory functions.
 *
 * The turbine archetype is the only one; it is the canonical way to give a
 * feature its ECS columns.
 */

import type { World } from 'bitecs';
import { addEntity, addComponent } from 'bitecs';
import type { Feature } from '../types';
import { ensureCapacity, type FeatureComponents } from './components';

export type TurbineData = Omit<Feature, 'id' | 'eid'>;

export function addTurbineArchetype(world: World, c: FeatureComponents, eid: number, data: TurbineData): void {
  ensureCapacity(c, eid);
  addComponent(world, eid, c.IsTurbine);
  addComponent(world, eid, c.Position);
  addComponent(world, eid, c.Activation);
  addComponent(world, eid, c.Magnitude);
  addComponent(world, eid, c.Extent);
  addComponent(world, eid, c.LODState);
  addComponent(world, eid, c.Visible);

  c.Position.x[eid] = data.x;
  c.Position.y[eid] = data.baseHeight;
  c.Position.z[eid] = data.z;
  c.Activation.year[eid] = data.year;
  c.Magnitude.kw[eid] = data.magnitude;
  c.Extent.height[eid] = data.height;
  c.Extent.rotorRadius[eid] = data.rotorRadius;

  // Defaults
  c.LODState.tier[eid] = 0;
  c.LODState.distance[eid] = 0;
  c.Visible.value[eid] = 0;
}

/** Create a new turbine entity and return its eid. */
export function createTurbineEntity(world: World, c: FeatureComponents, data: TurbineData): number {
  const eid = addEntity(world);
  addTurbineArchetype(world, c, eid, data);
  return eid;
}
