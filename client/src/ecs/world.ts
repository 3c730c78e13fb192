/**
 * ECS world factory.
 *
 * Each FeatureStore owns one bitECS world and its own component columns,
 * so two fields never share entity ids.
 */

import { createWorld } from 'bitecs';
import type { World } from 'bitecs';

/** Initial column length; columns grow by doubling when an eid outruns them. */
export const INITIAL_ENTITY_CAPACITY = 1024;

export function createFeatureWorld(): World {
  return createWorld();
}
