/**
 * ECS public API.
 *
 * Re-exports the feature store, its columns and the culling pipeline.
 */

export { createFeatureWorld, INITIAL_ENTITY_CAPACITY } from './world';
export { runPipeline } from './pipeline';

// Components
export { createFeatureComponents, ensureCapacity, componentCapacity } from './components';
export type { FeatureComponents } from './components';

// Archetypes
export { addTurbineArchetype, createTurbineEntity } from './archetypes';
export type { TurbineData } from './archetypes';

// Store
export { FeatureStore, resolveFeatureInput } from './featureStore';

// Frame
export { DEFAULT_PIPELINE_SETTINGS, resolvePipelineSettings } from './frame';
export type { FrameResult, PipelineOptions, PipelineSettings, TierAssignment, TierBatch } from './frame';

// Instance buffers
export { INSTANCE_STRIDE, TIER_SCALES, packTierInstances, tierScale } from './instanceBatches';
export type { InstanceBatch } from './instanceBatches';
