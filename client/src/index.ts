/**
 * Public surface of the wind-turbine culling engine.
 */

export * from './types';
export * from './config';

export { ConfigurationError, IndexNotBuiltError, IndexStaleError, WindfieldError, isWindfieldError } from './core/errors';
export type { WindfieldErrorCode } from './core/errors';
export { createLogger, getLogLevel, setLogLevel, setLogSink, consoleSink, isLogLevel } from './core/logger';
export type { LogFields, LogLevel, LogRecord, LogSink, Logger } from './core/logger';
export { EventBus } from './core/eventBus';
export type { FieldEventMap } from './core/eventBus';
export { PerfMonitor } from './core/perfMonitor';
export type { PerfMonitorOptions, PerfSnapshot } from './core/perfMonitor';
export { QUALITY_PRESETS, QUALITY_PRESET_ORDER, QualityPresetManager, isQualityPreset } from './core/qualityManager';
export type { QualityManagerOptions } from './core/qualityManager';
export { POWER_BANDS, powerBand, powerColorRGB } from './core/powerColors';
export type { PowerBand, PowerClass } from './core/powerColors';

export { BoundingBox } from './spatial/boundingBox';
export { DEFAULT_MAP_BOUNDS, Quadtree, QuadtreeNode, buildSpatialIndex } from './spatial/quadtree';
export type { QuadtreeOptions, QuadtreeStats } from './spatial/quadtree';
export { SpatialGrid } from './spatial/spatialGrid';
export type { SpatialGridOptions, SpatialGridStats } from './spatial/spatialGrid';
export type { SpatialIndex, SpatialIndexKind } from './spatial/spatialIndex';

export { Plane } from './culling/plane';
export { DEFAULT_CAMERA_LIMITS, DEFAULT_CAMERA_POSE, cameraEye, clampPose, toPerspectiveCamera } from './culling/camera';
export type { CameraLimits } from './culling/camera';
export { FRUSTUM_PLANE_ORDER, ViewFrustum, updateCamera } from './culling/viewFrustum';
export type { FromCameraOptions, FrustumPlaneName, GroundFootprint } from './culling/viewFrustum';
export { FrustumCuller, featureSphere } from './culling/frustumCuller';
export type { BoundingSphere } from './culling/frustumCuller';

export { buildLevels } from './lod/lodLevel';
export type { LODLevel, LODLevelSpec } from './lod/lodLevel';
export { LOD_PRESETS, LOD_PRESET_NAMES, isLodPresetName } from './lod/lodPresets';
export { LODManager, presetForFeatureCount } from './lod/lodManager';
export type { LODManagerOptions, LODSummary, PolygonSavings } from './lod/lodManager';
export { ScreenSizeSelector } from './lod/screenSizeSelector';

export { YearIndex, buildYearIndex } from './temporal/yearIndex';
export type { YearIndexOptions } from './temporal/yearIndex';
export { YearTimeline } from './temporal/yearTimeline';
export type { YearTimelineOptions } from './temporal/yearTimeline';

export * from './ecs';

export { TurbineField } from './field/turbineField';
export type { TurbineFieldOptions } from './field/turbineField';
