/**
 * TurbineField: the coordinator a viewer talks to.
 *
 * Owns the feature store, the spatial and year indices, the LOD manager and
 * the current frustum, and runs the culling pipeline once per rendered
 * frame. Index rebuilds assemble the new structure before swapping it in,
 * so a frame never sees a half-built index.
 */

import type * as THREE from 'three';

import { validateAndLoadConfig, type WindfieldRuntimeConfig } from '../config';
import { ConfigurationError } from '../core/errors';
import { EventBus, type FieldEventMap } from '../core/eventBus';
import { createLogger } from '../core/logger';
import { PerfMonitor } from '../core/perfMonitor';
import type { QualityPresetManager } from '../core/qualityManager';
import { DEFAULT_CAMERA_LIMITS, clampPose } from '../culling/camera';
import { ViewFrustum, type FromCameraOptions } from '../culling/viewFrustum';
import { FeatureStore } from '../ecs/featureStore';
import type { FrameResult, TierBatch } from '../ecs/frame';
import { packTierInstances, type InstanceBatch } from '../ecs/instanceBatches';
import { runPipeline } from '../ecs/pipeline';
import { LODManager, presetForFeatureCount, type LODManagerOptions } from '../lod/lodManager';
import { BoundingBox } from '../spatial/boundingBox';
import { Quadtree } from '../spatial/quadtree';
import { SpatialGrid } from '../spatial/spatialGrid';
import type { SpatialIndex, SpatialIndexKind } from '../spatial/spatialIndex';
import { YearIndex } from '../temporal/yearIndex';
import type { CameraPose, DegradedStage, Feature, FeatureInput, FrameStats, LODPresetName } from '../types';

const log = createLogger('Field');

export interface TurbineFieldOptions {
  config?: Partial<WindfieldRuntimeConfig>;
  /** `auto` picks a preset from the feature count at every buildIndices(). */
  lodPreset?: LODPresetName | 'auto';
  lodOptions?: LODManagerOptions;
  spatialIndex?: SpatialIndexKind;
  verticalPlanes?: FromCameraOptions['verticalPlanes'];
  /** Rebuild a stale spatial index before rendering instead of skipping the prefilter. */
  autoRebuild?: boolean;
  /** When given, its current preset drives LOD preset, prefilter threshold and LOD range. */
  quality?: QualityPresetManager;
  perfMonitor?: PerfMonitor;
}

function sameStages(a: readonly DegradedStage[], b: readonly DegradedStage[]): boolean {
  return a.length === b.length && a.every((stage, i) => stage === b[i]);
}

export class TurbineField {
  readonly events = new EventBus<FieldEventMap>();
  readonly store = new FeatureStore();
  readonly config: Readonly<WindfieldRuntimeConfig>;
  readonly perf: PerfMonitor;
  private readonly quality: QualityPresetManager | null;
  private readonly lodSelection: LODPresetName | 'auto';
  private readonly lodOptions: LODManagerOptions;
  private readonly indexKind: SpatialIndexKind;
  private readonly verticalPlanes: FromCameraOptions['verticalPlanes'];
  private readonly autoRebuild: boolean;
  private spatial: SpatialIndex<Feature>;
  private readonly years: YearIndex<Feature>;
  private lod: LODManager;
  private frustum = ViewFrustum.permissive();
  private lastStats: FrameStats | null = null;
  private lastDegraded: DegradedStage[] = [];

  constructor(options: TurbineFieldOptions = {}) {
    const { valid, config, errors } = validateAndLoadConfig(options.config);
    if (!valid) {
      throw new ConfigurationError('config', errors.join('; '));
    }
    this.config = config;
    this.quality = options.quality ?? null;
    this.lodSelection = options.lodPreset ?? 'auto';
    this.lodOptions = options.lodOptions ?? {};
    this.indexKind = options.spatialIndex ?? 'quadtree';
    this.verticalPlanes = options.verticalPlanes ?? 'permissive';
    this.autoRebuild = options.autoRebuild ?? false;
    this.perf = options.perfMonitor ?? new PerfMonitor({ budgetMs: config.frameBudgetMs });

    this.spatial = this.createSpatialIndex();
    this.years = new YearIndex<Feature>({
      source: () => this.store.features,
      magnitude: (feature) => feature.magnitude,
    });
    this.lod = new LODManager(this.initialPreset(), this.lodOptions);
  }

  // ── Features ──────────────────────────────────────────────────

  get size(): number {
    return this.store.size;
  }

  get features(): readonly Feature[] {
    return this.store.features;
  }

  addTurbine(input: FeatureInput): Feature {
    const feature = this.store.add(input);
    this.onFeaturesChanged();
    return feature;
  }

  addTurbines(inputs: Iterable<FeatureInput>): Feature[] {
    const added = this.store.addMany(inputs);
    if (added.length > 0) this.onFeaturesChanged();
    return added;
  }

  /** Swap the whole feature set. Indices go stale until rebuilt. */
  replaceTurbines(inputs: Iterable<FeatureInput>): Feature[] {
    const added = this.store.replaceAll(inputs);
    this.onFeaturesChanged();
    return added;
  }

  private onFeaturesChanged(): void {
    this.years.invalidate();
    this.events.emit('features_changed', { count: this.store.size, revision: this.store.revision });
  }

  // ── Indices ───────────────────────────────────────────────────

  get spatialIndex(): SpatialIndex<Feature> {
    return this.spatial;
  }

  get yearIndex(): YearIndex<Feature> {
    return this.years;
  }

  get isSpatialIndexStale(): boolean {
    return !this.spatial.isBuilt || this.spatial.sourceRevision !== this.store.revision;
  }

  /** Build a fresh spatial index from the current features and swap it in. */
  buildSpatialIndex(): SpatialIndex<Feature> {
    const next = this.createSpatialIndex();
    next.build(this.store.features, this.store.revision);
    this.spatial = next;
    return next;
  }

  buildYearIndex(): YearIndex<Feature> {
    this.years.build();
    return this.years;
  }

  /**
   * Rebuild both indices and, with an automatic preset, re-pick the LOD
   * preset for the new feature count.
   */
  buildIndices(): void {
    const start = performance.now();
    this.buildSpatialIndex();
    this.buildYearIndex();
    if (this.lodSelection === 'auto' && !this.quality) {
      this.setLodPreset(presetForFeatureCount(this.store.size));
    }
    const buildTimeMs = performance.now() - start;
    log.info('indices rebuilt', { features: this.store.size, kind: this.indexKind, buildTimeMs });
    this.events.emit('indices_rebuilt', {
      revision: this.store.revision,
      features: this.store.size,
      buildTimeMs,
    });
  }

  private createSpatialIndex(): SpatialIndex<Feature> {
    const { mapXMin, mapXMax, mapZMin, mapZMax } = this.config;
    const bounds = new BoundingBox(mapXMin, mapXMax, mapZMin, mapZMax);
    if (this.indexKind === 'grid') {
      return new SpatialGrid<Feature>({ bounds, cellSize: this.config.gridCellSize });
    }
    return new Quadtree<Feature>({
      bounds,
      leafCapacity: this.config.leafCapacity,
      maxDepth: this.config.maxDepth,
    });
  }

  // ── Temporal queries ──────────────────────────────────────────

  countUntil(year: number): number {
    return this.years.countUntil(year);
  }

  getUntil(year: number): Feature[] {
    return this.years.getUntil(year);
  }

  /** Installed capacity in MW of everything commissioned by `year`. */
  installedMegawattsUntil(year: number): number {
    return this.years.magnitudeUntil(year) / 1000;
  }

  // ── LOD ───────────────────────────────────────────────────────

  get lodManager(): LODManager {
    return this.lod;
  }

  /** Returns true when the preset actually changed. */
  setLodPreset(preset: LODPresetName): boolean {
    const from = this.lod.preset;
    if (from === preset) return false;
    this.lod = new LODManager(preset, this.lodOptions);
    if (from !== 'custom') this.events.emit('lod_preset_changed', { from, to: preset });
    log.info('LOD preset', { preset });
    return true;
  }

  private initialPreset(): LODPresetName {
    if (this.quality) return this.quality.currentConfig.lodPreset;
    return this.lodSelection === 'auto' ? 'standard' : this.lodSelection;
  }

  // ── Camera ────────────────────────────────────────────────────

  get currentFrustum(): ViewFrustum {
    return this.frustum;
  }

  /** Zoom and elevation are clamped to the configured limits. */
  updateCamera(pose: CameraPose): ViewFrustum {
    const clamped = clampPose(pose, {
      ...DEFAULT_CAMERA_LIMITS,
      minZoom: this.config.minZoom,
      maxZoom: this.config.maxZoom,
    });
    this.frustum = ViewFrustum.fromCamera(clamped, { verticalPlanes: this.verticalPlanes });
    return this.frustum;
  }

  updateCameraFromMatrices(projection: THREE.Matrix4, modelView: THREE.Matrix4): ViewFrustum {
    this.frustum = ViewFrustum.fromMatrices(projection, modelView);
    return this.frustum;
  }

  // ── Frames ────────────────────────────────────────────────────

  /** Run the pipeline for `year` against the current camera. */
  renderFrame(year: number): TierBatch[] {
    return this.runFrame(year).batches;
  }

  runFrame(year: number): FrameResult {
    if (this.autoRebuild && this.isSpatialIndexStale) {
      this.buildSpatialIndex();
    }

    const qualityConfig = this.quality?.currentConfig;
    const result = runPipeline(year, this.frustum, this.spatial, this.years, this.lod, {
      prefilterThreshold: qualityConfig?.prefilterThreshold ?? this.config.prefilterThreshold,
      prefilterMargin: this.config.prefilterMargin,
      maxLodDistance: this.config.maxLodDistance * (qualityConfig?.lodDistanceScale ?? 1),
      sphereScale: this.config.sphereScale,
      expectedRevision: this.store.revision,
      store: this.store,
    });

    this.lastStats = result.stats;
    this.reportDegraded(result.stats);
    this.trackPerformance(result.stats);
    this.events.emit('frame_rendered', result.stats);
    return result;
  }

  /** Counters of the most recent frame, or null before the first one. */
  getFrameStats(): FrameStats | null {
    return this.lastStats;
  }

  instanceBatch(tierOrdinal: number, target?: Float32Array): InstanceBatch {
    return packTierInstances(this.store, tierOrdinal, target);
  }

  private reportDegraded(stats: FrameStats): void {
    if (sameStages(stats.degraded, this.lastDegraded)) return;
    this.lastDegraded = [...stats.degraded];
    if (stats.degraded.length > 0) {
      log.warn('pipeline running degraded', { year: stats.year, stages: stats.degraded });
    }
    this.events.emit('stage_degraded', { year: stats.year, stages: [...stats.degraded] });
  }

  private trackPerformance(stats: FrameStats): void {
    this.perf.featuresTotal = stats.total;
    this.perf.featuresVisible = stats.visible;
    this.perf.record(stats.frameTimeMs);

    const quality = this.quality;
    if (!quality) return;
    const from = quality.currentPreset;
    const to = quality.updateFromSnapshot(this.perf.snapshot());
    if (to !== from) {
      this.events.emit('quality_changed', { from, to });
      this.setLodPreset(quality.currentConfig.lodPreset);
    }
  }
}
