/**
 * Global constants for the Windfield turbine viewer.
 * All magic numbers live here, nowhere else.
 */

// ── Map Bounds ──────────────────────────────────────────────────
// Normalized map space the importer projects the country into.
export const APP_NAME = 'Windfield';
export const MAP_X_MIN = -1.6;
export const MAP_X_MAX = 1.6;
export const MAP_Z_MIN = -1.9;
export const MAP_Z_MAX = 1.9;

// ── Spatial Index ───────────────────────────────────────────────
export const QUADTREE_LEAF_CAPACITY = 8;
export const QUADTREE_MAX_DEPTH = 10;
export const GRID_CELL_SIZE = 0.2;

// ── Pipeline ────────────────────────────────────────────────────
export const PREFILTER_THRESHOLD = 1000;
export const PREFILTER_MARGIN = 0.25;
export const MAX_LOD_DISTANCE = 4.0;
export const BOUNDING_SPHERE_SCALE = 1.2;

// ── Features ────────────────────────────────────────────────────
export const DEFAULT_FEATURE_YEAR = 2000;
export const DEFAULT_FEATURE_MAGNITUDE_KW = 3000;
export const DEFAULT_FEATURE_HEIGHT = 0.08;
export const DEFAULT_ROTOR_RADIUS = 0.04;
export const DEFAULT_BASE_HEIGHT = 0.18;
export const BASE_POLYGON_COUNT = 500;

// ── LOD ─────────────────────────────────────────────────────────
export const AGGRESSIVE_LOD_FEATURE_COUNT = 10_000;
export const EXTREME_LOD_FEATURE_COUNT = 25_000;
/** Projected pixel heights separating screen-size tiers, finest first. */
export const SCREEN_SIZE_PIXEL_THRESHOLDS = [100, 50, 25, 10] as const;
export const MIN_SCREEN_DISTANCE = 0.001;

// ── Camera ──────────────────────────────────────────────────────
export const DEFAULT_ROT_X = 45;
export const DEFAULT_ROT_Y = 25;
export const DEFAULT_ZOOM = 3.8;
export const MIN_ZOOM = 1.5;
export const MAX_ZOOM = 6.0;
export const MIN_ROT_X = 10;
export const MAX_ROT_X = 80;
export const CAMERA_FOV = 45;
export const CAMERA_ASPECT = 16 / 9;
export const NEAR_CLIP = 0.1;
export const FAR_CLIP = 100;

// ── Timeline ────────────────────────────────────────────────────
export const START_YEAR = 1990;
export const END_YEAR = 2025;
export const YEAR_STEP = 5;
export const SECONDS_PER_STEP = 5.0;

// ── Rendering ───────────────────────────────────────────────────
export const TARGET_FPS = 60;
export const FRAME_BUDGET_MS = 1000 / TARGET_FPS; // 16.67ms
export const SCREEN_HEIGHT = 1080;

// ── Runtime Config Loading ─────────────────────────────────────
export interface WindfieldRuntimeConfig {
  appName: string;
  mapXMin: number;
  mapXMax: number;
  mapZMin: number;
  mapZMax: number;
  leafCapacity: number;
  maxDepth: number;
  gridCellSize: number;
  prefilterThreshold: number;
  prefilterMargin: number;
  maxLodDistance: number;
  sphereScale: number;
  targetFps: number;
  frameBudgetMs: number;
  minZoom: number;
  maxZoom: number;
  nearClip: number;
  farClip: number;
}

export interface ConfigValidationResult {
  valid: boolean;
  config: WindfieldRuntimeConfig;
  errors: string[];
}

export const DEFAULT_RUNTIME_CONFIG: Readonly<WindfieldRuntimeConfig> = {
  appName: APP_NAME,
  mapXMin: MAP_X_MIN,
  mapXMax: MAP_X_MAX,
  mapZMin: MAP_Z_MIN,
  mapZMax: MAP_Z_MAX,
  leafCapacity: QUADTREE_LEAF_CAPACITY,
  maxDepth: QUADTREE_MAX_DEPTH,
  gridCellSize: GRID_CELL_SIZE,
  prefilterThreshold: PREFILTER_THRESHOLD,
  prefilterMargin: PREFILTER_MARGIN,
  maxLodDistance: MAX_LOD_DISTANCE,
  sphereScale: BOUNDING_SPHERE_SCALE,
  targetFps: TARGET_FPS,
  frameBudgetMs: FRAME_BUDGET_MS,
  minZoom: MIN_ZOOM,
  maxZoom: MAX_ZOOM,
  nearClip: NEAR_CLIP,
  farClip: FAR_CLIP,
};

const INTEGER_FIELDS = ['leafCapacity', 'targetFps'] as const;

const POSITIVE_NUMBER_FIELDS = [
  'gridCellSize',
  'maxLodDistance',
  'sphereScale',
  'minZoom',
  'maxZoom',
  'nearClip',
  'farClip',
] as const;

const FINITE_FIELDS = [
  'mapXMin',
  'mapXMax',
  'mapZMin',
  'mapZMax',
  'prefilterMargin',
] as const;

function isPositiveInt(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
    errors.push(`${field} must be greater than 0`);
    return false;
  }
  if (!Number.isFinite(value)) {
    errors.push(`${field} must be finite`);
    return false;
  }
  if (!Number.isInteger(value)) {
    errors.push(`${field} must be an integer`);
    return false;
  }
  return true;
}

function isPositiveNumber(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
    errors.push(`${field} must be greater than 0`);
    return false;
  }
  if (!Number.isFinite(value)) {
    errors.push(`${field} must be finite`);
    return false;
  }
  return true;
}

function isFiniteNumber(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    errors.push(`${field} must be a finite number`);
    return false;
  }
  return true;
}

/**
 * Merge defaults with overrides and validate resulting runtime config.
 */
export function validateAndLoadConfig(
  overrides: Partial<WindfieldRuntimeConfig> = {},
): ConfigValidationResult {
  const config: WindfieldRuntimeConfig = { ...DEFAULT_RUNTIME_CONFIG, ...overrides };
  config.frameBudgetMs = 1000 / config.targetFps;
  const errors: string[] = [];

  for (const field of INTEGER_FIELDS) {
    isPositiveInt(config[field], field, errors);
  }

  for (const field of POSITIVE_NUMBER_FIELDS) {
    isPositiveNumber(config[field], field, errors);
  }

  for (const field of FINITE_FIELDS) {
    isFiniteNumber(config[field], field, errors);
  }

  if (!Number.isInteger(config.maxDepth) || config.maxDepth < 0) {
    errors.push('maxDepth must be a non-negative integer');
  }

  if (!Number.isInteger(config.prefilterThreshold) || config.prefilterThreshold < 0) {
    errors.push('prefilterThreshold must be a non-negative integer');
  }

  if (typeof config.appName !== 'string' || config.appName.trim().length === 0) {
    errors.push('appName must be a non-empty string');
  }

  if (config.mapXMin >= config.mapXMax) {
    errors.push(`mapXMin (${config.mapXMin}) must be smaller than mapXMax (${config.mapXMax})`);
  }

  if (config.mapZMin >= config.mapZMax) {
    errors.push(`mapZMin (${config.mapZMin}) must be smaller than mapZMax (${config.mapZMax})`);
  }

  if (config.minZoom >= config.maxZoom) {
    errors.push(`minZoom (${config.minZoom}) must be smaller than maxZoom (${config.maxZoom})`);
  }

  if (config.nearClip >= config.farClip) {
    errors.push(`nearClip (${config.nearClip}) must be smaller than farClip (${config.farClip})`);
  }

  return {
    valid: errors.length === 0,
    config,
    errors,
  };
}
