import { FRAME_BUDGET_MS, PREFILTER_THRESHOLD } from '../config';
import { createLogger } from './logger';
import type { PerfSnapshot } from './perfMonitor';
import type { QualityPreset, QualityPresetConfig } from '../types';

const log = createLogger('Quality');

const DEFAULT_AUTO_DOWNGRADE_FRAMES = 10;
const DEFAULT_AUTO_UPGRADE_FRAMES = 30;
const DEFAULT_AUTO_SWITCH_COOLDOWN_MS = 1500;

export const QUALITY_PRESET_ORDER: QualityPreset[] = ['high', 'medium', 'low', 'minimal'];

export const QUALITY_PRESETS: Record<QualityPreset, QualityPresetConfig> = {
  high: {
    preset: 'high',
    label: 'High',
    targetFps: 60,
    lodPreset: 'standard',
    prefilterThreshold: PREFILTER_THRESHOLD,
    lodDistanceScale: 1,
  },
  medium: {
    preset: 'medium',
    label: 'Medium',
    targetFps: 60,
    lodPreset: 'aggressive',
    prefilterThreshold: PREFILTER_THRESHOLD,
    lodDistanceScale: 0.75,
  },
  low: {
    preset: 'low',
    label: 'Low',
    targetFps: 45,
    lodPreset: 'aggressive',
    prefilterThreshold: 500,
    lodDistanceScale: 0.5,
  },
  minimal: {
    preset: 'minimal',
    label: 'Minimal',
    targetFps: 30,
    lodPreset: 'extreme',
    prefilterThreshold: 250,
    lodDistanceScale: 0.35,
  },
};

export function isQualityPreset(value: unknown): value is QualityPreset {
  return value === 'high' || value === 'medium' || value === 'low' || value === 'minimal';
}

export interface QualityManagerOptions {
  initialPreset?: QualityPreset;
  autoDowngradeFrames?: number;
  autoUpgradeFrames?: number;
  autoSwitchCooldownMs?: number;
  now?: () => number;
}

export class QualityPresetManager {
  private preset: QualityPreset;
  private overBudgetFrameCount = 0;
  private underBudgetFrameCount = 0;
  private lastAutoSwitchAt = -Infinity;
  private readonly autoDowngradeFrames: number;
  private readonly autoUpgradeFrames: number;
  private readonly autoSwitchCooldownMs: number;
  private readonly now: () => number;

  constructor(options: QualityManagerOptions = {}) {
    this.autoDowngradeFrames = options.autoDowngradeFrames ?? DEFAULT_AUTO_DOWNGRADE_FRAMES;
    this.autoUpgradeFrames = options.autoUpgradeFrames ?? DEFAULT_AUTO_UPGRADE_FRAMES;
    this.autoSwitchCooldownMs = options.autoSwitchCooldownMs ?? DEFAULT_AUTO_SWITCH_COOLDOWN_MS;
    this.now = options.now ?? (() => Date.now());
    this.preset = options.initialPreset ?? 'high';
  }

  get currentPreset(): QualityPreset {
    return this.preset;
  }

  get currentConfig(): QualityPresetConfig {
    return QUALITY_PRESETS[this.preset];
  }

  setPreset(preset: QualityPreset): boolean {
    if (preset === this.preset) {
      return false;
    }
    log.info('preset changed', { from: this.preset, to: preset });
    this.preset = preset;
    this.overBudgetFrameCount = 0;
    this.underBudgetFrameCount = 0;
    return true;
  }

  private presetIndex(preset: QualityPreset = this.preset): number {
    return QUALITY_PRESET_ORDER.indexOf(preset);
  }

  private canStepDown(): boolean {
    return this.presetIndex(this.preset) < QUALITY_PRESET_ORDER.length - 1;
  }

  private canStepUp(): boolean {
    return this.presetIndex(this.preset) > 0;
  }

  private step(offset: 1 | -1): void {
    const next = QUALITY_PRESET_ORDER[this.presetIndex(this.preset) + offset];
    if (next) {
      this.setPreset(next);
      this.lastAutoSwitchAt = this.now();
    }
  }

  private canAutoSwitch(nowMs: number): boolean {
    return nowMs - this.lastAutoSwitchAt >= this.autoSwitchCooldownMs;
  }

  updateFromSnapshot(snapshot: PerfSnapshot): QualityPreset {
    if (snapshot.frameTimeMs <= 0) {
      return this.preset;
    }

    if (snapshot.overBudget || snapshot.fps < this.currentConfig.targetFps * 0.85) {
      this.overBudgetFrameCount += 1;
      this.underBudgetFrameCount = 0;
    } else {
      this.underBudgetFrameCount += 1;
      this.overBudgetFrameCount = 0;
    }

    const now = this.now();

    if (snapshot.overBudget && this.canAutoSwitch(now) && this.overBudgetFrameCount >= this.autoDowngradeFrames && this.canStepDown()) {
      this.step(1);
      return this.preset;
    }

    if (!snapshot.overBudget && this.canAutoSwitch(now) && this.underBudgetFrameCount >= this.autoUpgradeFrames && this.canStepUp()) {
      if (snapshot.frameTimeMs <= FRAME_BUDGET_MS * 0.85) {
        this.step(-1);
      }
      return this.preset;
    }

    return this.preset;
  }
}
