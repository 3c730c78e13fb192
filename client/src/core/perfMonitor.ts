/**
 * Frame-time monitor for the culling pipeline.
 * Provides rolling averages and a budget warning.
 */

import { FRAME_BUDGET_MS } from '../config';

export interface PerfSnapshot {
  fps: number;
  frameTimeMs: number;
  featuresTotal: number;
  featuresVisible: number;
  overBudget: boolean;
}

export interface PerfMonitorOptions {
  /** Frames kept for the rolling average. */
  sampleWindow?: number;
  /** Averages are refreshed every N frames. */
  refreshEvery?: number;
  budgetMs?: number;
  now?: () => number;
}

export class PerfMonitor {
  private frameTimes: number[] = [];
  private lastTime = 0;
  private frameCount = 0;
  private currentFps = 0;
  private currentFrameTime = 0;
  private readonly sampleWindow: number;
  private readonly refreshEvery: number;
  private readonly budgetMs: number;
  private readonly now: () => number;

  featuresTotal = 0;
  featuresVisible = 0;

  constructor(options: PerfMonitorOptions = {}) {
    this.sampleWindow = options.sampleWindow ?? 60;
    this.refreshEvery = options.refreshEvery ?? 30;
    this.budgetMs = options.budgetMs ?? FRAME_BUDGET_MS;
    this.now = options.now ?? (() => performance.now());
  }

  /** Call at the start of each frame. */
  beginFrame(): void {
    this.lastTime = this.now();
  }

  /** Call at the end of each frame. Returns frame time in ms. */
  endFrame(): number {
    const elapsed = this.now() - this.lastTime;
    this.record(elapsed);
    return elapsed;
  }

  /** Feed a frame time measured elsewhere. */
  record(elapsedMs: number): void {
    this.frameTimes.push(elapsedMs);
    if (this.frameTimes.length > this.sampleWindow) {
      this.frameTimes.shift();
    }
    this.frameCount++;

    if (this.frameCount % this.refreshEvery === 0) {
      const sum = this.frameTimes.reduce((a, b) => a + b, 0);
      this.currentFrameTime = sum / this.frameTimes.length;
      this.currentFps = this.currentFrameTime > 0 ? 1000 / this.currentFrameTime : 0;
    }
  }

  get frames(): number {
    return this.frameCount;
  }

  /** Get current performance snapshot. */
  snapshot(): PerfSnapshot {
    return {
      fps: Math.round(this.currentFps),
      frameTimeMs: Math.round(this.currentFrameTime * 100) / 100,
      featuresTotal: this.featuresTotal,
      featuresVisible: this.featuresVisible,
      overBudget: this.currentFrameTime > this.budgetMs,
    };
  }

  /** Reset all counters. */
  reset(): void {
    this.frameTimes.length = 0;
    this.frameCount = 0;
    this.currentFps = 0;
    this.currentFrameTime = 0;
    this.featuresTotal = 0;
    this.featuresVisible = 0;
  }
}
