import { END_YEAR, SECONDS_PER_STEP, START_YEAR, YEAR_STEP } from '../config';
import { ConfigurationError } from '../core/errors';

export interface YearTimelineOptions {
  startYear?: number;
  endYear?: number;
  step?: number;
  secondsPerStep?: number;
  /** Wrap to the start after the last step instead of stopping. */
  loop?: boolean;
}

/**
 * Animated year cursor: advances one step every `secondsPerStep` of
 * accumulated time while playing.
 */
export class YearTimeline {
  readonly startYear: number;
  readonly endYear: number;
  readonly step: number;
  readonly secondsPerStep: number;
  readonly loop: boolean;
  private current: number;
  private elapsed = 0;
  private playing = false;

  constructor(options: YearTimelineOptions = {}) {
    this.startYear = options.startYear ?? START_YEAR;
    this.endYear = options.endYear ?? END_YEAR;
    this.step = options.step ?? YEAR_STEP;
    this.secondsPerStep = options.secondsPerStep ?? SECONDS_PER_STEP;
    this.loop = options.loop ?? true;
    if (this.startYear > this.endYear) {
      throw new ConfigurationError('startYear', `must not exceed endYear (${this.endYear}), got ${this.startYear}`);
    }
    if (!(this.step > 0)) {
      throw new ConfigurationError('step', `must be greater than 0, got ${this.step}`);
    }
    if (!(this.secondsPerStep > 0)) {
      throw new ConfigurationError('secondsPerStep', `must be greater than 0, got ${this.secondsPerStep}`);
    }
    this.current = this.startYear;
  }

  get year(): number {
    return this.current;
  }

  get isPlaying(): boolean {
    return this.playing;
  }

  /** Fraction of the way to the next step, 0-1. */
  get progress(): number {
    return this.elapsed / this.secondsPerStep;
  }

  play(): void {
    this.playing = true;
  }

  pause(): void {
    this.playing = false;
  }

  toggle(): boolean {
    this.playing = !this.playing;
    return this.playing;
  }

  /** Advance by `deltaSeconds` of wall time; returns the current year. */
  advance(deltaSeconds: number): number {
    if (!this.playing || !(deltaSeconds > 0)) return this.current;
    this.elapsed += deltaSeconds;
    while (this.elapsed >= this.secondsPerStep) {
      this.elapsed -= this.secondsPerStep;
      this.stepForward();
      if (!this.playing) {
        this.elapsed = 0;
        break;
      }
    }
    return this.current;
  }

  stepForward(): number {
    const next = this.current + this.step;
    if (next <= this.endYear) {
      this.current = next;
    } else if (this.loop) {
      this.current = this.startYear;
    } else {
      this.current = this.endYear;
      this.playing = false;
    }
    return this.current;
  }

  stepBack(): number {
    this.current = Math.max(this.startYear, this.current - this.step);
    return this.current;
  }

  /** Jump to `year`, clamped to the range. Resets the step timer. */
  seek(year: number): number {
    this.current = Math.min(this.endYear, Math.max(this.startYear, year));
    this.elapsed = 0;
    return this.current;
  }
}
