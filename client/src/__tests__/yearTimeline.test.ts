import { describe, expect, it } from 'vitest';

import { ConfigurationError } from '../core/errors';
import { YearTimeline } from '../temporal/yearTimeline';

describe('YearTimeline', () => {
  it('starts paused at the first year', () => {
    const timeline = new YearTimeline();
    expect(timeline.year).toBe(1990);
    expect(timeline.isPlaying).toBe(false);
    expect(timeline.advance(100)).toBe(1990);
  });

  it('steps once per accumulated interval while playing', () => {
    const timeline = new YearTimeline();
    timeline.play();
    expect(timeline.advance(5)).toBe(1995);
    expect(timeline.advance(12)).toBe(2005);
    expect(timeline.progress).toBeCloseTo(0.4, 10);
  });

  it('ignores non-positive deltas', () => {
    const timeline = new YearTimeline();
    timeline.play();
    expect(timeline.advance(-3)).toBe(1990);
    expect(timeline.advance(Number.NaN)).toBe(1990);
    expect(timeline.progress).toBe(0);
  });

  it('wraps to the start when looping', () => {
    const timeline = new YearTimeline();
    timeline.seek(2025);
    expect(timeline.stepForward()).toBe(1990);
  });

  it('stops at the last year when not looping', () => {
    const timeline = new YearTimeline({ loop: false });
    timeline.seek(2020);
    timeline.play();
    expect(timeline.advance(11)).toBe(2025);
    expect(timeline.isPlaying).toBe(false);
    expect(timeline.progress).toBe(0);
  });

  it('steps back and seeks within the range', () => {
    const timeline = new YearTimeline();
    expect(timeline.stepBack()).toBe(1990);
    timeline.seek(2000);
    expect(timeline.stepBack()).toBe(1995);
    expect(timeline.seek(2030)).toBe(2025);
    expect(timeline.seek(1900)).toBe(1990);
  });

  it('toggles playback', () => {
    const timeline = new YearTimeline();
    expect(timeline.toggle()).toBe(true);
    expect(timeline.toggle()).toBe(false);
  });

  it('validates its range and step', () => {
    expect(() => new YearTimeline({ startYear: 2030, endYear: 2020 })).toThrow(ConfigurationError);
    expect(() => new YearTimeline({ step: 0 })).toThrow('step: must be greater than 0, got 0');
    expect(() => new YearTimeline({ secondsPerStep: -1 })).toThrow(ConfigurationError);
  });
});
