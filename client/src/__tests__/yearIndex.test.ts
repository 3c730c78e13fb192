import { describe, expect, it } from 'vitest';

import { IndexNotBuiltError, IndexStaleError } from '../core/errors';
import { YearIndex, buildYearIndex } from '../temporal/yearIndex';
import { mulberry32 } from './fixtures';

interface DatedItem {
  id: number;
  year: number;
  magnitude?: number;
}

function items(years: number[]): DatedItem[] {
  return years.map((year, id) => ({ id, year, magnitude: (id + 1) * 100 }));
}

describe('YearIndex', () => {
  it('counts features active as of a year', () => {
    const index = buildYearIndex(items([1990, 1990, 1995, 2000]));
    expect(index.countUntil(1995)).toBe(3);
    expect(index.countUntil(1989)).toBe(0);
    expect(index.countUntil(2025)).toBe(4);
    expect(index.countUntil(1992)).toBe(2);
  });

  it('returns features grouped in ascending year order', () => {
    const index = buildYearIndex(items([2000, 1990, 1995, 1990]));
    expect(index.getUntil(1995).map((f) => f.id)).toEqual([1, 3, 2]);
    expect(index.getUntil(1980)).toEqual([]);
  });

  it('sums magnitudes up to a year', () => {
    const index = buildYearIndex(items([1990, 1990, 1995, 2000]));
    expect(index.magnitudeUntil(1990)).toBe(300);
    expect(index.magnitudeUntil(2000)).toBe(1000);
    expect(index.magnitudeUntil(1900)).toBe(0);
  });

  it('treats a missing magnitude as zero', () => {
    const index = buildYearIndex<DatedItem>([{ id: 0, year: 2001 }, { id: 1, year: 2002, magnitude: 5 }]);
    expect(index.magnitudeUntil(2010)).toBe(5);
  });

  it('reports per-year counts and the year range', () => {
    const index = buildYearIndex(items([1990, 1990, 1995, 2000]));
    expect(index.countForYear(1995)).toBe(1);
    expect(index.countForYear(1996)).toBe(0);
    expect(index.years()).toEqual([1990, 1995, 2000]);
    expect(index.yearRange()).toEqual([1990, 2000]);
  });

  it('answers every query on an empty build', () => {
    const index = buildYearIndex<DatedItem>([]);
    expect(index.countUntil(2025)).toBe(0);
    expect(index.getUntil(2025)).toEqual([]);
    expect(index.years()).toEqual([]);
    expect(index.yearRange()).toBeNull();
  });

  it('never decreases as the year advances', () => {
    const rand = mulberry32(17);
    const years = Array.from({ length: 300 }, () => 1985 + Math.floor(rand() * 45));
    const index = buildYearIndex(items(years));
    let previous = 0;
    for (let year = 1980; year <= 2035; year++) {
      const count = index.countUntil(year);
      expect(count).toBeGreaterThanOrEqual(previous);
      expect(count).toBe(years.filter((y) => y <= year).length);
      previous = count;
    }
  });

  it('throws when queried without a build or a source', () => {
    const index = new YearIndex<DatedItem>();
    expect(() => index.countUntil(2000)).toThrow(IndexNotBuiltError);
    expect(() => index.build()).toThrow('YearIndex was queried before build()');
  });

  it('rebuilds lazily from its source after invalidation', () => {
    const data = items([1990, 2000]);
    const index = new YearIndex<DatedItem>({ source: () => data });

    expect(index.countUntil(2000)).toBe(2);
    expect(index.buildCount).toBe(1);

    data.push({ id: 2, year: 1995 });
    expect(index.countUntil(2000)).toBe(2);

    index.invalidate();
    expect(index.isStale).toBe(true);
    expect(index.countUntil(2000)).toBe(3);
    expect(index.isStale).toBe(false);
    expect(index.buildCount).toBe(2);
  });

  it('refuses to answer from an invalidated build without a source', () => {
    const data = items([1990]);
    const index = new YearIndex<DatedItem>();
    index.build(data);
    data.push({ id: 1, year: 1995 });
    index.invalidate();

    expect(() => index.countUntil(2000)).toThrow(IndexStaleError);
    expect(() => index.getUntil(2000)).toThrow('YearIndex was invalidated and has no source to rebuild from');
    expect(index.isStale).toBe(true);
    expect(index.buildCount).toBe(1);

    index.build(data);
    expect(index.isStale).toBe(false);
    expect(index.countUntil(2000)).toBe(2);
  });

  it('switches to a new source', () => {
    const index = buildYearIndex(items([1990]));
    index.setSource(() => items([1990, 1991, 1992]));
    expect(index.isStale).toBe(true);
    expect(index.countUntil(2000)).toBe(3);
  });
});
