/**
 * Features grouped by activation year, answering "how many / which were
 * active as of year Y" in O(log years) plus output size.
 *
 * Built eagerly with build(); after invalidate() the next query rebuilds
 * from the source the index was given. Without a source, queries on an
 * invalidated index throw IndexStaleError until build() is called again.
 */

import { IndexNotBuiltError, IndexStaleError } from '../core/errors';
import { createLogger } from '../core/logger';
import { floorIndex } from '../core/math';
import type { Dated } from '../types';

const log = createLogger('YearIndex');

interface YearTable<T> {
  /** Ascending distinct years. */
  years: Float64Array;
  /** Features per year, parallel to `years`. */
  groups: T[][];
  /** prefixCounts[i] = features with year <= years[i]. */
  prefixCounts: Uint32Array;
  prefixMagnitudes: Float64Array;
}

export interface YearIndexOptions<T> {
  /** Where lazy rebuilds read the current feature set from. */
  source?: () => readonly T[];
  /** Summed by magnitudeUntil(); defaults to 0 for every feature. */
  magnitude?: (feature: T) => number;
}

export class YearIndex<T extends Dated> {
  private table: YearTable<T> | null = null;
  private stale = false;
  private source: (() => readonly T[]) | null;
  private readonly magnitudeOf: (feature: T) => number;
  private rebuilds = 0;

  constructor(options: YearIndexOptions<T> = {}) {
    this.source = options.source ?? null;
    this.magnitudeOf = options.magnitude ?? (() => 0);
  }

  /** Group `features` by year. Without an argument, reads the configured source. */
  build(features?: readonly T[]): void {
    const input = features ?? this.source?.();
    if (!input) throw new IndexNotBuiltError('YearIndex');

    const byYear = new Map<number, T[]>();
    for (const feature of input) {
      const group = byYear.get(feature.year);
      if (group) group.push(feature);
      else byYear.set(feature.year, [feature]);
    }

    const years = Float64Array.from(byYear.keys()).sort();
    const groups: T[][] = [];
    const prefixCounts = new Uint32Array(years.length);
    const prefixMagnitudes = new Float64Array(years.length);
    let count = 0;
    let magnitude = 0;
    years.forEach((year, i) => {
      const group = byYear.get(year) ?? [];
      groups.push(group);
      count += group.length;
      for (const feature of group) magnitude += this.magnitudeOf(feature);
      prefixCounts[i] = count;
      prefixMagnitudes[i] = magnitude;
    });

    this.table = { years, groups, prefixCounts, prefixMagnitudes };
    this.stale = false;
    this.rebuilds++;
    log.debug('built', { features: count, years: years.length });
  }

  /** Mark the index out of date; the next query rebuilds it from the source, if any. */
  invalidate(): void {
    this.stale = true;
  }

  setSource(source: () => readonly T[]): void {
    this.source = source;
    this.stale = true;
  }

  get isBuilt(): boolean {
    return this.table !== null;
  }

  get isStale(): boolean {
    return this.stale;
  }

  get buildCount(): number {
    return this.rebuilds;
  }

  /** Features active in or before `year`. */
  countUntil(year: number): number {
    const table = this.current();
    const i = floorIndex(table.years, year);
    return i < 0 ? 0 : table.prefixCounts[i] ?? 0;
  }

  /** Features active in or before `year`, grouped in ascending year order. */
  getUntil(year: number): T[] {
    const table = this.current();
    const last = floorIndex(table.years, year);
    const out: T[] = [];
    for (let i = 0; i <= last; i++) {
      const group = table.groups[i];
      if (group) out.push(...group);
    }
    return out;
  }

  /** Summed magnitude of the features active in or before `year`. */
  magnitudeUntil(year: number): number {
    const table = this.current();
    const i = floorIndex(table.years, year);
    return i < 0 ? 0 : table.prefixMagnitudes[i] ?? 0;
  }

  countForYear(year: number): number {
    const table = this.current();
    const i = floorIndex(table.years, year);
    return i >= 0 && table.years[i] === year ? table.groups[i]?.length ?? 0 : 0;
  }

  /** Distinct years present, ascending. */
  years(): number[] {
    return Array.from(this.current().years);
  }

  /** [first, last] year present, or null for an empty index. */
  yearRange(): [number, number] | null {
    const { years } = this.current();
    const first = years[0];
    const last = years[years.length - 1];
    return first === undefined || last === undefined ? null : [first, last];
  }

  private current(): YearTable<T> {
    if ((this.table === null || this.stale) && this.source) {
      this.build(this.source());
    }
    if (this.table === null) throw new IndexNotBuiltError('YearIndex');
    if (this.stale) throw new IndexStaleError('YearIndex');
    return this.table;
  }
}

/** Year index over `features`, rebuilt from the same array when invalidated. */
export function buildYearIndex<T extends Dated & { magnitude?: number }>(features: readonly T[]): YearIndex<T> {
  const index = new YearIndex<T>({
    source: () => features,
    magnitude: (feature) => feature.magnitude ?? 0,
  });
  index.build();
  return index;
}
