import { describe, expect, it } from 'vitest';

import {
  mergeIntervals,
  overlaps,
  subtractIntervals
} from '../../../src/modules/availability/domain/intervals';
import { at } from '../../setup/fixtures';

const span = (start: string, end: string) => ({ start: at(start), end: at(end) });
const iso = (intervals: Array<{ start: Date; end: Date }>) =>
  intervals.map(({ start, end }) => [start.toISOString().slice(11, 16), end.toISOString().slice(11, 16)]);

describe('overlaps', () => {
  it('treats touching intervals as disjoint', () => {
    expect(overlaps(span('08:00', '08:30'), span('08:30', '09:00'))).toBe(false);
  });

  it('detects a partial overlap in either order', () => {
    expect(overlaps(span('08:00', '08:30'), span('08:15', '09:00'))).toBe(true);
    expect(overlaps(span('08:15', '09:00'), span('08:00', '08:30'))).toBe(true);
  });

  it('detects containment', () => {
    expect(overlaps(span('08:00', '12:00'), span('09:00', '09:15'))).toBe(true);
  });
});

describe('mergeIntervals', () => {
  it('returns an empty list for no input', () => {
    expect(mergeIntervals([])).toEqual([]);
  });

  it('sorts and collapses overlapping and touching intervals', () => {
    const merged = mergeIntervals([
      span('10:00', '10:30'),
      span('08:00', '08:30'),
      span('08:30', '09:00'),
      span('08:45', '09:15'),
      span('10:15', '10:20')
    ]);

    expect(iso(merged)).toEqual([
      ['08:00', '09:15'],
      ['10:00', '10:30']
    ]);
  });

  it('does not mutate its input', () => {
    const input = [span('09:00', '10:00'), span('09:30', '11:00')];
    mergeIntervals(input);

    expect(iso(input)).toEqual([
      ['09:00', '10:00'],
      ['09:30', '11:00']
    ]);
  });
});

describe('subtractIntervals', () => {
  it('returns the base untouched when nothing is busy', () => {
    expect(iso(subtractIntervals([span('08:00', '12:00')], []))).toEqual([['08:00', '12:00']]);
  });

  it('cuts busy time out of every base interval', () => {
    const free = subtractIntervals(
      [span('08:00', '12:00'), span('14:00', '19:00')],
      [span('14:30', '15:00'), span('08:00', '08:30'), span('11:00', '11:30')]
    );

    expect(iso(free)).toEqual([
      ['08:30', '11:00'],
      ['11:30', '12:00'],
      ['14:00', '14:30'],
      ['15:00', '19:00']
    ]);
  });

  it('handles busy intervals that overlap each other and spill past the base', () => {
    const free = subtractIntervals(
      [span('08:00', '12:00')],
      [span('07:00', '09:00'), span('08:30', '09:30'), span('11:45', '13:00')]
    );

    expect(iso(free)).toEqual([['09:30', '11:45']]);
  });

  it('removes a base interval that is fully covered', () => {
    expect(subtractIntervals([span('08:00', '09:00')], [span('07:00', '10:00')])).toEqual([]);
  });
});

describe('interval algebra properties', () => {
  const DAY_START = at('08:00').getTime();
  const MINUTE = 60_000;
  const HORIZON_MINUTES = 12 * 60;

  // Park-Miller generator: seeded, so a failing case can be replayed.
  const seeded = (seed: number) => {
    let state = seed;
    return (max: number) => {
      state = (state * 48_271) % 2_147_483_647;
      return state % max;
    };
  };

  const randomIntervals = (next: (max: number) => number, count: number) =>
    Array.from({ length: count }, () => {
      const start = next(HORIZON_MINUTES - 10);
      const length = 5 + next(120);
      return {
        start: new Date(DAY_START + start * MINUTE),
        end: new Date(DAY_START + Math.min(start + length, HORIZON_MINUTES) * MINUTE)
      };
    });

  const contains = (intervals: Array<{ start: Date; end: Date }>, instant: number) =>
    intervals.some(({ start, end }) => start.getTime() <= instant && instant < end.getTime());

  const cases = Array.from({ length: 30 }, (_, index) => {
    const next = seeded(index + 1);
    return {
      base: mergeIntervals(randomIntervals(next, 1 + next(4))),
      busy: randomIntervals(next, next(9))
    };
  });

  it('merging an already merged list changes nothing', () => {
    for (const { busy } of cases) {
      const merged = mergeIntervals(busy);

      expect(mergeIntervals(merged)).toEqual(merged);
      for (let i = 1; i < merged.length; i += 1) {
        expect(merged[i].start.getTime()).toBeGreaterThan(merged[i - 1].end.getTime());
      }
    }
  });

  it('frees exactly the base minutes that no busy interval covers', () => {
    for (const { base, busy } of cases) {
      const mergedBusy = mergeIntervals(busy);
      const free = subtractIntervals(base, busy);

      for (const interval of free) {
        expect(interval.start.getTime()).toBeLessThan(interval.end.getTime());
        expect(
          base.some((segment) => segment.start <= interval.start && interval.end <= segment.end)
        ).toBe(true);
        expect(mergedBusy.some((taken) => overlaps(taken, interval))).toBe(false);
      }

      for (let minute = 0; minute < HORIZON_MINUTES; minute += 1) {
        const instant = DAY_START + minute * MINUTE;
        const expected = contains(base, instant) && !contains(mergedBusy, instant);
        expect(contains(free, instant)).toBe(expected);
      }
    }
  });
});
