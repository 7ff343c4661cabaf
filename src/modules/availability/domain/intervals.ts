export interface TimeInterval {
  start: Date;
  end: Date;
}

/** Half-open overlap: intervals that only touch do not overlap. */
export function overlaps(a: TimeInterval, b: TimeInterval): boolean {
  return a.start < b.end && b.start < a.end;
}

function byStart(a: TimeInterval, b: TimeInterval): number {
  return a.start.getTime() - b.start.getTime();
}

/**
 * Collapses overlapping and touching intervals into an ascending, disjoint list.
 */
export function mergeIntervals(intervals: readonly TimeInterval[]): TimeInterval[] {
  if (intervals.length === 0) return [];

  const sorted = [...intervals].sort(byStart);
  const merged: TimeInterval[] = [{ ...sorted[0] }];

  for (const interval of sorted.slice(1)) {
    const last = merged[merged.length - 1];
    if (interval.start <= last.end) {
      if (interval.end > last.end) last.end = interval.end;
    } else {
      merged.push({ ...interval });
    }
  }

  return merged;
}

/**
 * The parts of `base` not covered by any `busy` interval. `base` is expected to be
 * sorted and disjoint; `busy` may be in any order and may overlap itself.
 */
export function subtractIntervals(
  base: readonly TimeInterval[],
  busy: readonly TimeInterval[]
): TimeInterval[] {
  const sortedBusy = [...busy].sort(byStart);
  const free: TimeInterval[] = [];

  for (const segment of base) {
    let cursor = segment.start;

    for (const taken of sortedBusy) {
      if (!overlaps(segment, taken)) continue;
      if (taken.start > cursor) {
        free.push({ start: cursor, end: taken.start });
      }
      if (taken.end > cursor) cursor = taken.end;
      if (cursor >= segment.end) break;
    }

    if (cursor < segment.end) {
      free.push({ start: cursor, end: segment.end });
    }
  }

  return free;
}
