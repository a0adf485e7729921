import type { ClampedSession, SweepEvent } from '../types';

/**
 * One arrival and one departure per interval
 */
export function toSweepEvents(intervals: readonly ClampedSession[]): SweepEvent[] {
  const events: SweepEvent[] = [];
  for (const interval of intervals) {
    events.push({ ts: interval.start, delta: 1, userId: interval.userId });
    events.push({ ts: interval.end, delta: -1, userId: interval.userId });
  }
  return events.sort(compareEvents);
}

/**
 * Order by time, departures before arrivals at the same second
 */
export function compareEvents(a: SweepEvent, b: SweepEvent): number {
  return a.ts - b.ts || a.delta - b.delta;
}
