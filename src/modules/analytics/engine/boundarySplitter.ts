import type { ClampedInterval, Granularity, SplitSpan } from '../types';
import type { ZoneClock } from './zoneClock';
import { formatDateKey } from './zoneClock';

/**
 * Cut [start, end) at every local hour or midnight boundary.
 * Lazy: a multi-year session at hourly granularity yields one span per hour
 * without building the whole list. Span lengths always sum to end - start.
 */
export function* splitInterval(
  interval: ClampedInterval,
  granularity: Granularity,
  clock: ZoneClock
): Generator<SplitSpan> {
  let cursor = interval.start;

  while (cursor < interval.end) {
    const local = clock.localTime(cursor);
    // nextBoundary is always > cursor, so the loop advances
    const boundary = Math.min(clock.nextBoundary(cursor, local, granularity), interval.end);

    yield { start: cursor, end: boundary, seconds: boundary - cursor, local };
    cursor = boundary;
  }
}

export function* splitByHour(
  interval: ClampedInterval,
  clock: ZoneClock
): Generator<{ hour: number; seconds: number }> {
  for (const span of splitInterval(interval, 'hour', clock)) {
    yield { hour: span.local.hour, seconds: span.seconds };
  }
}

export function* splitByDay(
  interval: ClampedInterval,
  clock: ZoneClock
): Generator<{ date: string; weekday: number; seconds: number }> {
  for (const span of splitInterval(interval, 'day', clock)) {
    yield { date: formatDateKey(span.local), weekday: span.local.weekday, seconds: span.seconds };
  }
}
