import type { AnalyticsQuery, ConcurrencyPeaks, VoiceSessionRecord } from '../types';
import { clampSessions } from './intervalClamp';
import { toSweepEvents } from './sweepEvents';
import { sortedRecord } from './histograms';
import { ZoneClock } from './zoneClock';

/**
 * Highest number of people connected at once, overall and per local date.
 *
 * A date's peak is only sampled at arrivals and departures that happen on that
 * date: a session that simply runs through midnight does not raise the next
 * day's peak until some event lands there.
 */
export function concurrencyPeaks(sessions: readonly VoiceSessionRecord[], query: AnalyticsQuery): ConcurrencyPeaks {
  const clock = ZoneClock.forZone(query.timezone);
  const events = toSweepEvents(clampSessions(sessions, query));

  let occupancy = 0;
  let overallPeak = 0;
  const perDay = new Map<string, number>();

  for (const event of events) {
    occupancy += event.delta;

    if (occupancy > overallPeak) {
      overallPeak = occupancy;
    }

    const date = clock.dateKey(event.ts);
    if (occupancy > (perDay.get(date) ?? 0)) {
      perDay.set(date, occupancy);
    }
  }

  return { overallPeak, perDayPeak: sortedRecord(perDay) };
}
