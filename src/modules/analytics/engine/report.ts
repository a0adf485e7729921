import type { AnalyticsQuery, VoiceReport, VoiceSessionRecord } from '../types';
import { clampSessions, clampedDuration } from './intervalClamp';
import { dailyTotals, hourOfDayHistogram, sumValues, uniqueUsersPerDay, weekdayHistogram } from './histograms';
import { concurrencyPeaks } from './concurrencySweep';
import { soloTime } from './soloTimeSweep';

/**
 * Every aggregate over one snapshot of sessions
 */
export function buildVoiceReport(sessions: readonly VoiceSessionRecord[], query: AnalyticsQuery): VoiceReport {
  const clamped = clampSessions(sessions, query);

  return {
    hourOfDay: hourOfDayHistogram(sessions, query),
    weekday: weekdayHistogram(sessions, query),
    daily: dailyTotals(sessions, query),
    uniqueUsers: uniqueUsersPerDay(sessions, query),
    peaks: concurrencyPeaks(sessions, query),
    solo: soloTime(sessions, query),
    totalSeconds: sumValues(clamped.map(clampedDuration)),
    sessionCount: clamped.length,
  };
}
