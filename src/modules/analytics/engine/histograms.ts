import type { AnalyticsQuery, VoiceSessionRecord } from '../types';
import { clampSessions } from './intervalClamp';
import { splitByDay, splitByHour } from './boundarySplitter';
import { ZoneClock } from './zoneClock';

export const HOURS_PER_DAY = 24;
export const DAYS_PER_WEEK = 7;

/**
 * Seconds of occupancy per local hour of day (index 0-23)
 */
export function hourOfDayHistogram(sessions: readonly VoiceSessionRecord[], query: AnalyticsQuery): number[] {
  const clock = ZoneClock.forZone(query.timezone);
  const buckets = new Array<number>(HOURS_PER_DAY).fill(0);

  for (const interval of clampSessions(sessions, query)) {
    for (const { hour, seconds } of splitByHour(interval, clock)) {
      buckets[hour] += seconds;
    }
  }

  return buckets;
}

/**
 * Seconds of occupancy per local weekday, Monday = 0
 */
export function weekdayHistogram(sessions: readonly VoiceSessionRecord[], query: AnalyticsQuery): number[] {
  const clock = ZoneClock.forZone(query.timezone);
  const buckets = new Array<number>(DAYS_PER_WEEK).fill(0);

  for (const interval of clampSessions(sessions, query)) {
    for (const { weekday, seconds } of splitByDay(interval, clock)) {
      buckets[weekday] += seconds;
    }
  }

  return buckets;
}

/**
 * Seconds of occupancy per local calendar date (YYYY-MM-DD), dates ascending
 */
export function dailyTotals(sessions: readonly VoiceSessionRecord[], query: AnalyticsQuery): Record<string, number> {
  const clock = ZoneClock.forZone(query.timezone);
  const totals = new Map<string, number>();

  for (const interval of clampSessions(sessions, query)) {
    for (const { date, seconds } of splitByDay(interval, clock)) {
      totals.set(date, (totals.get(date) ?? 0) + seconds);
    }
  }

  return sortedRecord(totals);
}

/**
 * Distinct users present on each local calendar date
 */
export function uniqueUsersPerDay(
  sessions: readonly VoiceSessionRecord[],
  query: AnalyticsQuery
): Record<string, number> {
  const clock = ZoneClock.forZone(query.timezone);
  const usersByDate = new Map<string, Set<string>>();

  for (const interval of clampSessions(sessions, query)) {
    for (const { date, seconds } of splitByDay(interval, clock)) {
      if (seconds <= 0) continue;

      let users = usersByDate.get(date);
      if (!users) {
        users = new Set<string>();
        usersByDate.set(date, users);
      }
      users.add(interval.userId);
    }
  }

  const counts = new Map<string, number>();
  for (const [date, users] of usersByDate) {
    counts.set(date, users.size);
  }
  return sortedRecord(counts);
}

export function sortedRecord(values: Map<string, number>): Record<string, number> {
  const record: Record<string, number> = {};
  for (const key of [...values.keys()].sort()) {
    record[key] = values.get(key) ?? 0;
  }
  return record;
}

export function sumValues(values: Iterable<number>): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}
