import type { AnalyticsQuery, ClampedInterval, ClampedSession, VoiceSessionRecord } from '../types';
import { isIncluded } from './exclusionPolicy';

/**
 * Intersect a session with [since, now].
 * Open sessions run until now. Returns null when nothing is left.
 */
export function clampInterval(
  session: VoiceSessionRecord,
  since: number,
  now: number
): ClampedInterval | null {
  const start = Math.max(session.joinedTs, since);
  const end = Math.min(session.leftTs ?? now, now);

  if (end <= start) {
    return null;
  }

  return { start, end };
}

export function clampedDuration(interval: ClampedInterval): number {
  return interval.end - interval.start;
}

/**
 * Exclusion then clamp, for every aggregator
 */
export function clampSessions(
  sessions: readonly VoiceSessionRecord[],
  query: AnalyticsQuery
): ClampedSession[] {
  const clamped: ClampedSession[] = [];

  for (const session of sessions) {
    if (!isIncluded(session, query.excludedChannelId)) continue;

    const interval = clampInterval(session, query.since, query.now);
    if (!interval) continue;

    clamped.push({
      userId: session.userId,
      channelId: session.channelId,
      start: interval.start,
      end: interval.end,
    });
  }

  return clamped;
}
