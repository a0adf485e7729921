import type { AnalyticsQuery, ClampedSession, VoiceSessionRecord } from '../types';
import { clampSessions } from './intervalClamp';
import { toSweepEvents } from './sweepEvents';

/**
 * Seconds each user spent as the only person in a channel, summed over channels.
 * Users who were never alone are absent from the result.
 */
export function soloTime(sessions: readonly VoiceSessionRecord[], query: AnalyticsQuery): Record<string, number> {
  const byChannel = new Map<string, ClampedSession[]>();
  for (const interval of clampSessions(sessions, query)) {
    const list = byChannel.get(interval.channelId);
    if (list) {
      list.push(interval);
    } else {
      byChannel.set(interval.channelId, [interval]);
    }
  }

  const totals = new Map<string, number>();
  for (const intervals of byChannel.values()) {
    sweepChannel(intervals, totals);
  }

  const result: Record<string, number> = {};
  for (const [userId, seconds] of totals) {
    result[userId] = seconds;
  }
  return result;
}

function sweepChannel(intervals: readonly ClampedSession[], totals: Map<string, number>): void {
  // userId -> open intervals; overlapping stays by the same user count once
  const present = new Map<string, number>();
  let previousTs: number | null = null;

  for (const event of toSweepEvents(intervals)) {
    if (previousTs !== null && present.size === 1 && event.ts > previousTs) {
      const [onlyUser] = present.keys();
      totals.set(onlyUser, (totals.get(onlyUser) ?? 0) + (event.ts - previousTs));
    }

    const count = (present.get(event.userId) ?? 0) + event.delta;
    if (count > 0) {
      present.set(event.userId, count);
    } else {
      present.delete(event.userId);
    }

    previousTs = event.ts;
  }
}
