import type {
  AnalyticsQuery,
  ClampedSession,
  RankedTotal,
  SessionHistoryEntry,
  VoiceSessionRecord,
} from '../types';
import { clampSessions } from './intervalClamp';
import { applyExclusion } from './exclusionPolicy';

export const MAX_HISTORY_LIMIT = 20;

/**
 * Clamped seconds per user, highest first
 */
export function totalsByUser(sessions: readonly VoiceSessionRecord[], query: AnalyticsQuery): RankedTotal[] {
  return rankBy(clampSessions(sessions, query), (interval) => interval.userId);
}

/**
 * Clamped seconds per channel, highest first
 */
export function totalsByChannel(sessions: readonly VoiceSessionRecord[], query: AnalyticsQuery): RankedTotal[] {
  return rankBy(clampSessions(sessions, query), (interval) => interval.channelId);
}

export function userTotal(sessions: readonly VoiceSessionRecord[], userId: string, query: AnalyticsQuery): number {
  let total = 0;
  for (const interval of clampSessions(sessions, query)) {
    if (interval.userId === userId) {
      total += interval.end - interval.start;
    }
  }
  return total;
}

export function topN(entries: readonly RankedTotal[], limit: number): RankedTotal[] {
  return entries.slice(0, Math.max(0, limit));
}

/**
 * A user's most recent sessions, newest first. limit is clamped to 1..20.
 * Open sessions are measured up to now.
 */
export function recentSessions(
  sessions: readonly VoiceSessionRecord[],
  userId: string,
  limit: number,
  now: number,
  excludedChannelId: string | null
): SessionHistoryEntry[] {
  const boundedLimit = Math.max(1, Math.min(MAX_HISTORY_LIMIT, Math.floor(limit)));

  return applyExclusion(sessions, excludedChannelId)
    .filter((session) => session.userId === userId)
    .sort((a, b) => b.joinedTs - a.joinedTs)
    .slice(0, boundedLimit)
    .map((session) => ({
      channelId: session.channelId,
      joinedTs: session.joinedTs,
      leftTs: session.leftTs,
      durationSeconds: Math.max(0, (session.leftTs ?? now) - session.joinedTs),
      open: session.leftTs === null,
    }));
}

function rankBy(intervals: readonly ClampedSession[], keyOf: (interval: ClampedSession) => string): RankedTotal[] {
  const totals = new Map<string, number>();
  for (const interval of intervals) {
    const key = keyOf(interval);
    totals.set(key, (totals.get(key) ?? 0) + (interval.end - interval.start));
  }

  return [...totals.entries()]
    .map(([id, seconds]) => ({ id, seconds }))
    .sort((a, b) => b.seconds - a.seconds || a.id.localeCompare(b.id));
}
